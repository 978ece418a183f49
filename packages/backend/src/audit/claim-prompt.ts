import type { ClaimBundle } from '@claimaudit/shared';

const NOT_AVAILABLE = 'N/A';

function orNA(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return NOT_AVAILABLE;
  const text = String(value).trim();
  return text === '' ? NOT_AVAILABLE : text;
}

function usd(amount: number): string {
  return `$${Number(amount).toFixed(2)}`;
}

/**
 * Render a claim bundle as the plain-text block the auditor model reads.
 * Line order is fixed and absent values print as "N/A" so every prompt has
 * the same structure.
 */
export function formatClaimForPrompt(bundle: ClaimBundle): string {
  const { claim, items, patient, provider } = bundle;
  const lines: string[] = [
    `Claim ID: ${claim.id}`,
    `Claim Date: ${orNA(claim.date)}`,
    `Claim Status: ${orNA(claim.status)}`,
    `Total Charge: ${usd(claim.totalCharge)}`,
    `Insurance Paid: ${usd(claim.insurancePaid)}`,
    `Patient Paid: ${usd(claim.patientPaid)}`,
    '',
    `Patient: ${orNA(patient.name)} (ID: ${patient.id}, DOB: ${orNA(patient.dateOfBirth)})`,
    `Insurance: ${orNA(patient.insuranceProvider)} (Policy: ${orNA(patient.policyNumber)})`,
    '',
    `Provider: ${orNA(provider.name)} (ID: ${provider.id}, NPI: ${orNA(provider.npi)}, Specialty: ${orNA(provider.specialty)})`,
    '',
    'Services Billed:',
  ];

  if (items.length === 0) {
    lines.push('- None');
  }
  for (const item of items) {
    lines.push(
      `- CPT Code: ${orNA(item.cptCode)}, Description: ${orNA(item.description)}, Charge: ${usd(item.chargeAmount)}`,
    );
  }

  return `${lines.join('\n')}\n`;
}

/** Section headings the model is asked to answer under, in order. */
export const AUDIT_CATEGORIES = [
  'Coding accuracy',
  'Documentation completeness',
  'Medical necessity',
  'Regulatory compliance',
  'Fraud risk indicators',
  'Recommendations',
] as const;

export const AUDIT_INSTRUCTIONS = `You are a medical billing auditor. Analyze the following medical claim data and identify potential anomalies, errors, inconsistencies, or areas needing review (like potential upcoding/downcoding, mismatches between services and provider specialty, unusual charges, duplicate services, etc.). Explain your reasoning clearly for each identified point. If no issues are found, state that clearly.

Please provide your findings in the following categories:
${AUDIT_CATEGORIES.map((category, i) => `${i + 1}. ${category}`).join('\n')}`;

/** Full prompt sent to the model: instructions, then the formatted claim. */
export function buildAuditPrompt(bundle: ClaimBundle): string {
  return `${AUDIT_INSTRUCTIONS}\n\nCLAIM DATA:\n${formatClaimForPrompt(bundle)}\nYOUR ANALYSIS:`;
}
