import { ClaimBundleSchema, type ClaimBundle } from '@claimaudit/shared';
import { db } from '../db/connection.js';
import { NotFoundError } from '../audit/errors.js';

export interface ClaimRow {
  claim_id: number;
  patient_id: number;
  provider_id: number;
  claim_date: Date | string | null;
  status: string | null;
  total_charge: string | number | null;
  insurance_paid: string | number | null;
  patient_paid: string | number | null;
  fraud_score: string | number | null;
}

export interface ClaimItemRow {
  cpt_code: string;
  description: string | null;
  charge_amount: string | number | null;
}

export interface PatientRow {
  patient_id: number;
  first_name: string;
  last_name: string;
  date_of_birth: Date | string | null;
  insurance_provider: string | null;
  insurance_policy_number: string | null;
}

export interface ProviderRow {
  provider_id: number;
  provider_name: string;
  npi_number: string | null;
  specialty: string | null;
}

/** Map the joined rows onto the camelCase bundle and validate it. */
export function toClaimBundle(
  claim: ClaimRow,
  items: ClaimItemRow[],
  patient: PatientRow,
  provider: ProviderRow,
): ClaimBundle {
  const result = ClaimBundleSchema.safeParse({
    claim: {
      id: claim.claim_id,
      date: claim.claim_date,
      status: claim.status,
      totalCharge: claim.total_charge,
      insurancePaid: claim.insurance_paid,
      patientPaid: claim.patient_paid,
    },
    items: items.map((item) => ({
      cptCode: item.cpt_code,
      description: item.description,
      chargeAmount: item.charge_amount,
    })),
    patient: {
      id: patient.patient_id,
      name: `${patient.first_name} ${patient.last_name}`.trim(),
      dateOfBirth: patient.date_of_birth,
      insuranceProvider: patient.insurance_provider,
      policyNumber: patient.insurance_policy_number,
    },
    provider: {
      id: provider.provider_id,
      name: provider.provider_name,
      npi: provider.npi_number,
      specialty: provider.specialty,
    },
  });

  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new Error(`Claim ${claim.claim_id} has invalid stored data (${fields})`, { cause: result.error });
  }
  return result.data;
}

/**
 * Load a claim with its line items, patient and provider.
 * Line items keep their insertion order.
 */
export async function loadClaimBundle(claimId: number): Promise<ClaimBundle> {
  const claim = await db('claims').where({ claim_id: claimId }).first<ClaimRow | undefined>();
  if (!claim) {
    throw new NotFoundError('claim', claimId);
  }

  const [items, patient, provider] = await Promise.all([
    db('claim_items as ci')
      .join('services as s', 'ci.service_id', 's.service_id')
      .where('ci.claim_id', claimId)
      .orderBy('ci.item_id', 'asc')
      .select<ClaimItemRow[]>('s.cpt_code', 's.description', 'ci.charge_amount'),
    db('patients').where({ patient_id: claim.patient_id }).first<PatientRow | undefined>(),
    db('providers').where({ provider_id: claim.provider_id }).first<ProviderRow | undefined>(),
  ]);

  if (!patient) {
    throw new NotFoundError('patient', claim.patient_id);
  }
  if (!provider) {
    throw new NotFoundError('provider', claim.provider_id);
  }

  return toClaimBundle(claim, items, patient, provider);
}

/**
 * Store the latest fraud score on the claim. Returns false when the claim no
 * longer exists.
 */
export async function recordFraudScore(claimId: number, fraudScore: number): Promise<boolean> {
  const updated = await db('claims')
    .where({ claim_id: claimId })
    .update({ fraud_score: fraudScore, updated_at: new Date() });
  return updated > 0;
}

export interface ClaimRepository {
  loadClaimBundle(claimId: number): Promise<ClaimBundle>;
  recordFraudScore(claimId: number, fraudScore: number): Promise<boolean>;
}

export const claimRepository: ClaimRepository = { loadClaimBundle, recordFraudScore };
