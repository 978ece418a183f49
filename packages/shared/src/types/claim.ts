export interface ClaimRecord {
  id: number;
  /** Calendar date (YYYY-MM-DD) the claim was filed, or null when unknown. */
  date: string | null;
  status: string | null;
  totalCharge: number;
  insurancePaid: number;
  patientPaid: number;
}

export interface ClaimLineItem {
  cptCode: string;
  description: string | null;
  chargeAmount: number;
}

export interface PatientRecord {
  id: number;
  name: string;
  dateOfBirth: string | null;
  insuranceProvider: string | null;
  policyNumber: string | null;
}

export interface ProviderRecord {
  id: number;
  name: string;
  npi: string | null;
  specialty: string | null;
}

/**
 * Everything the auditor needs to know about one claim. Assembled by the
 * data layer and never mutated afterwards.
 */
export interface ClaimBundle {
  claim: ClaimRecord;
  items: ClaimLineItem[];
  patient: PatientRecord;
  provider: ProviderRecord;
}
