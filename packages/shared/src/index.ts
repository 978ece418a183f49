// Types
export type {
  ClaimRecord,
  ClaimLineItem,
  PatientRecord,
  ProviderRecord,
  ClaimBundle,
} from './types/claim.js';

export type {
  ProviderFamily,
  ModelDescriptor,
  ModelCatalog,
  ModelListing,
  EndpointConfig,
  AuditResult,
  RiskIndicatorCategory,
} from './types/audit.js';

// Schemas
export {
  ClaimRecordSchema,
  ClaimLineItemSchema,
  PatientRecordSchema,
  ProviderRecordSchema,
  ClaimBundleSchema,
} from './schemas/claim.schema.js';
export type { ClaimBundleInput } from './schemas/claim.schema.js';

export {
  DEFAULT_INFERENCE_TIMEOUT_MS,
  MAX_INFERENCE_TIMEOUT_MS,
  EndpointConfigSchema,
  ModelIdSchema,
  AuditRequestSchema,
  AuditOptionsSchema,
} from './schemas/audit.schema.js';
export type { AuditRequestInput, AuditOptionsInput } from './schemas/audit.schema.js';

// Utils
export { sha256 } from './utils/hash.js';
export { toCalendarDate } from './utils/date.js';
