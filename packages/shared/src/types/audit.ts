export type ProviderFamily = 'anthropic' | 'llama' | 'mistral' | 'generic';

export interface ModelDescriptor {
  modelId: string;
  displayName: string;
  providerFamily: ProviderFamily;
  maxTokens: number;
  temperature: number;
  isDefault: boolean;
  /** Nucleus sampling; only sent to families that accept it. */
  topP?: number;
  topK?: number;
}

export interface ModelCatalog {
  models: readonly ModelDescriptor[];
  /** Model substituted when a caller asks for an id the catalog does not know. */
  fallbackModelId: string;
}

export interface ModelListing {
  models: ModelDescriptor[];
  defaultModelId: string;
  fallbackModelId: string;
  count: number;
}

export interface EndpointConfig {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
}

export interface AuditResult {
  claimId: number;
  analysisText: string;
  fraudScore: number;
  /** Model that actually ran, which differs from requestedModelId after a fallback. */
  modelUsed: string;
  modelName: string;
  modelProvider: ProviderFamily;
  requestedModelId: string | null;
  fallbackUsed: boolean;
  promptLength: number;
  responseLength: number;
  timestamp: string;
  success: boolean;
}

export type RiskIndicatorCategory =
  | 'fraud-language'
  | 'upcoding'
  | 'unbundling'
  | 'duplicate-billing'
  | 'specialty-mismatch'
  | 'unusual-charges'
  | 'medical-necessity'
  | 'documentation-gap'
  | 'inconsistency';
