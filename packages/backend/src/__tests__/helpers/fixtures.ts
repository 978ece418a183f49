import { pino } from 'pino';
import type { ClaimBundle, ModelCatalog } from '@claimaudit/shared';
import { NotFoundError, type NotFoundResource } from '../../audit/errors.js';
import type { InferenceCall, InferenceTransport, TransportKind } from '../../audit/transport.js';
import type { ClaimRepository } from '../../services/claim.service.js';
import type { Logger } from '../../logger.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export const TEST_ENDPOINT = { url: 'http://inference.test' };

/** A two-line office-visit claim. */
export function makeClaimBundle(overrides: Partial<ClaimBundle> = {}): ClaimBundle {
  return {
    claim: {
      id: 42,
      date: '2024-03-15',
      status: 'submitted',
      totalCharge: 350,
      insurancePaid: 200,
      patientPaid: 50,
    },
    items: [
      { cptCode: '99213', description: 'Office visit, established patient', chargeAmount: 150 },
      { cptCode: '93000', description: 'Electrocardiogram, complete', chargeAmount: 200 },
    ],
    patient: {
      id: 7,
      name: 'Jane Placeholder',
      dateOfBirth: '1980-07-04',
      insuranceProvider: 'Acme Health',
      policyNumber: 'POL-0001',
    },
    provider: {
      id: 3,
      name: 'Example Cardiology Group',
      npi: '1234567890',
      specialty: 'Cardiology',
    },
    ...overrides,
  };
}

/** Small catalog whose default and fallback models differ. */
export const TEST_CATALOG: ModelCatalog = {
  fallbackModelId: 'test.small-model',
  models: [
    { modelId: 'test.large-model', displayName: 'Large Test Model', providerFamily: 'anthropic', maxTokens: 4000, temperature: 0.2, isDefault: true },
    { modelId: 'test.small-model', displayName: 'Small Test Model', providerFamily: 'anthropic', maxTokens: 1000, temperature: 0.7, isDefault: false },
    { modelId: 'test.llama', displayName: 'Test Llama', providerFamily: 'llama', maxTokens: 2048, temperature: 0.5, isDefault: false },
    { modelId: 'test.mistral', displayName: 'Test Mistral', providerFamily: 'mistral', maxTokens: 2048, temperature: 0.5, topP: 0.8, topK: 40, isDefault: false },
    { modelId: 'test.generic', displayName: 'Test Generic', providerFamily: 'generic', maxTokens: 1024, temperature: 0.5, isDefault: false },
  ],
};

/**
 * In-memory claim repository. `missing` makes loadClaimBundle fail the way
 * the database implementation does when a related row is absent.
 */
export class FakeClaimRepository implements ClaimRepository {
  readonly bundles = new Map<number, ClaimBundle>();
  readonly recordedScores: Array<{ claimId: number; fraudScore: number }> = [];
  loadCalls = 0;
  missing: Exclude<NotFoundResource, 'claim'> | null = null;

  constructor(...bundles: ClaimBundle[]) {
    for (const bundle of bundles) this.bundles.set(bundle.claim.id, bundle);
  }

  async loadClaimBundle(claimId: number): Promise<ClaimBundle> {
    this.loadCalls++;
    const bundle = this.bundles.get(claimId);
    if (!bundle) throw new NotFoundError('claim', claimId);
    if (this.missing) throw new NotFoundError(this.missing, claimId);
    return bundle;
  }

  async recordFraudScore(claimId: number, fraudScore: number): Promise<boolean> {
    this.recordedScores.push({ claimId, fraudScore });
    return this.bundles.has(claimId);
  }
}

/** Build the body each provider family returns around a generated text. */
export function providerResponse(family: 'anthropic' | 'llama' | 'mistral', text: string): object {
  switch (family) {
    case 'anthropic':
      return { id: 'msg_test', type: 'message', role: 'assistant', content: [{ type: 'text', text }], stop_reason: 'end_turn' };
    case 'llama':
      return { generation: text, prompt_token_count: 120, generation_token_count: 40, stop_reason: 'stop' };
    case 'mistral':
      return { outputs: [{ text, stop_reason: 'stop' }] };
  }
}

/** Transport that records its calls and answers through `respond`. */
export class StubTransport implements InferenceTransport {
  readonly calls: InferenceCall[] = [];

  constructor(
    private respond: (call: InferenceCall) => unknown | Promise<unknown>,
    readonly kind: TransportKind = 'http',
  ) {}

  async invoke(call: InferenceCall): Promise<unknown> {
    this.calls.push(call);
    return this.respond(call);
  }
}
