import type { ZodType, ZodTypeDef } from 'zod';
import {
  AuditOptionsSchema,
  AuditRequestSchema,
  ClaimBundleSchema,
  DEFAULT_INFERENCE_TIMEOUT_MS,
  type AuditResult,
  type ClaimBundle,
  type EndpointConfig,
  type ModelListing,
} from '@claimaudit/shared';
import { logger as rootLogger, type Logger } from '../logger.js';
import { buildAuditPrompt } from './claim-prompt.js';
import { ValidationError } from './errors.js';
import { scoreAnalysis } from './fraud-scorer.js';
import type { ModelRegistry } from './model-registry.js';
import { buildRequest, parseResponse } from './providers.js';
import type { InferenceTransport } from './transport.js';

export const EMPTY_ANALYSIS_PLACEHOLDER =
  'The audit system could not generate an analysis at this time. ' +
  'Please try again later or contact system administration.';

/** Where the dispatcher gets claim data from; the database implementation is claimRepository. */
export interface ClaimSource {
  loadClaimBundle(claimId: number): Promise<ClaimBundle>;
}

export interface AuditDispatcherDeps {
  registry: ModelRegistry;
  claims: ClaimSource;
  transport: InferenceTransport;
  logger?: Logger;
  now?: () => Date;
}

export interface AuditRequest {
  claimId: number | string;
  modelId?: string;
  endpoint: EndpointConfig;
  /** Aborting it abandons the in-flight inference call; no result is produced. */
  signal?: AbortSignal;
}

export type AuditBundleOptions = Omit<AuditRequest, 'claimId'>;

interface ValidatedOptions {
  modelId?: string;
  endpoint: EndpointConfig;
}

/** Parses `input` with `schema`, throwing a ValidationError that lists every issue. */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// AuditDispatcher
// ---------------------------------------------------------------------------

export class AuditDispatcher {
  private registry: ModelRegistry;
  private claims: ClaimSource;
  private transport: InferenceTransport;
  private log: Logger;
  private now: () => Date;

  constructor(deps: AuditDispatcherDeps) {
    this.registry = deps.registry;
    this.claims = deps.claims;
    this.transport = deps.transport;
    this.log = (deps.logger ?? rootLogger).child({ component: 'audit-dispatcher' });
    this.now = deps.now ?? (() => new Date());
  }

  listModels(): ModelListing {
    return this.registry.describe();
  }

  /**
   * Audit a stored claim. Input is validated before any I/O; a missing claim,
   * patient or provider fails with NotFoundError before the model is called.
   */
  async run(request: AuditRequest): Promise<AuditResult> {
    const { claimId, ...options } = validate(
      AuditRequestSchema,
      { claimId: request.claimId, modelId: request.modelId, endpoint: request.endpoint },
      'Invalid audit request',
    );
    const bundle = await this.claims.loadClaimBundle(claimId);
    return this.execute(bundle, options, request.signal);
  }

  /** Audit a claim bundle supplied by the caller instead of loaded from the database. */
  async auditBundle(bundle: unknown, options: AuditBundleOptions): Promise<AuditResult> {
    const validOptions = validate(
      AuditOptionsSchema,
      { modelId: options.modelId, endpoint: options.endpoint },
      'Invalid audit request',
    );
    const validBundle = validate(ClaimBundleSchema, bundle, 'Invalid claim bundle');
    return this.execute(validBundle, validOptions, options.signal);
  }

  private async execute(
    bundle: ClaimBundle,
    { modelId, endpoint }: ValidatedOptions,
    callerSignal?: AbortSignal,
  ): Promise<AuditResult> {
    callerSignal?.throwIfAborted();

    const claimId = bundle.claim.id;
    const prompt = buildAuditPrompt(bundle);
    const { descriptor, requestedModelId, fallbackUsed } = this.registry.resolve(modelId);
    if (fallbackUsed) {
      this.log.warn(
        { claimId, requestedModelId, modelUsed: descriptor.modelId },
        'Requested model is not in the catalog, using fallback model',
      );
    }

    const body = buildRequest(descriptor, prompt);

    const timeoutMs = endpoint.timeoutMs ?? DEFAULT_INFERENCE_TIMEOUT_MS;
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = callerSignal ? AbortSignal.any([callerSignal, timeoutSignal]) : timeoutSignal;

    this.log.info(
      { claimId, modelId: descriptor.modelId, endpoint: endpoint.url, transport: this.transport.kind, promptLength: prompt.length },
      'Sending claim audit to inference endpoint',
    );

    const startedAt = Date.now();
    let raw: unknown;
    try {
      raw = await this.transport.invoke({ endpoint, descriptor, body, signal });
    } catch (err) {
      this.log.warn(
        { err, claimId, modelId: descriptor.modelId, endpoint: endpoint.url, latencyMs: Date.now() - startedAt },
        'Inference call failed',
      );
      throw err;
    }

    const generated = parseResponse(descriptor, raw).trim();
    const success = generated !== '';
    if (!success) {
      this.log.error({ claimId, modelId: descriptor.modelId }, 'Empty analysis received from inference endpoint');
    }
    const analysisText = success ? generated : EMPTY_ANALYSIS_PLACEHOLDER;
    const fraudScore = success ? scoreAnalysis(analysisText) : 0;

    this.log.info(
      {
        claimId,
        modelId: descriptor.modelId,
        fraudScore,
        responseLength: generated.length,
        latencyMs: Date.now() - startedAt,
      },
      'Claim audit completed',
    );

    return {
      claimId,
      analysisText,
      fraudScore,
      modelUsed: descriptor.modelId,
      modelName: descriptor.displayName,
      modelProvider: descriptor.providerFamily,
      requestedModelId,
      fallbackUsed,
      promptLength: prompt.length,
      responseLength: generated.length,
      timestamp: this.now().toISOString(),
      success,
    };
  }
}
