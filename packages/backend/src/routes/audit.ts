import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AuditResult, ClaimBundleInput } from '@claimaudit/shared';
import { validate, type AuditDispatcher } from '../audit/audit-dispatcher.js';
import { isAuditError } from '../audit/errors.js';
import type { ClaimRepository } from '../services/claim.service.js';
import * as AuditLogService from '../services/audit-log.service.js';
import { authenticate, requireRole } from '../middleware/auth.js';

export interface AuditRoutesOptions {
  dispatcher: AuditDispatcher;
  claims: ClaimRepository;
  auditLog?: Pick<typeof AuditLogService, 'logAuditCompleted' | 'logAuditFailed' | 'getAuditTrail'>;
  inference: {
    endpointUrl: string;
    apiKey?: string;
    timeoutMs: number;
  };
}

interface AuditBody {
  model?: string;
  endpointUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

const auditBodyProperties = {
  model: { type: 'string', description: 'Model id from GET /api/audit/models; unknown ids fall back to the fallback model' },
  endpointUrl: { type: 'string', description: 'Inference endpoint base URL; defaults to the configured endpoint' },
  apiKey: { type: 'string', description: 'Bearer token for the inference endpoint' },
  timeoutMs: { type: 'integer', description: 'Inference call timeout in milliseconds' },
} as const;

// The JSON schema above coerces scalars (123 becomes "123"), so the raw body
// is type-checked first.
const rawAuditBody = z
  .object({
    model: z.string().optional(),
    endpointUrl: z.string().optional(),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().optional(),
  })
  .strict();

const rawProcessBody = rawAuditBody.extend({ claim: z.unknown() });

function rejectUncoercedBody(schema: z.ZodTypeAny) {
  return async (request: FastifyRequest) => {
    validate(schema, request.body ?? {}, 'Invalid audit request');
  };
}

const auditResultSchema = {
  type: 'object' as const,
  properties: {
    claimId: { type: 'integer' },
    analysisText: { type: 'string' },
    fraudScore: { type: 'integer', minimum: 0, maximum: 100 },
    modelUsed: { type: 'string' },
    modelName: { type: 'string' },
    modelProvider: { type: 'string' },
    requestedModelId: { type: ['string', 'null'] },
    fallbackUsed: { type: 'boolean' },
    promptLength: { type: 'integer' },
    responseLength: { type: 'integer' },
    timestamp: { type: 'string' },
    success: { type: 'boolean' },
  },
};

const errorSchema = {
  type: 'object' as const,
  additionalProperties: true,
  properties: {
    error: { type: 'string' },
    code: { type: 'string' },
  },
};

const modelSchema = {
  type: 'object' as const,
  properties: {
    modelId: { type: 'string' },
    displayName: { type: 'string' },
    providerFamily: { type: 'string' },
    maxTokens: { type: 'integer' },
    temperature: { type: 'number' },
    topP: { type: 'number' },
    topK: { type: 'integer' },
    isDefault: { type: 'boolean' },
  },
};

/** Abort controller tied to the client connection: closing it abandons the inference call. */
function connectionSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort(new Error('Client closed the connection'));
    }
  });
  return controller.signal;
}

export default async function auditRoutes(app: FastifyInstance, opts: AuditRoutesOptions) {
  const { dispatcher, claims, inference } = opts;
  const auditLog = opts.auditLog ?? AuditLogService;

  function endpointFrom(body: AuditBody) {
    return {
      url: body.endpointUrl ?? inference.endpointUrl,
      apiKey: body.apiKey ?? inference.apiKey,
      timeoutMs: body.timeoutMs ?? inference.timeoutMs,
    };
  }

  // GET /api/audit/models: discovery listing of the model catalog
  app.get(
    '/api/audit/models',
    {
      preHandler: [authenticate],
      schema: {
        tags: ['Audit'],
        summary: 'List available models',
        description: 'Returns every model in the catalog with the default and fallback model ids.',
        response: {
          200: {
            description: 'Model catalog',
            type: 'object',
            properties: {
              models: { type: 'array', items: modelSchema },
              defaultModelId: { type: 'string' },
              fallbackModelId: { type: 'string' },
              count: { type: 'integer' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send(dispatcher.listModels());
    },
  );

  // POST /api/claims/:claimId/audit: audit a stored claim
  app.post<{ Params: { claimId: string }; Body: AuditBody }>(
    '/api/claims/:claimId/audit',
    {
      preValidation: rejectUncoercedBody(rawAuditBody),
      preHandler: [authenticate, requireRole(['AUDITOR', 'BILLING_ADMIN'])],
      schema: {
        tags: ['Audit'],
        summary: 'Audit a claim',
        description:
          'Sends the claim, its line items, patient and provider to the inference endpoint and returns the analysis with a fraud score.',
        params: {
          type: 'object',
          properties: {
            claimId: { type: 'string', description: 'Claim ID' },
          },
          required: ['claimId'],
        },
        body: {
          type: 'object',
          additionalProperties: false,
          properties: auditBodyProperties,
        },
        response: {
          200: { description: 'Audit result', ...auditResultSchema },
          400: { description: 'Invalid request or model not deployed on the endpoint', ...errorSchema },
          404: { description: 'Claim, patient or provider not found', ...errorSchema },
          502: { description: 'Inference endpoint returned an error or an unexpected response', ...errorSchema },
          503: { description: 'Inference endpoint unreachable', ...errorSchema },
        },
      },
    },
    async (request, reply) => {
      const body = request.body ?? {};
      const userId = request.user?.userId;
      const claimId = Number(request.params.claimId);

      let result: AuditResult;
      try {
        result = await dispatcher.run({
          claimId: request.params.claimId,
          modelId: body.model,
          endpoint: endpointFrom(body),
          signal: connectionSignal(reply),
        });
      } catch (err) {
        if (isAuditError(err) && err.code !== 'VALIDATION_ERROR' && err.code !== 'NOT_FOUND') {
          await auditLog.logAuditFailed(claimId, err, userId);
        }
        throw err;
      }

      if (result.success) {
        const stored = await claims.recordFraudScore(result.claimId, result.fraudScore);
        if (!stored) {
          request.log.warn({ claimId: result.claimId }, 'Claim disappeared before its fraud score was stored');
        }
      }
      await auditLog.logAuditCompleted(result, userId);

      return reply.send(result);
    },
  );

  // POST /api/audit/process: audit a claim bundle supplied in the request
  app.post<{ Body: AuditBody & { claim: ClaimBundleInput } }>(
    '/api/audit/process',
    {
      preValidation: rejectUncoercedBody(rawProcessBody),
      preHandler: [authenticate],
      schema: {
        tags: ['Audit'],
        summary: 'Audit claim data',
        description: 'Audits a claim bundle sent in the request body. Nothing is read from or written to the database.',
        body: {
          type: 'object',
          additionalProperties: false,
          properties: {
            claim: { type: 'object', description: 'Claim bundle: claim, items, patient, provider' },
            ...auditBodyProperties,
          },
          required: ['claim'],
        },
        response: {
          200: { description: 'Audit result', ...auditResultSchema },
          400: { description: 'Invalid claim data or model not deployed on the endpoint', ...errorSchema },
          502: { description: 'Inference endpoint returned an error or an unexpected response', ...errorSchema },
          503: { description: 'Inference endpoint unreachable', ...errorSchema },
        },
      },
    },
    async (request, reply) => {
      const { claim, ...body } = request.body;
      const result = await dispatcher.auditBundle(claim, {
        modelId: body.model,
        endpoint: endpointFrom(body),
        signal: connectionSignal(reply),
      });
      return reply.send(result);
    },
  );

  // GET /api/claims/:claimId/audit-log: audit events for a claim
  app.get<{ Params: { claimId: string } }>(
    '/api/claims/:claimId/audit-log',
    {
      preHandler: [authenticate],
      schema: {
        tags: ['Audit'],
        summary: 'Get audit trail',
        description: 'Returns the audit events recorded for a claim, oldest first.',
        params: {
          type: 'object',
          properties: {
            claimId: { type: 'integer', description: 'Claim ID' },
          },
          required: ['claimId'],
        },
        response: {
          200: {
            description: 'Audit events',
            type: 'array',
            items: { type: 'object', additionalProperties: true },
          },
        },
      },
    },
    async (request, reply) => {
      const events = await auditLog.getAuditTrail(Number(request.params.claimId));
      return reply.send(events);
    },
  );
}
