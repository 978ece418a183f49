import { describe, it, expect, vi, beforeAll, beforeEach, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';

vi.mock('../../db/connection.js', () => ({ db: vi.fn() }));

import { AuditDispatcher } from '../../audit/audit-dispatcher.js';
import {
  InferenceError,
  ModelUnavailableError,
  ServiceUnavailableError,
} from '../../audit/errors.js';
import { ModelRegistry } from '../../audit/model-registry.js';
import type { InferenceCall } from '../../audit/transport.js';
import { buildTestApp } from '../helpers/test-app.js';
import { authHeaders } from '../helpers/test-auth.js';
import {
  FakeClaimRepository,
  StubTransport,
  TEST_CATALOG,
  makeClaimBundle,
  providerResponse,
  silentLogger,
} from '../helpers/fixtures.js';

const ENDPOINT_URL = 'http://inference.test';

let app: FastifyInstance;
let claims: FakeClaimRepository;
let respond: (call: InferenceCall) => unknown;
const transport = new StubTransport((call) => respond(call));

const auditLog = {
  logAuditCompleted: vi.fn().mockResolvedValue(undefined),
  logAuditFailed: vi.fn().mockResolvedValue(undefined),
  getAuditTrail: vi.fn().mockResolvedValue([]),
};

beforeAll(async () => {
  claims = new FakeClaimRepository(makeClaimBundle());
  const dispatcher = new AuditDispatcher({
    registry: new ModelRegistry(TEST_CATALOG),
    claims,
    transport,
    logger: silentLogger,
  });
  app = await buildTestApp({ claims, transport, dispatcher, auditLog, checkDatabase: async () => true });
});

afterAll(async () => {
  await app.close();
});

beforeEach(() => {
  vi.clearAllMocks();
  claims.recordedScores.length = 0;
  transport.calls.length = 0;
  respond = () => providerResponse('anthropic', 'Possible upcoding of 99213.');
});

describe('GET /api/audit/models', () => {
  it('returns 401 without a token', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/audit/models' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Unauthorized' });
  });

  it('lists the catalog with its default and fallback models', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/audit/models', headers: authHeaders() });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.defaultModelId).toBe('test.large-model');
    expect(body.fallbackModelId).toBe('test.small-model');
    expect(body.count).toBe(5);
    expect(body.models[0]).toEqual({
      modelId: 'test.large-model',
      displayName: 'Large Test Model',
      providerFamily: 'anthropic',
      maxTokens: 4000,
      temperature: 0.2,
      isDefault: true,
    });
  });
});

describe('POST /api/claims/:claimId/audit', () => {
  it('audits the claim, stores the fraud score and logs the event', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { endpointUrl: ENDPOINT_URL },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      claimId: 42,
      analysisText: 'Possible upcoding of 99213.',
      fraudScore: 20,
      modelUsed: 'test.large-model',
      requestedModelId: null,
      fallbackUsed: false,
      success: true,
    });
    expect(claims.recordedScores).toEqual([{ claimId: 42, fraudScore: 20 }]);
    expect(auditLog.logAuditCompleted).toHaveBeenCalledWith(expect.objectContaining({ claimId: 42 }), 'test-user-id');
    expect(transport.calls[0]?.endpoint.url).toBe(ENDPOINT_URL);
  });

  it('passes the endpoint settings from the body to the transport', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { endpointUrl: 'https://gateway.test/v1', apiKey: 'test-secret', timeoutMs: 5000 },
    });

    expect(transport.calls[0]?.endpoint).toEqual({
      url: 'https://gateway.test/v1',
      apiKey: 'test-secret',
      timeoutMs: 5000,
    });
  });

  it('falls back to the fallback model for an unknown model id', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { model: 'unknown-model-xyz' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      modelUsed: 'test.small-model',
      requestedModelId: 'unknown-model-xyz',
      fallbackUsed: true,
    });
  });

  it('returns 403 for a role that may not run audits', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders({ userId: 'viewer-1', email: 'viewer@clinic.test', role: 'VIEWER' }),
      payload: {},
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({ error: 'Forbidden: insufficient role' });
    expect(transport.calls).toHaveLength(0);
  });

  it('returns 404 for an unknown claim without logging a failure', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/999/audit',
      headers: authHeaders(),
      payload: {},
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ error: 'Claim not found', code: 'NOT_FOUND' });
    expect(auditLog.logAuditFailed).not.toHaveBeenCalled();
  });

  it('returns 400 for a non-numeric claim id', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/abc/audit',
      headers: authHeaders(),
      payload: {},
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid audit request', code: 'VALIDATION_ERROR' });
    expect(transport.calls).toHaveLength(0);
  });

  it('returns 400 for an endpoint URL that is not http or https', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { endpointUrl: 'ftp://inference.test' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toHaveProperty('code', 'VALIDATION_ERROR');
  });

  it('returns 400 when the body fails the route schema', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { timeoutMs: 'soon' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid audit request', code: 'VALIDATION_ERROR' });
  });

  it.each([123, false])('returns 400 for a non-string model id (%s) instead of coercing it', async (model) => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { model },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      error: 'Invalid audit request',
      code: 'VALIDATION_ERROR',
      details: { issues: [{ path: 'model', message: expect.any(String) }] },
    });
    expect(transport.calls).toHaveLength(0);
  });

  it('returns 400 for a field it does not know', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { modelId: 'test.llama' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toHaveProperty('code', 'VALIDATION_ERROR');
    expect(transport.calls).toHaveLength(0);
  });

  it('returns 503 and logs the failure when the endpoint is unreachable', async () => {
    const failure = new ServiceUnavailableError(ENDPOINT_URL, 'connection refused (ECONNREFUSED)');
    respond = () => {
      throw failure;
    };

    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { endpointUrl: ENDPOINT_URL },
    });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      error: 'Could not reach inference endpoint at http://inference.test: connection refused (ECONNREFUSED)',
      code: 'SERVICE_UNAVAILABLE',
      details: { endpoint: ENDPOINT_URL, reason: 'connection refused (ECONNREFUSED)' },
    });
    expect(auditLog.logAuditFailed).toHaveBeenCalledWith(42, failure, 'test-user-id');
    expect(claims.recordedScores).toEqual([]);
  });

  it('returns 400 when the endpoint does not serve the model', async () => {
    respond = (call) => {
      throw new ModelUnavailableError(call.descriptor.modelId, call.endpoint.url);
    };

    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: { model: 'test.llama', endpointUrl: ENDPOINT_URL },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      error: "Model 'test.llama' not found on inference endpoint at http://inference.test",
      code: 'MODEL_UNAVAILABLE',
    });
  });

  it('returns 502 when the endpoint rejects the request', async () => {
    respond = () => {
      throw new InferenceError(ENDPOINT_URL, 500, 'Inference endpoint returned 500: internal error');
    };

    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: {},
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toHaveProperty('code', 'INFERENCE_ERROR');
  });

  it('returns 502 when the response has an unexpected shape', async () => {
    respond = () => ({ unexpected: true });

    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: {},
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toHaveProperty('code', 'RESPONSE_FORMAT_ERROR');
  });

  it('does not store a score for an empty analysis', async () => {
    respond = () => providerResponse('anthropic', '');

    const response = await app.inject({
      method: 'POST',
      url: '/api/claims/42/audit',
      headers: authHeaders(),
      payload: {},
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ success: false, fraudScore: 0 });
    expect(claims.recordedScores).toEqual([]);
    expect(auditLog.logAuditCompleted).toHaveBeenCalledTimes(1);
  });
});

describe('POST /api/audit/process', () => {
  it('audits a claim bundle from the request body', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/audit/process',
      headers: authHeaders(),
      payload: { claim: { ...makeClaimBundle(), claim: { ...makeClaimBundle().claim, id: 501 } } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ claimId: 501, fraudScore: 20, success: true });
    expect(claims.recordedScores).toEqual([]);
  });

  it('returns 400 for an incomplete bundle', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/audit/process',
      headers: authHeaders(),
      payload: { claim: { claim: { id: 1 } } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid claim bundle', code: 'VALIDATION_ERROR' });
    expect(transport.calls).toHaveLength(0);
  });

  it('returns 400 for a numeric model id', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/audit/process',
      headers: authHeaders(),
      payload: { claim: makeClaimBundle(), model: 123 },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid audit request', code: 'VALIDATION_ERROR' });
    expect(transport.calls).toHaveLength(0);
  });

  it('returns 400 without a claim', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/audit/process',
      headers: authHeaders(),
      payload: {},
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toHaveProperty('error', 'Validation error');
  });
});

describe('GET /api/claims/:claimId/audit-log', () => {
  it('returns the audit trail for the claim', async () => {
    const events = [
      {
        id: 'evt-1',
        claimId: 42,
        eventType: 'AUDIT_COMPLETED',
        actorType: 'LLM',
        actorId: 'test.large-model',
        detail: { fraudScore: 20 },
        createdAt: '2024-05-01T12:00:00.000Z',
      },
    ];
    auditLog.getAuditTrail.mockResolvedValueOnce(events);

    const response = await app.inject({
      method: 'GET',
      url: '/api/claims/42/audit-log',
      headers: authHeaders(),
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(events);
    expect(auditLog.getAuditTrail).toHaveBeenCalledWith(42);
  });
});
