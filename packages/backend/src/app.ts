import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance, type FastifyError, type FastifyRequest, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import jwt from '@fastify/jwt';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { config } from './config.js';
import { logger } from './logger.js';
import { db } from './db/connection.js';
import { AuditDispatcher } from './audit/audit-dispatcher.js';
import { isAuditError } from './audit/errors.js';
import { createModelRegistry } from './audit/model-registry.js';
import { HttpInferenceTransport } from './audit/http-transport.js';
import { BedrockInferenceTransport } from './audit/bedrock-transport.js';
import type { InferenceTransport } from './audit/transport.js';
import { claimRepository, type ClaimRepository } from './services/claim.service.js';
import auditRoutes, { type AuditRoutesOptions } from './routes/audit.js';
import healthRoutes from './routes/health.js';

export interface AppOptions {
  claims?: ClaimRepository;
  transport?: InferenceTransport;
  dispatcher?: AuditDispatcher;
  auditLog?: AuditRoutesOptions['auditLog'];
  checkDatabase?: () => Promise<boolean>;
}

export function createInferenceTransport(): InferenceTransport {
  return config.inference.transport === 'bedrock'
    ? new BedrockInferenceTransport({ region: config.bedrock.region })
    : new HttpInferenceTransport();
}

async function pingDatabase(): Promise<boolean> {
  await db.raw('SELECT 1');
  return true;
}

async function appPlugin(app: FastifyInstance, opts: AppOptions) {
  const claims = opts.claims ?? claimRepository;
  const transport = opts.transport ?? createInferenceTransport();
  const dispatcher =
    opts.dispatcher ??
    new AuditDispatcher({ registry: createModelRegistry(), claims, transport, logger });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // JSON API only
  });

  // CORS
  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    credentials: true,
  });

  // JWT
  await app.register(jwt, {
    secret: config.jwtSecret,
  });

  // Rate limiting (in-memory store); every audit costs a model call
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // OpenAPI docs
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Claim Audit API',
        description: 'LLM-assisted medical claim auditing',
        version: '1.0.0',
      },
      components: {
        securitySchemes: {
          bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
        },
      },
      security: [{ bearerAuth: [] }],
    },
  });
  await app.register(swaggerUi, { routePrefix: '/api/docs' });

  // Route plugins
  await app.register(healthRoutes, {
    checkDatabase: opts.checkDatabase ?? pingDatabase,
    inference: { transport: transport.kind, endpointUrl: config.inference.endpointUrl },
  });
  await app.register(auditRoutes, {
    dispatcher,
    claims,
    auditLog: opts.auditLog,
    inference: {
      endpointUrl: config.inference.endpointUrl,
      apiKey: config.inference.apiKey,
      timeoutMs: config.inference.timeoutMs,
    },
  });

  // Global error handler
  app.setErrorHandler((err: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (err.validation) {
      return reply.status(400).send({ error: 'Validation error', details: err.validation });
    }
    if (isAuditError(err)) {
      if (err.statusCode >= 500) {
        request.log.error({ err }, 'Claim audit failed');
      }
      return reply.status(err.statusCode).send(err.toJSON());
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal server error' });
  });

  app.setNotFoundHandler((_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send({ error: 'Not found' });
  });
}

export default appPlugin;

export async function createApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    loggerInstance: logger,
    genReqId: () => randomUUID(),
    bodyLimit: 2 * 1024 * 1024, // 2MB body limit
  });

  await app.register(appPlugin, opts);
  await app.ready();

  return app;
}
