import { pino } from 'pino';
import type { FastifyBaseLogger } from 'fastify';
import { config } from './config.js';

export type Logger = FastifyBaseLogger;

/** Root logger; Fastify uses it as its loggerInstance and components take children of it. */
export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: 'claimaudit-backend' },
  redact: ['req.headers.authorization', 'endpoint.apiKey'],
});
