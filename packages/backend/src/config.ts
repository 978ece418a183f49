import { z } from 'zod';
import { DEFAULT_INFERENCE_TIMEOUT_MS, EndpointConfigSchema, MAX_INFERENCE_TIMEOUT_MS } from '@claimaudit/shared';
import { ConfigurationError } from './audit/errors.js';

const InferenceEnvSchema = z.object({
  transport: z.enum(['http', 'bedrock']).default('http'),
  endpointUrl: EndpointConfigSchema.shape.url.default('https://bedrock-runtime.us-east-1.amazonaws.com'),
  apiKey: z.string().optional(),
  timeoutMs: z.coerce.number().int().positive().max(MAX_INFERENCE_TIMEOUT_MS).default(DEFAULT_INFERENCE_TIMEOUT_MS),
});

export type InferenceConfig = z.infer<typeof InferenceEnvSchema>;

/** Reads the INFERENCE_* variables; unset or empty ones take their defaults. */
export function parseInferenceConfig(env: NodeJS.ProcessEnv): InferenceConfig {
  const result = InferenceEnvSchema.safeParse({
    transport: env.INFERENCE_TRANSPORT || undefined,
    endpointUrl: env.INFERENCE_ENDPOINT_URL || undefined,
    apiKey: env.INFERENCE_API_KEY || undefined,
    timeoutMs: env.INFERENCE_TIMEOUT_MS || undefined,
  });
  if (!result.success) {
    throw new ConfigurationError('Invalid inference configuration', {
      issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}

export const config = {
  port: parseInt(process.env.PORT ?? '3000', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? 'info',

  db: {
    host: process.env.DB_HOST ?? '127.0.0.1',
    port: parseInt(process.env.DB_PORT ?? '13306', 10),
    user: process.env.DB_USER ?? 'root',
    password: process.env.DB_PASSWORD ?? 'root_dev',
    database: process.env.DB_NAME ?? 'claimaudit',
  },

  inference: parseInferenceConfig(process.env),

  bedrock: {
    region: process.env.AWS_REGION ?? 'us-east-1',
  },

  jwtSecret: process.env.JWT_SECRET ?? 'claimaudit-dev-secret-change-in-prod',
  corsOrigins: (process.env.CORS_ORIGINS ?? 'http://localhost:5173').split(',').map(s => s.trim()),
} as const;
