import { z } from 'zod';

export const DEFAULT_INFERENCE_TIMEOUT_MS = 60_000;
export const MAX_INFERENCE_TIMEOUT_MS = 120_000;

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export const EndpointConfigSchema = z.object({
  url: z
    .string()
    .trim()
    .refine(isHttpUrl, { message: 'Endpoint URL must be an absolute http or https URL' }),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().max(MAX_INFERENCE_TIMEOUT_MS).optional(),
});

// Ids are matched exactly: ' test.llama ' is not 'test.llama'.
export const ModelIdSchema = z
  .string()
  .refine((id) => id.trim() !== '', { message: 'Model id must be a non-empty string' });

export const AuditRequestSchema = z.object({
  claimId: z.coerce.number().int().positive(),
  modelId: ModelIdSchema.optional(),
  endpoint: EndpointConfigSchema,
});

export const AuditOptionsSchema = AuditRequestSchema.omit({ claimId: true });

export type AuditRequestInput = z.input<typeof AuditRequestSchema>;
export type AuditOptionsInput = z.input<typeof AuditOptionsSchema>;
