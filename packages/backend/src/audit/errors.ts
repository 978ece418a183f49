/**
 * Error taxonomy for claim audits. Every kind carries an HTTP status and a
 * machine-readable code so the route layer can map it without inspecting
 * the class, and structured details for the caller's retry decision.
 */

export type AuditErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFIGURATION_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'MODEL_UNAVAILABLE'
  | 'RESPONSE_FORMAT_ERROR'
  | 'INFERENCE_ERROR';

export abstract class AuditError extends Error {
  abstract readonly code: AuditErrorCode;
  abstract readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): { error: string; code: AuditErrorCode; details: Record<string, unknown> } {
    return { error: this.message, code: this.code, details: this.details };
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AuditError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, { issues });
    this.issues = issues;
  }
}

export type NotFoundResource = 'claim' | 'patient' | 'provider';

export class NotFoundError extends AuditError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
  readonly resource: NotFoundResource;

  constructor(resource: NotFoundResource, id: number | string) {
    super(
      resource === 'claim' ? 'Claim not found' : `Associated ${resource} not found for claim`,
      { resource, id },
    );
    this.resource = resource;
  }
}

export class ConfigurationError extends AuditError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = 500;
}

export class ServiceUnavailableError extends AuditError {
  readonly code = 'SERVICE_UNAVAILABLE';
  readonly statusCode = 503;
  readonly endpoint: string;

  constructor(endpoint: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not reach inference endpoint at ${endpoint}: ${reason}`, { endpoint, reason }, options);
    this.endpoint = endpoint;
  }
}

export class ModelUnavailableError extends AuditError {
  readonly code = 'MODEL_UNAVAILABLE';
  readonly statusCode = 400;
  readonly modelId: string;
  readonly endpoint: string;

  constructor(modelId: string, endpoint: string, options?: { cause?: unknown }) {
    super(`Model '${modelId}' not found on inference endpoint at ${endpoint}`, { modelId, endpoint }, options);
    this.modelId = modelId;
    this.endpoint = endpoint;
  }
}

export class ResponseFormatError extends AuditError {
  readonly code = 'RESPONSE_FORMAT_ERROR';
  readonly statusCode = 502;
}

export class InferenceError extends AuditError {
  readonly code = 'INFERENCE_ERROR';
  readonly statusCode = 502;
  readonly status: number | null;

  constructor(endpoint: string, status: number | null, message: string, options?: { cause?: unknown }) {
    super(message, { endpoint, status }, options);
    this.status = status;
  }
}

export function isAuditError(err: unknown): err is AuditError {
  return err instanceof AuditError;
}
