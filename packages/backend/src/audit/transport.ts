import type { EndpointConfig, ModelDescriptor } from '@claimaudit/shared';
import type { InferenceRequestBody } from './providers.js';
import { ServiceUnavailableError } from './errors.js';

export type TransportKind = 'http' | 'bedrock';

export interface InferenceCall {
  endpoint: EndpointConfig;
  descriptor: ModelDescriptor;
  body: InferenceRequestBody;
  /** Already combines the caller's signal with the call timeout. */
  signal: AbortSignal;
}

/**
 * Performs the one outbound inference request of an audit and returns the
 * decoded JSON body. Implementations translate their failures into the
 * audit error taxonomy; they never retry.
 */
export interface InferenceTransport {
  readonly kind: TransportKind;
  invoke(call: InferenceCall): Promise<unknown>;
}

const NETWORK_REASONS: Record<string, string> = {
  ECONNREFUSED: 'connection refused',
  ECONNRESET: 'connection reset',
  ENOTFOUND: 'host not found',
  EAI_AGAIN: 'host not found',
  EHOSTUNREACH: 'host unreachable',
  ENETUNREACH: 'network unreachable',
  ETIMEDOUT: 'connection timed out',
  UND_ERR_CONNECT_TIMEOUT: 'connection timed out',
  UND_ERR_SOCKET: 'socket closed',
};

/** Walk an error's `cause` chain for a Node/undici error code. */
export function findErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

function isTimeoutReason(reason: unknown): boolean {
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}

/**
 * Map an error thrown before any response arrived. A timeout is reported as
 * the backend being unavailable; an abort requested by the caller is passed
 * through untouched so no audit result is produced.
 */
export function classifyTransportFailure(err: unknown, endpoint: string, signal: AbortSignal): unknown {
  if (signal.aborted) {
    if (isTimeoutReason(signal.reason)) {
      return new ServiceUnavailableError(endpoint, 'request timed out', { cause: err });
    }
    return signal.reason;
  }

  const code = findErrorCode(err);
  const reason = code ? `${NETWORK_REASONS[code] ?? 'connection failed'} (${code})` : 'connection failed';
  return new ServiceUnavailableError(endpoint, reason, { cause: err });
}
