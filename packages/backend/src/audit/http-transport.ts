import { fetch, type Dispatcher } from 'undici';
import { InferenceError, ModelUnavailableError, ResponseFormatError, ServiceUnavailableError } from './errors.js';
import { classifyTransportFailure, type InferenceCall, type InferenceTransport } from './transport.js';

// Gateway statuses mean the inference backend itself is down.
const UPSTREAM_DOWN_STATUSES = new Set([502, 503, 504]);

export function invokeUrl(endpointUrl: string, modelId: string): string {
  const base = endpointUrl.endsWith('/') ? endpointUrl.slice(0, -1) : endpointUrl;
  return `${base}/model/${encodeURIComponent(modelId)}/invoke`;
}

export interface HttpInferenceTransportOptions {
  /** undici dispatcher; tests pass a MockAgent. */
  dispatcher?: Dispatcher;
}

/**
 * Posts the request body as JSON to `{endpoint}/model/{modelId}/invoke`, the
 * Bedrock runtime REST shape, which inference gateways also expose.
 */
export class HttpInferenceTransport implements InferenceTransport {
  readonly kind = 'http';
  private dispatcher: Dispatcher | undefined;

  constructor(options: HttpInferenceTransportOptions = {}) {
    this.dispatcher = options.dispatcher;
  }

  async invoke({ endpoint, descriptor, body, signal }: InferenceCall): Promise<unknown> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (endpoint.apiKey) {
      headers.Authorization = `Bearer ${endpoint.apiKey}`;
    }

    let text: string;
    let status: number;
    try {
      const response = await fetch(invokeUrl(endpoint.url, descriptor.modelId), {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal,
        dispatcher: this.dispatcher,
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      throw classifyTransportFailure(err, endpoint.url, signal);
    }

    if (status === 404) {
      throw new ModelUnavailableError(descriptor.modelId, endpoint.url);
    }
    if (UPSTREAM_DOWN_STATUSES.has(status)) {
      throw new ServiceUnavailableError(endpoint.url, `upstream returned ${status}`);
    }
    if (status < 200 || status >= 300) {
      throw new InferenceError(
        endpoint.url,
        status,
        `Inference endpoint returned ${status}: ${text.slice(0, 200)}`,
      );
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new ResponseFormatError(
        `Inference endpoint returned a non-JSON body for model '${descriptor.modelId}'`,
        { modelId: descriptor.modelId, providerFamily: descriptor.providerFamily, endpoint: endpoint.url },
        { cause: err },
      );
    }
  }
}
