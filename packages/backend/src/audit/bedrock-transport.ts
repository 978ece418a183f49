import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { InferenceError, ModelUnavailableError, ResponseFormatError, ServiceUnavailableError } from './errors.js';
import { classifyTransportFailure, type InferenceCall, type InferenceTransport } from './transport.js';

const MODEL_NOT_FOUND_EXCEPTIONS = new Set(['ResourceNotFoundException']);
const BACKEND_DOWN_EXCEPTIONS = new Set(['ServiceUnavailableException', 'ModelNotReadyException', 'InternalServerException']);
const INVALID_MODEL_MESSAGE = /model identifier is invalid/i;

function serviceStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('$metadata' in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) return undefined;
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : '';
}

export interface BedrockInferenceTransportOptions {
  region: string;
}

/**
 * Invokes the model through the AWS SDK so requests are SigV4-signed with
 * the default credential chain. The endpoint URL overrides the regional
 * Bedrock runtime host, for VPC endpoints and local emulators.
 */
export class BedrockInferenceTransport implements InferenceTransport {
  readonly kind = 'bedrock';
  private region: string;

  constructor(options: BedrockInferenceTransportOptions) {
    this.region = options.region;
  }

  async invoke({ endpoint, descriptor, body, signal }: InferenceCall): Promise<unknown> {
    const client = new BedrockRuntimeClient({ region: this.region, endpoint: endpoint.url });
    let payload: Uint8Array | undefined;
    try {
      const response = await client.send(
        new InvokeModelCommand({
          modelId: descriptor.modelId,
          contentType: 'application/json',
          accept: 'application/json',
          body: JSON.stringify(body),
        }),
        { abortSignal: signal },
      );
      payload = response.body;
    } catch (err) {
      throw this.classify(err, descriptor.modelId, endpoint.url, signal);
    } finally {
      client.destroy();
    }

    try {
      const parsed: unknown = JSON.parse(new TextDecoder().decode(payload));
      return parsed;
    } catch (err) {
      throw new ResponseFormatError(
        `Bedrock returned a non-JSON body for model '${descriptor.modelId}'`,
        { modelId: descriptor.modelId, providerFamily: descriptor.providerFamily, endpoint: endpoint.url },
        { cause: err },
      );
    }
  }

  private classify(err: unknown, modelId: string, endpoint: string, signal: AbortSignal): unknown {
    const name = errorName(err);
    const status = serviceStatus(err);

    if (
      MODEL_NOT_FOUND_EXCEPTIONS.has(name) ||
      (name === 'ValidationException' && err instanceof Error && INVALID_MODEL_MESSAGE.test(err.message))
    ) {
      return new ModelUnavailableError(modelId, endpoint, { cause: err });
    }
    if (BACKEND_DOWN_EXCEPTIONS.has(name)) {
      return new ServiceUnavailableError(endpoint, name, { cause: err });
    }
    if (status !== undefined) {
      const message = err instanceof Error ? err.message : String(err);
      return new InferenceError(endpoint, status, `Bedrock rejected the request (${name || status}): ${message}`, { cause: err });
    }
    return classifyTransportFailure(err, endpoint, signal);
  }
}
