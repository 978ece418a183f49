import { z } from 'zod';
import type { ModelDescriptor, ProviderFamily } from '@claimaudit/shared';
import { ConfigurationError, ResponseFormatError } from './errors.js';

// ---------------------------------------------------------------------------
// Request bodies, one per provider family
// ---------------------------------------------------------------------------

export const ANTHROPIC_BEDROCK_VERSION = 'bedrock-2023-05-31';

export interface AnthropicRequestBody {
  anthropic_version: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface LlamaRequestBody {
  prompt: string;
  max_gen_len: number;
  temperature: number;
}

export interface MistralRequestBody {
  prompt: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
  top_k: number;
}

export type InferenceRequestBody = AnthropicRequestBody | LlamaRequestBody | MistralRequestBody;

/**
 * A provider family's request builder and response parser live together so
 * the two halves of its wire contract change in one place.
 */
export interface ProviderStrategy<Body extends InferenceRequestBody = InferenceRequestBody> {
  buildRequest(descriptor: ModelDescriptor, prompt: string): Body;
  parseResponse(descriptor: ModelDescriptor, raw: unknown): string;
}

function parseWith<T>(schema: z.ZodType<T>, descriptor: ModelDescriptor, raw: unknown, expected: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ResponseFormatError(
      `Unexpected ${descriptor.providerFamily} response from model '${descriptor.modelId}': expected ${expected}`,
      {
        modelId: descriptor.modelId,
        providerFamily: descriptor.providerFamily,
        issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      },
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Anthropic (Claude Messages API on Bedrock)
// ---------------------------------------------------------------------------

const AnthropicResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string().optional(),
      text: z.string().optional(),
    }),
  ),
});

const anthropicStrategy: ProviderStrategy<AnthropicRequestBody> = {
  buildRequest(descriptor, prompt) {
    return {
      anthropic_version: ANTHROPIC_BEDROCK_VERSION,
      max_tokens: descriptor.maxTokens,
      temperature: descriptor.temperature,
      messages: [{ role: 'user', content: prompt }],
    };
  },

  parseResponse(descriptor, raw) {
    const { content } = parseWith(AnthropicResponseSchema, descriptor, raw, 'a "content" array');
    const block = content.find((b) => (b.type === undefined || b.type === 'text') && typeof b.text === 'string');
    if (block?.text === undefined) {
      throw new ResponseFormatError(
        `Unexpected anthropic response from model '${descriptor.modelId}': no text block in "content"`,
        { modelId: descriptor.modelId, providerFamily: descriptor.providerFamily },
      );
    }
    return block.text;
  },
};

// ---------------------------------------------------------------------------
// Meta Llama 3 instruct
// ---------------------------------------------------------------------------

export function toLlamaInstructPrompt(prompt: string): string {
  return (
    '<|begin_of_text|><|start_header_id|>user<|end_header_id|>\n\n' +
    `${prompt}<|eot_id|><|start_header_id|>assistant<|end_header_id|>\n\n`
  );
}

const LlamaResponseSchema = z.object({ generation: z.string() });

const llamaStrategy: ProviderStrategy<LlamaRequestBody> = {
  buildRequest(descriptor, prompt) {
    return {
      prompt: toLlamaInstructPrompt(prompt),
      max_gen_len: descriptor.maxTokens,
      temperature: descriptor.temperature,
    };
  },

  parseResponse(descriptor, raw) {
    return parseWith(LlamaResponseSchema, descriptor, raw, 'a top-level "generation" string').generation;
  },
};

// ---------------------------------------------------------------------------
// Mistral instruct
// ---------------------------------------------------------------------------

const MISTRAL_DEFAULT_TOP_P = 0.9;
const MISTRAL_DEFAULT_TOP_K = 50;

export function toMistralInstructPrompt(prompt: string): string {
  return `<s>[INST] ${prompt} [/INST]`;
}

// Bedrock returns `outputs`; Ollama-style gateways return a top-level `response`.
const MistralResponseSchema = z.union([
  z.object({ outputs: z.array(z.object({ text: z.string() })).min(1) }),
  z.object({ response: z.string() }),
]);

const mistralStrategy: ProviderStrategy<MistralRequestBody> = {
  buildRequest(descriptor, prompt) {
    return {
      prompt: toMistralInstructPrompt(prompt),
      max_tokens: descriptor.maxTokens,
      temperature: descriptor.temperature,
      top_p: descriptor.topP ?? MISTRAL_DEFAULT_TOP_P,
      top_k: descriptor.topK ?? MISTRAL_DEFAULT_TOP_K,
    };
  },

  parseResponse(descriptor, raw) {
    const parsed = parseWith(
      MistralResponseSchema,
      descriptor,
      raw,
      'an "outputs[0].text" string or a top-level "response" string',
    );
    if ('response' in parsed) return parsed.response;
    const [first] = parsed.outputs;
    return first?.text ?? '';
  },
};

// ---------------------------------------------------------------------------
// Family table
// ---------------------------------------------------------------------------

/** `null` marks a family the service cannot build requests for. */
const STRATEGIES: { readonly [F in ProviderFamily]: ProviderStrategy | null } = {
  anthropic: anthropicStrategy,
  llama: llamaStrategy,
  mistral: mistralStrategy,
  generic: null,
};

export function getProviderStrategy(descriptor: ModelDescriptor): ProviderStrategy {
  const strategy = Object.hasOwn(STRATEGIES, descriptor.providerFamily)
    ? STRATEGIES[descriptor.providerFamily]
    : null;
  if (!strategy) {
    throw new ConfigurationError(
      `Unsupported provider family '${descriptor.providerFamily}' for model '${descriptor.modelId}'`,
      { modelId: descriptor.modelId, providerFamily: descriptor.providerFamily },
    );
  }
  return strategy;
}

export function buildRequest(descriptor: ModelDescriptor, prompt: string): InferenceRequestBody {
  return getProviderStrategy(descriptor).buildRequest(descriptor, prompt);
}

export function parseResponse(descriptor: ModelDescriptor, raw: unknown): string {
  return getProviderStrategy(descriptor).parseResponse(descriptor, raw);
}
