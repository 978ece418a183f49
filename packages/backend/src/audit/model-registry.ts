import type { ModelCatalog, ModelDescriptor, ModelListing } from '@claimaudit/shared';
import { ConfigurationError } from './errors.js';

/**
 * Bedrock model ids the service knows how to talk to. Claude 3.5 Sonnet runs
 * when the caller names no model; Claude 3 Haiku is the cheap substitute for
 * ids the catalog does not recognize.
 */
export const DEFAULT_MODEL_CATALOG: ModelCatalog = {
  fallbackModelId: 'anthropic.claude-3-haiku-20240307-v1:0',
  models: [
    {
      modelId: 'anthropic.claude-3-5-sonnet-20240620-v1:0',
      displayName: 'Claude 3.5 Sonnet',
      providerFamily: 'anthropic',
      maxTokens: 4096,
      temperature: 0.2,
      isDefault: true,
    },
    {
      modelId: 'anthropic.claude-3-haiku-20240307-v1:0',
      displayName: 'Claude 3 Haiku',
      providerFamily: 'anthropic',
      maxTokens: 3000,
      temperature: 0.7,
      isDefault: false,
    },
    {
      modelId: 'meta.llama3-70b-instruct-v1:0',
      displayName: 'Llama 3 70B Instruct',
      providerFamily: 'llama',
      maxTokens: 2048,
      temperature: 0.5,
      isDefault: false,
    },
    {
      modelId: 'meta.llama3-8b-instruct-v1:0',
      displayName: 'Llama 3 8B Instruct',
      providerFamily: 'llama',
      maxTokens: 2048,
      temperature: 0.5,
      isDefault: false,
    },
    {
      modelId: 'mistral.mistral-large-2402-v1:0',
      displayName: 'Mistral Large',
      providerFamily: 'mistral',
      maxTokens: 4096,
      temperature: 0.7,
      topP: 0.9,
      topK: 50,
      isDefault: false,
    },
    {
      modelId: 'mistral.mixtral-8x7b-instruct-v0:1',
      displayName: 'Mixtral 8x7B Instruct',
      providerFamily: 'mistral',
      maxTokens: 4096,
      temperature: 0.5,
      topP: 0.9,
      topK: 50,
      isDefault: false,
    },
  ],
};

export interface ModelResolution {
  descriptor: ModelDescriptor;
  requestedModelId: string | null;
  /** True when the requested id was unknown and the fallback model was substituted. */
  fallbackUsed: boolean;
}

export class ModelRegistry {
  private readonly models: readonly ModelDescriptor[];
  private readonly byId: ReadonlyMap<string, ModelDescriptor>;
  readonly defaultModel: ModelDescriptor;
  readonly fallbackModel: ModelDescriptor;

  constructor(catalog: ModelCatalog) {
    const byId = new Map<string, ModelDescriptor>();
    for (const model of catalog.models) {
      if (byId.has(model.modelId)) {
        throw new ConfigurationError(`Duplicate model id '${model.modelId}' in catalog`, { modelId: model.modelId });
      }
      byId.set(model.modelId, Object.freeze({ ...model }));
    }

    const defaults = [...byId.values()].filter((m) => m.isDefault);
    const defaultModel = defaults[0];
    if (defaults.length !== 1 || !defaultModel) {
      throw new ConfigurationError(
        `Model catalog must mark exactly one default model, found ${defaults.length}`,
        { defaults: defaults.map((m) => m.modelId) },
      );
    }

    const fallbackModel = byId.get(catalog.fallbackModelId);
    if (!fallbackModel) {
      throw new ConfigurationError(
        `Fallback model '${catalog.fallbackModelId}' is not in the catalog`,
        { fallbackModelId: catalog.fallbackModelId },
      );
    }
    if (fallbackModel.modelId === defaultModel.modelId) {
      throw new ConfigurationError('Fallback model must differ from the default model', {
        modelId: fallbackModel.modelId,
      });
    }

    this.models = Object.freeze([...byId.values()]);
    this.byId = byId;
    this.defaultModel = defaultModel;
    this.fallbackModel = fallbackModel;
    Object.freeze(this);
  }

  /**
   * Pick the model for an audit. No id means the default model; an unknown id
   * means the fallback model. Ids match case-sensitively.
   */
  resolve(requestedModelId?: string | null): ModelResolution {
    if (requestedModelId === undefined || requestedModelId === null) {
      return { descriptor: this.defaultModel, requestedModelId: null, fallbackUsed: false };
    }

    const found = this.byId.get(requestedModelId);
    if (found) {
      return { descriptor: found, requestedModelId, fallbackUsed: false };
    }

    return { descriptor: this.fallbackModel, requestedModelId, fallbackUsed: true };
  }

  get(modelId: string): ModelDescriptor | undefined {
    return this.byId.get(modelId);
  }

  listAll(): readonly ModelDescriptor[] {
    return this.models;
  }

  describe(): ModelListing {
    return {
      models: this.models.map((m) => ({ ...m })),
      defaultModelId: this.defaultModel.modelId,
      fallbackModelId: this.fallbackModel.modelId,
      count: this.models.length,
    };
  }
}

export function createModelRegistry(catalog: ModelCatalog = DEFAULT_MODEL_CATALOG): ModelRegistry {
  return new ModelRegistry(catalog);
}
