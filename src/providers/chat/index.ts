import { providerConfigFromEnv } from '../../config.js';
import { createChildLogger } from '../../utils/logger.js';
import { ProviderInitializationError, UnsupportedProviderError } from '../../utils/errors.js';
import {
  isProvider,
  ProviderConfigSchema,
  type Provider,
  type ProviderConfig,
  type RawProviderConfig,
} from '../../types/index.js';
import type { IModelClient } from './IModelClient.js';
import { OpenAIModelClient } from './openai.js';
import { GoogleAIModelClient } from './googleai.js';
import { VertexModelClient } from './vertex.js';
import { AnthropicModelClient } from './anthropic.js';
import { CohereModelClient } from './cohere.js';
import { OllamaModelClient } from './ollama.js';

const logger = createChildLogger('model-client');

type ClientInitializer = (providerConfig: ProviderConfig) => IModelClient;

const INITIALIZERS: Readonly<Record<Provider, ClientInitializer>> = Object.freeze({
  openai: (c: ProviderConfig) => new OpenAIModelClient(c),
  googleai: (c: ProviderConfig) => new GoogleAIModelClient(c),
  'gcp-vertex': (c: ProviderConfig) => new VertexModelClient(c),
  anthropic: (c: ProviderConfig) => new AnthropicModelClient(c),
  cohere: (c: ProviderConfig) => new CohereModelClient(c),
  ollama: (c: ProviderConfig) => new OllamaModelClient(c),
});

/**
 * Create a model client for the configured provider.
 * Only validates configuration and builds the client; no request is sent.
 */
export function initialize(rawConfig: RawProviderConfig): IModelClient {
  if (!isProvider(rawConfig.provider)) {
    throw new UnsupportedProviderError(rawConfig.provider);
  }
  const provider = rawConfig.provider;

  const parsed = ProviderConfigSchema.safeParse({ ...rawConfig, provider });
  if (!parsed.success) {
    throw new ProviderInitializationError(provider, 'invalid provider configuration', parsed.error.errors);
  }

  logger.info({ provider, model: parsed.data.model }, 'Initializing model client');

  try {
    return INITIALIZERS[provider](parsed.data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProviderInitializationError(provider, message, undefined, error);
  }
}

let instance: IModelClient | null = null;

export function getModelClient(): IModelClient {
  if (instance) {
    return instance;
  }

  instance = initialize(providerConfigFromEnv());
  return instance;
}

export { supportsSystemPrompt, SUPPORTS_SYSTEM_PROMPT } from './capabilities.js';
export type { IModelClient } from './IModelClient.js';
