import type { IModelClient } from './IModelClient.js';
import type { GenerateContentOptions, Message, ModelResponse, ProviderConfig } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { buildGeminiPayload, parseGeminiResponse, type GeminiResponse } from './gemini.js';
import { joinUrl, postJson } from './http.js';

const logger = createChildLogger('googleai-chat');

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';
const API_VERSION = 'v1beta';

export class GoogleAIModelClient implements IModelClient {
  readonly name = 'googleai';
  private apiKey: string;
  private model: string;
  private baseUrl: string;

  constructor(providerConfig: ProviderConfig) {
    if (!providerConfig.apiKey) {
      throw new Error('apiKey is required for Google AI provider');
    }
    this.apiKey = providerConfig.apiKey;
    this.model = providerConfig.model;
    this.baseUrl = providerConfig.endpoint ?? DEFAULT_BASE_URL;
    logger.info({ model: this.model }, 'Google AI model client initialized');
  }

  async generateContent(messages: Message[], options: GenerateContentOptions): Promise<ModelResponse> {
    logger.debug({ messageCount: messages.length }, 'Generating content');

    const url = joinUrl(this.baseUrl, `/${API_VERSION}/models/${encodeURIComponent(this.model)}:generateContent`);
    const data = await postJson<GeminiResponse>(this.name, url, buildGeminiPayload(messages, options), {
      headers: { 'x-goog-api-key': this.apiKey },
      signal: options.signal,
    });

    return parseGeminiResponse(data);
  }
}
