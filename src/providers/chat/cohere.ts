import type { IModelClient } from './IModelClient.js';
import type { GenerateContentOptions, Message, ModelResponse, ProviderConfig } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { joinUrl, postJson } from './http.js';

const logger = createChildLogger('cohere-chat');

const DEFAULT_BASE_URL = 'https://api.cohere.com';

interface CohereChatResponse {
  message?: {
    content?: Array<{ type: string; text?: string }>;
  };
  finish_reason?: string;
}

export class CohereModelClient implements IModelClient {
  readonly name = 'cohere';
  private apiKey: string;
  private model: string;
  private url: string;

  constructor(providerConfig: ProviderConfig) {
    if (!providerConfig.apiKey) {
      throw new Error('apiKey is required for Cohere provider');
    }
    this.apiKey = providerConfig.apiKey;
    this.model = providerConfig.model;
    this.url = joinUrl(providerConfig.endpoint ?? DEFAULT_BASE_URL, '/v2/chat');
    logger.info({ model: this.model }, 'Cohere model client initialized');
  }

  async generateContent(messages: Message[], options: GenerateContentOptions): Promise<ModelResponse | null> {
    logger.debug({ messageCount: messages.length }, 'Generating content');

    const data = await postJson<CohereChatResponse>(
      this.name,
      this.url,
      {
        model: this.model,
        stream: false,
        temperature: options.temperature,
        ...(options.jsonMode ? { response_format: { type: 'json_object' } } : {}),
        messages: messages.map((m) => ({ role: m.role === 'system' ? 'system' : 'user', content: m.text })),
      },
      {
        headers: { Authorization: `Bearer ${this.apiKey}` },
        signal: options.signal,
      },
    );

    if (!data.message) {
      return null;
    }

    // Cohere returns a single message; its text blocks make up one choice
    const blocks = data.message.content ?? [];
    if (blocks.length === 0) {
      return { choices: [] };
    }
    const text = blocks
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    return { choices: [{ content: text, stopReason: data.finish_reason }] };
  }
}
