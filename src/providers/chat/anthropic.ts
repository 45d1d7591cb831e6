import type { IModelClient } from './IModelClient.js';
import type { GenerateContentOptions, Message, ModelResponse, ProviderConfig } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { joinUrl, postJson } from './http.js';

const logger = createChildLogger('anthropic-chat');

const DEFAULT_BASE_URL = 'https://api.anthropic.com';
const ANTHROPIC_VERSION = '2023-06-01';
const MAX_TOKENS = 4096;

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

interface AnthropicResponse {
  content?: Array<{ type: string; text?: string }>;
  stop_reason?: string;
}

export class AnthropicModelClient implements IModelClient {
  readonly name = 'anthropic';
  private apiKey: string;
  private model: string;
  private url: string;

  constructor(providerConfig: ProviderConfig) {
    if (!providerConfig.apiKey) {
      throw new Error('apiKey is required for Anthropic provider');
    }
    this.apiKey = providerConfig.apiKey;
    this.model = providerConfig.model;
    this.url = joinUrl(providerConfig.endpoint ?? DEFAULT_BASE_URL, '/v1/messages');
    logger.info({ model: this.model }, 'Anthropic model client initialized');
  }

  async generateContent(messages: Message[], options: GenerateContentOptions): Promise<ModelResponse> {
    logger.debug({ messageCount: messages.length }, 'Generating content');

    // Anthropic takes the system prompt as a top-level field, not a message
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.text)
      .join('\n');
    const turns: AnthropicMessage[] = messages
      .filter((m) => m.role === 'human')
      .map((m): AnthropicMessage => ({ role: 'user', content: m.text }));

    const data = await postJson<AnthropicResponse>(
      this.name,
      this.url,
      {
        model: this.model,
        max_tokens: MAX_TOKENS,
        temperature: options.temperature,
        ...(system ? { system } : {}),
        messages: turns,
      },
      {
        headers: {
          'x-api-key': this.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        },
        signal: options.signal,
      },
    );

    const choices = (data.content ?? [])
      .filter((block) => block.type === 'text')
      .map((block) => ({ content: block.text ?? '', stopReason: data.stop_reason }));

    logger.debug({ choices: choices.length }, 'Generated response');
    return { choices };
  }
}
