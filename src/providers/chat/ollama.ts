import type { IModelClient } from './IModelClient.js';
import type { GenerateContentOptions, Message, ModelResponse, ProviderConfig } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { joinUrl, postJson } from './http.js';

const logger = createChildLogger('ollama-chat');

const DEFAULT_BASE_URL = 'http://localhost:11434';

interface OllamaChatResponse {
  message?: {
    content?: string;
  };
  done_reason?: string;
}

export class OllamaModelClient implements IModelClient {
  readonly name = 'ollama';
  private baseUrl: string;
  private model: string;

  constructor(providerConfig: ProviderConfig) {
    this.baseUrl = providerConfig.endpoint ?? DEFAULT_BASE_URL;
    this.model = providerConfig.model;
    logger.info({ baseUrl: this.baseUrl, model: this.model }, 'Ollama model client initialized');
  }

  async generateContent(messages: Message[], options: GenerateContentOptions): Promise<ModelResponse | null> {
    logger.debug({ messageCount: messages.length }, 'Generating content');

    const data = await postJson<OllamaChatResponse>(
      this.name,
      joinUrl(this.baseUrl, '/api/chat'),
      {
        model: this.model,
        stream: false,
        ...(options.jsonMode ? { format: 'json' } : {}),
        options: {
          temperature: options.temperature,
        },
        messages: messages.map((m) => ({ role: m.role === 'system' ? 'system' : 'user', content: m.text })),
      },
      { signal: options.signal },
    );

    if (!data.message) {
      return null;
    }

    return { choices: [{ content: data.message.content ?? '', stopReason: data.done_reason }] };
  }
}
