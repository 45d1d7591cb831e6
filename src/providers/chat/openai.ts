import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { IModelClient } from './IModelClient.js';
import type { GenerateContentOptions, Message, ModelResponse, ProviderConfig } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger('openai-chat');

function toOpenAIMessage(message: Message): ChatCompletionMessageParam {
  return message.role === 'system'
    ? { role: 'system', content: message.text }
    : { role: 'user', content: message.text };
}

/**
 * OpenAI chat completions. `endpoint` points the SDK at any
 * OpenAI-compatible server (vLLM, LM Studio, Azure proxies).
 */
export class OpenAIModelClient implements IModelClient {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;

  constructor(providerConfig: ProviderConfig) {
    if (!providerConfig.apiKey) {
      throw new Error('apiKey is required for OpenAI provider');
    }
    // One request per call; retry policy belongs to the caller
    this.client = new OpenAI({ apiKey: providerConfig.apiKey, baseURL: providerConfig.endpoint, maxRetries: 0 });
    this.model = providerConfig.model;
    logger.info({ model: this.model, endpoint: providerConfig.endpoint }, 'OpenAI model client initialized');
  }

  async generateContent(messages: Message[], options: GenerateContentOptions): Promise<ModelResponse> {
    logger.debug({ messageCount: messages.length }, 'Generating content');

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        temperature: options.temperature,
        ...(options.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal: options.signal },
    );

    return {
      choices: response.choices.map((choice) => ({
        content: choice.message.content ?? '',
        stopReason: choice.finish_reason,
      })),
    };
  }
}
