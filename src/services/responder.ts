import { config } from '../config.js';
import { getModelClient } from '../providers/chat/index.js';
import type { IModelClient } from '../providers/chat/IModelClient.js';
import type { CapturedRequest, GeneratedResponse, Provider } from '../types/index.js';
import { InvalidJSONResponseError, isAppError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { buildMessages } from './prompts.js';
import { generate } from './generator.js';

const logger = createChildLogger('responder');

export interface ResponderOptions {
  client: IModelClient;
  provider: Provider;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  timeoutMs?: number;
}

export interface Responder {
  respond(request: CapturedRequest, options?: { signal?: AbortSignal }): Promise<GeneratedResponse>;
}

/**
 * Wire prompt building and generation together for an embedding server.
 * Errors are logged and rethrown; the caller decides on retries or fallbacks.
 */
export function createResponder(options: ResponderOptions): Responder {
  const { client, provider, systemPrompt, userPrompt, temperature, timeoutMs } = options;

  return {
    async respond(request, callOptions = {}) {
      const messages = buildMessages(request, systemPrompt, userPrompt, provider);
      const startedAt = Date.now();

      try {
        const response = await generate(client, temperature, messages, { signal: callOptions.signal, timeoutMs });
        logger.info(
          { provider, method: request.method, url: request.url, durationMs: Date.now() - startedAt },
          'Generated response',
        );
        return response;
      } catch (error) {
        if (error instanceof InvalidJSONResponseError) {
          logger.warn({ provider, url: request.url, output: error.cleaned, issues: error.details }, 'Model output failed validation');
        } else {
          logger.error(
            { provider, url: request.url, code: isAppError(error) ? error.code : undefined, error },
            'Response generation failed',
          );
        }
        throw error;
      }
    },
  };
}

let instance: Responder | null = null;

export function getResponder(): Responder {
  if (instance) {
    return instance;
  }

  const client = getModelClient();
  instance = createResponder({
    client,
    provider: client.name,
    systemPrompt: config.systemPrompt,
    userPrompt: config.userPrompt,
    temperature: config.llmTemperature,
    timeoutMs: config.llmTimeoutMs,
  });
  return instance;
}
