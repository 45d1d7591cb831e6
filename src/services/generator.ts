import type { IModelClient } from '../providers/chat/IModelClient.js';
import type { GeneratedResponse, Message, ModelResponse } from '../types/index.js';
import {
  ContentGenerationError,
  EmptyLLMResponseError,
  GenerationCancelledError,
  type CancellationReason,
} from '../utils/errors.js';
import { cleanResponse, validateResponse } from '../utils/response-cleaning.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('generator');

export interface GenerateOptions {
  /** Caller cancellation; aborting rejects with GenerationCancelledError. */
  signal?: AbortSignal;
  /** Upper bound on the backend round trip. */
  timeoutMs?: number;
}

/**
 * Pick the text of the first choice, failing with a distinct reason for each
 * way a backend can answer with nothing.
 */
export function extractContent(response: ModelResponse | null | undefined): string {
  if (!response) {
    throw new EmptyLLMResponseError('nil_response');
  }
  if (response.choices.length === 0) {
    throw new EmptyLLMResponseError('no_choices');
  }
  const content = response.choices[0].content;
  if (content === '') {
    throw new EmptyLLMResponseError('empty_content');
  }
  return content;
}

/**
 * Run one model call, bounded by the caller's signal and the optional timeout.
 * Settles as soon as either fires, even if the client ignores its signal.
 */
async function invoke(
  client: IModelClient,
  messages: Message[],
  temperature: number,
  options: GenerateOptions,
): Promise<ModelResponse | null | undefined> {
  if (options.signal?.aborted) {
    throw new GenerationCancelledError('aborted', options.signal.reason);
  }

  const controller = new AbortController();
  const state: { cancelled: CancellationReason | null } = { cancelled: null };
  let rejectCancelled: (error: GenerationCancelledError) => void = () => undefined;
  const cancellation = new Promise<never>((_resolve, reject) => {
    rejectCancelled = reject;
  });

  const cancel = (reason: CancellationReason, cause?: unknown) => {
    if (state.cancelled) return;
    state.cancelled = reason;
    controller.abort(cause);
    rejectCancelled(new GenerationCancelledError(reason, cause));
  };

  const onAbort = () => cancel('aborted', options.signal?.reason);
  options.signal?.addEventListener('abort', onAbort, { once: true });
  const timer =
    options.timeoutMs === undefined ? undefined : setTimeout(() => cancel('timeout'), options.timeoutMs);

  try {
    const call = client.generateContent(messages, { temperature, jsonMode: true, signal: controller.signal });
    // The losing side of the race may still settle; log it instead of leaving it unhandled
    call.catch((error: unknown) => {
      if (state.cancelled) {
        logger.debug({ error, reason: state.cancelled }, 'Cancelled model call settled');
      }
    });
    return await Promise.race([call, cancellation]);
  } catch (error) {
    if (error instanceof GenerationCancelledError) throw error;
    if (state.cancelled) throw new GenerationCancelledError(state.cancelled, error);
    throw new ContentGenerationError(error);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Invoke the model and turn its first choice into a validated response.
 *
 * Throws ContentGenerationError, GenerationCancelledError, EmptyLLMResponseError,
 * MalformedJSONError or InvalidJSONResponseError. No retries.
 */
export async function generate(
  client: IModelClient,
  temperature: number,
  messages: Message[],
  options: GenerateOptions = {},
): Promise<GeneratedResponse> {
  logger.debug({ provider: client.name, messageCount: messages.length, temperature }, 'Invoking model');

  const response = await invoke(client, messages, temperature, options);
  const content = extractContent(response);
  const cleaned = cleanResponse(content);

  return validateResponse(cleaned);
}
