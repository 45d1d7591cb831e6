import type { GenerateContentOptions, Message, ModelResponse, Provider } from '../../types/index.js';

/**
 * Interface for LLM backends.
 * All clients must implement this interface to be interchangeable.
 * Clients carry no per-call state and may be shared by concurrent calls.
 */
export interface IModelClient {
  /**
   * Generate candidate completions for a conversation.
   * @returns Normalized choices, or null when the backend answered with nothing
   */
  generateContent(messages: Message[], options: GenerateContentOptions): Promise<ModelResponse | null | undefined>;

  /**
   * Provider name for logging/debugging
   */
  readonly name: Provider;
}
