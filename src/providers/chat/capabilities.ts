import type { Provider } from '../../types/index.js';

/**
 * Providers that honor a distinct system role. The others get the system
 * prompt folded into the human message.
 */
export const SUPPORTS_SYSTEM_PROMPT: Readonly<Record<Provider, boolean>> = Object.freeze({
  openai: true,
  anthropic: true,
  ollama: true,
  cohere: true,
  googleai: false,
  'gcp-vertex': false,
});

export function supportsSystemPrompt(provider: Provider): boolean {
  return SUPPORTS_SYSTEM_PROMPT[provider];
}
