import type { CapturedRequest, Message, Provider } from '../types/index.js';
import { supportsSystemPrompt } from '../providers/chat/capabilities.js';
import { serializeRequest } from '../utils/http-dump.js';
import { ValidationError } from '../utils/errors.js';

export const REQUEST_PLACEHOLDER = '%s';

/**
 * Put the serialized request into the user prompt template.
 * Only the first placeholder is replaced.
 */
export function renderUserPrompt(template: string, requestText: string): string {
  if (!template.includes(REQUEST_PLACEHOLDER)) {
    throw new ValidationError(`User prompt template must contain a ${REQUEST_PLACEHOLDER} placeholder`);
  }
  // Function replacer so `$&` and friends in the request stay literal
  return template.replace(REQUEST_PLACEHOLDER, () => requestText);
}

/**
 * Build the conversation for one captured request.
 *
 * Providers that honor a system role get `[system, human]`; the rest get a
 * single human message with the system prompt prepended.
 */
export function buildMessages(
  request: CapturedRequest,
  systemPrompt: string,
  userPromptTemplate: string,
  provider: Provider,
): Message[] {
  const requestText = serializeRequest(request).trim();
  const userPrompt = renderUserPrompt(userPromptTemplate, requestText);

  if (supportsSystemPrompt(provider)) {
    return [
      { role: 'system', text: systemPrompt },
      { role: 'human', text: userPrompt },
    ];
  }

  return [{ role: 'human', text: `${systemPrompt}\n${userPrompt}` }];
}
