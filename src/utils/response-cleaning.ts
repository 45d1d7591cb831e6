import { GeneratedResponseSchema, type GeneratedResponse } from '../types/index.js';
import { InvalidJSONResponseError, MalformedJSONError } from './errors.js';

// A leading fence (optionally tagged json) plus any other fence marker.
// One pass only; nested or repeated fences are not unwrapped further.
const FENCE_PATTERN = /^```(?:json)?|```/g;

export function cleanResponse(input: string): string {
  return input.replace(FENCE_PATTERN, '').trim();
}

/**
 * Parse cleaned model output and check it against the response schema.
 * Both errors carry the cleaned text for logging.
 */
export function validateResponse(cleaned: string): GeneratedResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    throw new MalformedJSONError(cleaned, error);
  }

  const result = GeneratedResponseSchema.safeParse(parsed);
  if (!result.success) {
    const summary = result.error.errors
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidJSONResponseError(cleaned, summary, result.error.errors);
  }

  return result.data;
}
