// Custom error classes for consistent error handling

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnsupportedProviderError extends AppError {
  public readonly provider: string;

  constructor(provider: string) {
    super(`Unsupported LLM provider: ${provider}`, 400, 'UNSUPPORTED_PROVIDER');
    this.name = 'UnsupportedProviderError';
    this.provider = provider;
  }
}

export class ProviderInitializationError extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, details?: unknown, cause?: unknown) {
    super(`${provider}: ${message}`, 500, 'PROVIDER_INIT_ERROR', details, cause);
    this.name = 'ProviderInitializationError';
    this.provider = provider;
  }
}

export class ProviderError extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, details?: unknown) {
    super(`${provider}: ${message}`, 502, 'PROVIDER_ERROR', details);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export class ContentGenerationError extends AppError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Content generation failed: ${reason}`, 502, 'CONTENT_GENERATION_ERROR', undefined, cause);
    this.name = 'ContentGenerationError';
  }
}

export type CancellationReason = 'aborted' | 'timeout';

export class GenerationCancelledError extends AppError {
  public readonly reason: CancellationReason;

  constructor(reason: CancellationReason, cause?: unknown) {
    const message = reason === 'timeout' ? 'Content generation timed out' : 'Content generation was cancelled';
    super(message, 499, 'GENERATION_CANCELLED', undefined, cause);
    this.name = 'GenerationCancelledError';
    this.reason = reason;
  }
}

export type EmptyResponseReason = 'nil_response' | 'no_choices' | 'empty_content';

const EMPTY_RESPONSE_MESSAGES: Record<EmptyResponseReason, string> = {
  nil_response: 'response is nil',
  no_choices: 'no choices available',
  empty_content: 'content of first choice is empty',
};

export class EmptyLLMResponseError extends AppError {
  public readonly reason: EmptyResponseReason;

  constructor(reason: EmptyResponseReason) {
    super(`Empty LLM response: ${EMPTY_RESPONSE_MESSAGES[reason]}`, 502, 'EMPTY_LLM_RESPONSE');
    this.name = 'EmptyLLMResponseError';
    this.reason = reason;
  }
}

export class MalformedJSONError extends AppError {
  public readonly cleaned: string;

  constructor(cleaned: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Model output is not valid JSON${reason}`, 502, 'MALFORMED_JSON', undefined, cause);
    this.name = 'MalformedJSONError';
    this.cleaned = cleaned;
  }
}

/**
 * Thrown when the model produced valid JSON that is missing required fields.
 * `cleaned` holds the fenced-stripped text so callers can log what the model said.
 */
export class InvalidJSONResponseError extends AppError {
  public readonly cleaned: string;

  constructor(cleaned: string, message: string, details?: unknown) {
    super(`Invalid JSON response: ${message}`, 502, 'INVALID_JSON_RESPONSE', details);
    this.name = 'InvalidJSONResponseError';
    this.cleaned = cleaned;
  }
}

export class RequestSerializationError extends AppError {
  constructor(message: string) {
    super(`Cannot serialize HTTP request: ${message}`, 400, 'REQUEST_SERIALIZATION_ERROR');
    this.name = 'RequestSerializationError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
