import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  UnsupportedProviderError,
  ProviderInitializationError,
  ProviderError,
  ContentGenerationError,
  GenerationCancelledError,
  EmptyLLMResponseError,
  MalformedJSONError,
  InvalidJSONResponseError,
  RequestSerializationError,
  isAppError,
} from '../src/utils/errors.js';

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should create error with all properties', () => {
      const cause = new Error('root');
      const error = new AppError('Test error', 400, 'TEST_ERROR', { field: 'value' }, cause);
      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('TEST_ERROR');
      expect(error.details).toEqual({ field: 'value' });
      expect(error.cause).toBe(cause);
      expect(error.name).toBe('AppError');
    });

    it('should be instance of Error', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error instanceof Error).toBe(true);
      expect(error.cause).toBeUndefined();
    });
  });

  describe('ValidationError', () => {
    it('should create error with details', () => {
      const error = new ValidationError('Invalid input', { field: 'userPrompt' });
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual({ field: 'userPrompt' });
    });
  });

  describe('UnsupportedProviderError', () => {
    it('should name the provider', () => {
      const error = new UnsupportedProviderError('bedrock');
      expect(error.message).toBe('Unsupported LLM provider: bedrock');
      expect(error.code).toBe('UNSUPPORTED_PROVIDER');
      expect(error.provider).toBe('bedrock');
    });
  });

  describe('ProviderInitializationError', () => {
    it('should prefix the provider and keep the cause', () => {
      const cause = new Error('apiKey is required');
      const error = new ProviderInitializationError('cohere', 'apiKey is required', undefined, cause);
      expect(error.message).toBe('cohere: apiKey is required');
      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('PROVIDER_INIT_ERROR');
      expect(error.cause).toBe(cause);
    });
  });

  describe('ProviderError', () => {
    it('should create error with provider name', () => {
      const error = new ProviderError('openai', 'Rate limited');
      expect(error.message).toBe('openai: Rate limited');
      expect(error.statusCode).toBe(502);
      expect(error.code).toBe('PROVIDER_ERROR');
      expect(error.provider).toBe('openai');
    });
  });

  describe('ContentGenerationError', () => {
    it('should wrap the underlying failure', () => {
      const cause = new Error('socket hang up');
      const error = new ContentGenerationError(cause);
      expect(error.message).toBe('Content generation failed: socket hang up');
      expect(error.code).toBe('CONTENT_GENERATION_ERROR');
      expect(error.cause).toBe(cause);
    });

    it('should stringify non-error causes', () => {
      expect(new ContentGenerationError('boom').message).toBe('Content generation failed: boom');
    });
  });

  describe('GenerationCancelledError', () => {
    it('should distinguish caller aborts from timeouts', () => {
      expect(new GenerationCancelledError('aborted').message).toBe('Content generation was cancelled');
      expect(new GenerationCancelledError('timeout').message).toBe('Content generation timed out');
      expect(new GenerationCancelledError('timeout').code).toBe('GENERATION_CANCELLED');
    });
  });

  describe('EmptyLLMResponseError', () => {
    it('should have a distinct message per reason', () => {
      expect(new EmptyLLMResponseError('nil_response').message).toBe('Empty LLM response: response is nil');
      expect(new EmptyLLMResponseError('no_choices').message).toBe('Empty LLM response: no choices available');
      expect(new EmptyLLMResponseError('empty_content').message).toBe(
        'Empty LLM response: content of first choice is empty',
      );
    });
  });

  describe('JSON errors', () => {
    it('should keep the cleaned text', () => {
      const malformed = new MalformedJSONError('not json', new SyntaxError('Unexpected token'));
      expect(malformed.message).toBe('Model output is not valid JSON: Unexpected token');
      expect(malformed.cleaned).toBe('not json');

      const invalid = new InvalidJSONResponseError('{"headers":{}}', 'body: Required');
      expect(invalid.message).toBe('Invalid JSON response: body: Required');
      expect(invalid.code).toBe('INVALID_JSON_RESPONSE');
      expect(invalid.cleaned).toBe('{"headers":{}}');
    });
  });

  describe('isAppError', () => {
    it('should return true for AppError instances', () => {
      expect(isAppError(new AppError('test', 400, 'TEST'))).toBe(true);
      expect(isAppError(new UnsupportedProviderError('x'))).toBe(true);
      expect(isAppError(new RequestSerializationError('bad'))).toBe(true);
      expect(isAppError(new EmptyLLMResponseError('no_choices'))).toBe(true);
    });

    it('should return false for regular errors', () => {
      expect(isAppError(new Error('test'))).toBe(false);
      expect(isAppError('string')).toBe(false);
      expect(isAppError(null)).toBe(false);
      expect(isAppError(undefined)).toBe(false);
    });
  });
});
