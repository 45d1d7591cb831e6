import { describe, it, expect } from 'vitest';
import { cleanResponse, validateResponse } from '../src/utils/response-cleaning.js';
import { InvalidJSONResponseError, MalformedJSONError } from '../src/utils/errors.js';

describe('Response cleaning', () => {
  describe('cleanResponse', () => {
    it('should strip a json-tagged fence', () => {
      const raw = '```json\n{"headers":{"a":"b"},"body":"x"}\n```';
      expect(cleanResponse(raw)).toBe('{"headers":{"a":"b"},"body":"x"}');
    });

    it('should strip an untagged fence', () => {
      expect(cleanResponse('```\n{"a":1}\n```')).toBe('{"a":1}');
    });

    it('should trim surrounding whitespace from bare JSON', () => {
      expect(cleanResponse('  \n{"a":1}\n ')).toBe('{"a":1}');
    });

    it('should remove every fence marker in a single pass', () => {
      expect(cleanResponse('{"body":"```sh```"}')).toBe('{"body":"sh"}');
    });

    it('should only honor the json tag at the very start', () => {
      expect(cleanResponse('Here:\n```json\n{}\n```')).toBe('Here:\njson\n{}');
    });
  });

  describe('validateResponse', () => {
    it('should accept headers and body', () => {
      expect(validateResponse('{"headers":{"a":"b"},"body":"x"}')).toEqual({ headers: { a: 'b' }, body: 'x' });
    });

    it('should accept an empty body string', () => {
      expect(validateResponse('{"headers":{"Server":"nginx"},"body":""}')).toEqual({
        headers: { Server: 'nginx' },
        body: '',
      });
    });

    it('should reject text that is not JSON', () => {
      expect(() => validateResponse('not json')).toThrow(MalformedJSONError);
    });

    it('should reject empty headers and missing body, keeping the cleaned text', () => {
      let caught: unknown;
      try {
        validateResponse('{"headers":{}}');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidJSONResponseError);
      if (caught instanceof InvalidJSONResponseError) {
        expect(caught.cleaned).toBe('{"headers":{}}');
        expect(caught.message).toBe('Invalid JSON response: headers: headers must not be empty; body: Required');
      }
    });

    it('should reject non-string header values', () => {
      expect(() => validateResponse('{"headers":{"Content-Length":12},"body":"x"}')).toThrow(InvalidJSONResponseError);
    });

    it('should reject JSON that is not an object', () => {
      expect(() => validateResponse('[1,2]')).toThrow(InvalidJSONResponseError);
    });
  });
});
