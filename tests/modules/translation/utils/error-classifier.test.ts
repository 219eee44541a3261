/**
 * Translation Error Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import {
  TranslationError,
  TranslationErrorType,
  classifyTranslationError,
  isTranslationError,
} from '@/modules/translation';

describe('classifyTranslationError', () => {
  it('should pass through errors that are already classified', () => {
    const original = new TranslationError(TranslationErrorType.UPSTREAM_ERROR, 'Malformed translation response');

    expect(classifyTranslationError(original)).toBe(original);
  });

  it('should treat an exceeded deadline as unavailable', () => {
    const classified = classifyTranslationError(new Error('Request was aborted.'), true);

    expect(classified.type).toBe(TranslationErrorType.UPSTREAM_UNAVAILABLE);
    expect(classified.message).toBe('Translation stream deadline exceeded');
    expect(classified.isUnavailable).toBe(true);
  });

  it('should treat an HTTP status as an upstream error', () => {
    const classified = classifyTranslationError(Object.assign(new Error('Rate limit'), { status: 429 }));

    expect(classified.type).toBe(TranslationErrorType.UPSTREAM_ERROR);
    expect(classified.statusCode).toBe(429);
    expect(classified.message).toBe('Translation service responded with status 429');
  });

  it('should treat request timeouts and network failures as unavailable', () => {
    expect(classifyTranslationError(Object.assign(new Error('Request timeout'), { status: 408 })).type).toBe(
      TranslationErrorType.UPSTREAM_UNAVAILABLE
    );
    expect(classifyTranslationError(new Error('Connection error.')).type).toBe(
      TranslationErrorType.UPSTREAM_UNAVAILABLE
    );
    expect(classifyTranslationError(new Error('getaddrinfo ENOTFOUND api.example.test')).message).toBe(
      'Translation service unreachable'
    );
  });

  it('should treat anything else as a malformed response', () => {
    const classified = classifyTranslationError('unexpected token');

    expect(classified.type).toBe(TranslationErrorType.UPSTREAM_ERROR);
    expect(classified.message).toBe('Malformed translation response');
    expect(classified.cause).toBe('unexpected token');
  });
});

describe('isTranslationError', () => {
  it('should recognise classified errors only', () => {
    expect(isTranslationError(new TranslationError(TranslationErrorType.UPSTREAM_ERROR, 'x'))).toBe(true);
    expect(isTranslationError(new Error('x'))).toBe(false);
  });
});
