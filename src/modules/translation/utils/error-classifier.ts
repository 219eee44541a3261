/**
 * Translation Error Classifier
 * Maps anything thrown by the model client onto the two upstream failure kinds
 */

import { TranslationErrorType } from '../types';

export class TranslationError extends Error {
  readonly type: TranslationErrorType;
  readonly statusCode?: number;

  constructor(
    type: TranslationErrorType,
    message: string,
    options: { cause?: unknown; statusCode?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'TranslationError';
    this.type = type;
    this.statusCode = options.statusCode;
  }

  get isUnavailable(): boolean {
    return this.type === TranslationErrorType.UPSTREAM_UNAVAILABLE;
  }
}

const UNAVAILABLE_MARKERS = [
  'econnrefused',
  'econnreset',
  'enotfound',
  'etimedout',
  'connection error',
  'network',
  'timeout',
  'timed out',
  'aborted',
  'socket hang up',
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Classify a model client failure.
 * @param error - Anything thrown while requesting or reading the stream
 * @param deadlineExceeded - The adapter aborted the stream on its own deadline
 */
export function classifyTranslationError(
  error: unknown,
  deadlineExceeded = false
): TranslationError {
  if (error instanceof TranslationError) {
    return error;
  }

  if (deadlineExceeded) {
    return new TranslationError(
      TranslationErrorType.UPSTREAM_UNAVAILABLE,
      'Translation stream deadline exceeded',
      { cause: error }
    );
  }

  // An HTTP status means the service answered, just not usefully
  const statusCode = readStatus(error);
  if (statusCode !== undefined && statusCode !== 408) {
    return new TranslationError(
      TranslationErrorType.UPSTREAM_ERROR,
      `Translation service responded with status ${statusCode}`,
      { cause: error, statusCode }
    );
  }

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  if (statusCode === 408 || UNAVAILABLE_MARKERS.some((marker) => message.includes(marker))) {
    return new TranslationError(
      TranslationErrorType.UPSTREAM_UNAVAILABLE,
      'Translation service unreachable',
      { cause: error, statusCode }
    );
  }

  return new TranslationError(TranslationErrorType.UPSTREAM_ERROR, 'Malformed translation response', {
    cause: error,
  });
}

export function isTranslationError(error: unknown): error is TranslationError {
  return error instanceof TranslationError;
}
