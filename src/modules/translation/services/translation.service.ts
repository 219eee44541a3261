/**
 * Translation Service
 * Turns one streamed model completion into a finite fragment sequence:
 * text fragments in generation order, then exactly one `{ text: '', isFinal: true }`.
 *
 * - The sequence is an async generator: lazy, single-use, not restartable.
 * - A whole-stream deadline is enforced here, not left to the SDK.
 * - Failures surface as TranslationError (UPSTREAM_UNAVAILABLE | UPSTREAM_ERROR).
 */

import { logger } from '@/shared/utils';
import { openaiConfig, promptsConfig } from '../config';
import {
  TranslationErrorType,
  type CompletionStreamClient,
  type TranslationFragment,
  type TranslationServiceMetrics,
  type TranslationTurn,
  type Translator,
} from '../types';
import { TranslationError, classifyTranslationError } from '../utils/error-classifier';
import { OpenAIStreamClient } from './openai-stream.client';

export const FINAL_FRAGMENT: Readonly<TranslationFragment> = Object.freeze({
  text: '',
  isFinal: true,
});

export interface TranslationServiceOptions {
  streamDeadlineMs: number;
}

function primarySubtag(language: string): string {
  return language.trim().toLowerCase().split(/[-_]/)[0] ?? '';
}

export function isSameLanguage(a: string, b: string): boolean {
  return primarySubtag(a) !== '' && primarySubtag(a) === primarySubtag(b);
}

/**
 * Reject once the signal aborts, so a client that ignores the signal
 * still cannot hold the stream open past the deadline.
 */
function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(new Error('Translation stream aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('Translation stream aborted')), {
      once: true,
    });
  });
}

export class TranslationServiceClass implements Translator {
  private totalRequests = 0;
  private totalSuccesses = 0;
  private unavailableFailures = 0;
  private upstreamErrors = 0;
  private durations: number[] = [];

  private readonly options: TranslationServiceOptions;

  constructor(
    private readonly client: CompletionStreamClient = new OpenAIStreamClient(),
    options: Partial<TranslationServiceOptions> = {}
  ) {
    this.options = { streamDeadlineMs: openaiConfig.streamDeadline, ...options };
  }

  async *translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    history: readonly TranslationTurn[] = []
  ): AsyncGenerator<TranslationFragment> {
    this.totalRequests++;
    const startedAt = Date.now();

    if (!text.trim()) {
      this.recordSuccess(startedAt);
      yield { ...FINAL_FRAGMENT };
      return;
    }

    if (isSameLanguage(sourceLanguage, targetLanguage)) {
      logger.debug('Same-language pair, passing utterance through', {
        sourceLanguage,
        targetLanguage,
      });
      this.recordSuccess(startedAt);
      yield { text, isFinal: false };
      yield { ...FINAL_FRAGMENT };
      return;
    }

    const controller = new AbortController();
    let deadlineExceeded = false;
    const deadline = setTimeout(() => {
      deadlineExceeded = true;
      controller.abort();
    }, this.options.streamDeadlineMs);

    const aborted = untilAborted(controller.signal);
    // Keep the losing race branch from surfacing as an unhandled rejection
    aborted.catch(() => undefined);

    const iterator = this.client
      .streamCompletion({
        systemPrompt: promptsConfig.buildSystemPrompt(sourceLanguage, targetLanguage),
        history,
        userText: text,
        signal: controller.signal,
      })
      [Symbol.asyncIterator]();

    let produced = 0;
    let completed = false;
    try {
      while (true) {
        const next = iterator.next();
        // A read still pending when the deadline wins must not reject unobserved
        next.catch(() => undefined);
        const result = await Promise.race([next, aborted]);
        if (result.done) {
          break;
        }
        produced++;
        yield { text: result.value, isFinal: false };
      }
      completed = true;
    } catch (error) {
      const classified = classifyTranslationError(error, deadlineExceeded);
      this.recordFailure(classified);
      logger.warn('Translation stream failed', {
        type: classified.type,
        sourceLanguage,
        targetLanguage,
        fragmentsBeforeFailure: produced,
        error: error instanceof Error ? error.message : String(error),
      });
      throw classified;
    } finally {
      clearTimeout(deadline);
      if (!completed) {
        controller.abort();
        iterator.return?.()?.catch((error: unknown) => {
          logger.debug('Translation stream close failed', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
      }
    }

    if (produced === 0) {
      const empty = new TranslationError(
        TranslationErrorType.UPSTREAM_ERROR,
        'Translation service returned an empty response'
      );
      this.recordFailure(empty);
      throw empty;
    }

    this.recordSuccess(startedAt);
    logger.debug('Translation stream complete', {
      sourceLanguage,
      targetLanguage,
      fragments: produced,
      durationMs: Date.now() - startedAt,
    });
    yield { ...FINAL_FRAGMENT };
  }

  private recordSuccess(startedAt: number): void {
    this.totalSuccesses++;
    this.durations.push(Date.now() - startedAt);
    if (this.durations.length > 1000) {
      this.durations.shift();
    }
  }

  private recordFailure(error: TranslationError): void {
    if (error.isUnavailable) {
      this.unavailableFailures++;
    } else {
      this.upstreamErrors++;
    }
  }

  getMetrics(): TranslationServiceMetrics {
    const averageDurationMs =
      this.durations.length > 0
        ? this.durations.reduce((sum, d) => sum + d, 0) / this.durations.length
        : 0;

    return {
      totalRequests: this.totalRequests,
      totalSuccesses: this.totalSuccesses,
      totalFailures: this.unavailableFailures + this.upstreamErrors,
      unavailableFailures: this.unavailableFailures,
      upstreamErrors: this.upstreamErrors,
      averageDurationMs: Math.round(averageDurationMs),
    };
  }
}

// Export singleton instance
export const translationService = new TranslationServiceClass();
