/**
 * Translation Service Tests
 */

import { describe, it, expect } from 'vitest';
import { TranslationServiceClass } from '@/modules/translation/services/translation.service';
import {
  TranslationErrorType,
  isSameLanguage,
  isTranslationError,
  type CompletionStreamClient,
  type TranslationFragment,
} from '@/modules/translation';
import type { CompletionStreamRequest } from '@/modules/translation/types';

class FakeCompletionClient implements CompletionStreamClient {
  readonly requests: CompletionStreamRequest[] = [];

  constructor(private readonly stream: (request: CompletionStreamRequest) => AsyncGenerator<string>) {}

  streamCompletion(request: CompletionStreamRequest): AsyncIterable<string> {
    this.requests.push(request);
    return this.stream(request);
  }
}

async function* tokens(...values: string[]): AsyncGenerator<string> {
  for (const value of values) {
    yield value;
  }
}

async function collect(fragments: AsyncIterable<TranslationFragment>): Promise<TranslationFragment[]> {
  const out: TranslationFragment[] = [];
  for await (const fragment of fragments) {
    out.push(fragment);
  }
  return out;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
}

describe('TranslationService', () => {
  it('should stream fragments in order and finish with one final fragment', async () => {
    const client = new FakeCompletionClient(() => tokens('Hol', 'a', ' mundo'));
    const service = new TranslationServiceClass(client, { streamDeadlineMs: 1000 });

    const fragments = await collect(service.translate('Hello world', 'en-US', 'es-ES'));

    expect(fragments).toEqual([
      { text: 'Hol', isFinal: false },
      { text: 'a', isFinal: false },
      { text: ' mundo', isFinal: false },
      { text: '', isFinal: true },
    ]);
  });

  it('should send the utterance with a prompt naming both languages', async () => {
    const client = new FakeCompletionClient(() => tokens('Bonjour'));
    const service = new TranslationServiceClass(client, { streamDeadlineMs: 1000 });

    await collect(service.translate('Hello', 'en-US', 'fr-FR'));

    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]?.userText).toBe('Hello');
    expect(client.requests[0]?.systemPrompt).toContain('from en-US to fr-FR');
    expect(client.requests[0]?.signal.aborted).toBe(false);
  });

  it('should pass the leg history to the model client', async () => {
    const client = new FakeCompletionClient(() => tokens('Muy bien'));
    const service = new TranslationServiceClass(client, { streamDeadlineMs: 1000 });
    const history = [{ text: 'Good morning', translation: 'Buenos días' }];

    await collect(service.translate('Very well', 'en-US', 'es-ES', history));
    await collect(service.translate('Thanks', 'en-US', 'es-ES'));

    expect(client.requests.map((request) => request.history)).toEqual([history, []]);
  });

  it('should yield only the final fragment for empty text', async () => {
    const client = new FakeCompletionClient(() => tokens('unused'));
    const service = new TranslationServiceClass(client, { streamDeadlineMs: 1000 });

    expect(await collect(service.translate('  ', 'en-US', 'es-ES'))).toEqual([{ text: '', isFinal: true }]);
    expect(client.requests).toEqual([]);
  });

  it('should pass text through unchanged between variants of one language', async () => {
    const client = new FakeCompletionClient(() => tokens('unused'));
    const service = new TranslationServiceClass(client, { streamDeadlineMs: 1000 });

    expect(await collect(service.translate('Cheers', 'en-GB', 'en-US'))).toEqual([
      { text: 'Cheers', isFinal: false },
      { text: '', isFinal: true },
    ]);
    expect(client.requests).toEqual([]);
  });

  it('should report an empty completion as an upstream error', async () => {
    const service = new TranslationServiceClass(
      new FakeCompletionClient(() => tokens()),
      { streamDeadlineMs: 1000 }
    );

    const error = await captureError(collect(service.translate('Hello', 'en-US', 'es-ES')));

    expect(isTranslationError(error) && error.type).toBe(TranslationErrorType.UPSTREAM_ERROR);
    expect(isTranslationError(error) && error.message).toBe('Translation service returned an empty response');
  });

  it('should classify an HTTP failure as an upstream error', async () => {
    const service = new TranslationServiceClass(
      new FakeCompletionClient(async function* (): AsyncGenerator<string> {
        throw Object.assign(new Error('Internal server error'), { status: 500 });
      }),
      { streamDeadlineMs: 1000 }
    );

    const error = await captureError(collect(service.translate('Hello', 'en-US', 'es-ES')));

    expect(isTranslationError(error) && error.type).toBe(TranslationErrorType.UPSTREAM_ERROR);
    expect(isTranslationError(error) && error.statusCode).toBe(500);
  });

  it('should classify a refused connection as unavailable after partial output', async () => {
    const received: TranslationFragment[] = [];
    const service = new TranslationServiceClass(
      new FakeCompletionClient(async function* (): AsyncGenerator<string> {
        yield 'Hol';
        throw new Error('connect ECONNREFUSED 127.0.0.1:443');
      }),
      { streamDeadlineMs: 1000 }
    );

    const error = await captureError(
      (async () => {
        for await (const fragment of service.translate('Hello', 'en-US', 'es-ES')) {
          received.push(fragment);
        }
      })()
    );

    expect(received).toEqual([{ text: 'Hol', isFinal: false }]);
    expect(isTranslationError(error) && error.type).toBe(TranslationErrorType.UPSTREAM_UNAVAILABLE);
  });

  it('should give up on a stream that outlives its deadline', async () => {
    const client = new FakeCompletionClient(async function* (): AsyncGenerator<string> {
      yield 'Hol';
      await new Promise<void>(() => undefined);
    });
    const service = new TranslationServiceClass(client, { streamDeadlineMs: 20 });

    const error = await captureError(collect(service.translate('Hello', 'en-US', 'es-ES')));

    expect(isTranslationError(error) && error.type).toBe(TranslationErrorType.UPSTREAM_UNAVAILABLE);
    expect(isTranslationError(error) && error.message).toBe('Translation stream deadline exceeded');
    expect(client.requests[0]?.signal.aborted).toBe(true);
  });

  it('should track successes and failures', async () => {
    let fail = false;
    const service = new TranslationServiceClass(
      new FakeCompletionClient(async function* (): AsyncGenerator<string> {
        if (fail) {
          throw Object.assign(new Error('Bad request'), { status: 400 });
        }
        yield 'Hola';
      }),
      { streamDeadlineMs: 1000 }
    );

    await collect(service.translate('Hello', 'en-US', 'es-ES'));
    fail = true;
    await captureError(collect(service.translate('Hello', 'en-US', 'es-ES')));

    expect(service.getMetrics()).toMatchObject({
      totalRequests: 2,
      totalSuccesses: 1,
      totalFailures: 1,
      unavailableFailures: 0,
      upstreamErrors: 1,
    });
  });
});

describe('isSameLanguage', () => {
  it('should compare primary language subtags', () => {
    expect(isSameLanguage('en-US', 'EN-gb')).toBe(true);
    expect(isSameLanguage('en-US', 'es-US')).toBe(false);
    expect(isSameLanguage('', '')).toBe(false);
  });
});
