/**
 * Translation Module Type Definitions
 */

/**
 * One incremental unit of translated text. The last fragment of every
 * translation is `{ text: '', isFinal: true }`.
 */
export interface TranslationFragment {
  text: string;
  isFinal: boolean;
}

/**
 * An earlier utterance on the same leg and the translation that was spoken for it
 */
export interface TranslationTurn {
  text: string;
  translation: string;
}

/**
 * Streaming translation contract consumed by the relay.
 * Each call returns a fresh, single-use sequence.
 * `history` holds the leg's recent turns, oldest first.
 */
export interface Translator {
  translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    history?: readonly TranslationTurn[]
  ): AsyncIterable<TranslationFragment>;
}

/**
 * Request handed to the model client
 */
export interface CompletionStreamRequest {
  systemPrompt: string;
  history: readonly TranslationTurn[];
  userText: string;
  signal: AbortSignal;
}

/**
 * Minimal streaming chat client. Yields raw text deltas in generation order.
 */
export interface CompletionStreamClient {
  streamCompletion(request: CompletionStreamRequest): AsyncIterable<string>;
}

export enum TranslationErrorType {
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
}

/**
 * Translation service metrics
 */
export interface TranslationServiceMetrics {
  totalRequests: number;
  totalSuccesses: number;
  totalFailures: number;
  unavailableFailures: number;
  upstreamErrors: number;
  averageDurationMs: number;
}
