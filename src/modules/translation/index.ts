/**
 * Translation Module Exports
 */

export { translationService, FINAL_FRAGMENT, isSameLanguage } from './services';
export { TranslationError, classifyTranslationError, isTranslationError } from './utils/error-classifier';
export { TranslationErrorType } from './types';
export { openaiConfig, promptsConfig } from './config';
export type {
  Translator,
  TranslationFragment,
  TranslationServiceMetrics,
  CompletionStreamClient,
  CompletionStreamRequest,
  TranslationTurn,
} from './types';
