export {
  TranslationServiceClass,
  translationService,
  FINAL_FRAGMENT,
  isSameLanguage,
} from './translation.service';
export type { TranslationServiceOptions } from './translation.service';
export { OpenAIStreamClient, buildMessages } from './openai-stream.client';
