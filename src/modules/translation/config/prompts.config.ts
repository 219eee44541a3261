/**
 * Translation Prompts
 */

export const promptsConfig = {
  /**
   * System prompt for one utterance. The model must return only the
   * translation so every streamed token can be spoken as-is.
   */
  buildSystemPrompt(sourceLanguage: string, targetLanguage: string): string {
    return [
      `You are a live phone-call interpreter translating from ${sourceLanguage} to ${targetLanguage}.`,
      'Translate the caller utterance faithfully and naturally for speech.',
      'Reply with the translation only: no quotes, notes, transliterations or explanations.',
      'Keep names, numbers and addresses intact.',
    ].join(' ');
  },
} as const;
