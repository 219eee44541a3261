/**
 * OpenAI API Configuration
 * Model, temperature, timeout and deadline for streamed translations
 */

export const openaiConfig = {
  // Model configuration
  model: process.env.TRANSLATION_MODEL || 'gpt-4o',
  temperature: parseFloat(process.env.TRANSLATION_TEMPERATURE || '0.2'),
  maxTokens: parseInt(process.env.TRANSLATION_MAX_TOKENS || '500', 10),

  // API configuration
  apiKey: process.env.OPENAI_API_KEY || '',
  organization: process.env.OPENAI_ORGANIZATION || undefined,
  requestTimeout: parseInt(process.env.TRANSLATION_REQUEST_TIMEOUT_MS || '10000', 10), // 10s

  // Upper bound for a whole streamed translation, first token to last
  streamDeadline: parseInt(process.env.TRANSLATION_STREAM_DEADLINE_MS || '20000', 10), // 20s

  /**
   * Validate configuration
   */
  validate(): void {
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY is required in environment variables');
    }
    if (this.temperature < 0 || this.temperature > 2) {
      throw new Error('TRANSLATION_TEMPERATURE must be between 0 and 2');
    }
    if (this.maxTokens < 1 || this.maxTokens > 4096) {
      throw new Error('TRANSLATION_MAX_TOKENS must be between 1 and 4096');
    }
    if (!(this.streamDeadline > 0)) {
      throw new Error('TRANSLATION_STREAM_DEADLINE_MS must be a positive number');
    }
  },
} as const;
