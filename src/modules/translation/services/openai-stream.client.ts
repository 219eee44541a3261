/**
 * OpenAI Stream Client
 * Thin wrapper over chat.completions streaming; yields content deltas only
 */

import OpenAI from 'openai';
import { logger } from '@/shared/utils';
import { openaiConfig } from '../config';
import type { CompletionStreamClient, CompletionStreamRequest, TranslationTurn } from '../types';

/**
 * Earlier turns replayed as user/assistant pairs ahead of the new utterance
 */
export function buildMessages(
  systemPrompt: string,
  history: readonly TranslationTurn[],
  userText: string
): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [{ role: 'system', content: systemPrompt }];
  for (const turn of history) {
    messages.push({ role: 'user', content: turn.text });
    messages.push({ role: 'assistant', content: turn.translation });
  }
  messages.push({ role: 'user', content: userText });
  return messages;
}

export class OpenAIStreamClient implements CompletionStreamClient {
  private client?: OpenAI;

  /**
   * The SDK client is built on first use so that importing the module
   * never requires an API key.
   */
  private getClient(): OpenAI {
    if (!this.client) {
      openaiConfig.validate();
      this.client = new OpenAI({
        apiKey: openaiConfig.apiKey,
        organization: openaiConfig.organization,
        timeout: openaiConfig.requestTimeout,
        maxRetries: 0,
      });
      logger.info('OpenAI translation client initialized', {
        model: openaiConfig.model,
        temperature: openaiConfig.temperature,
      });
    }
    return this.client;
  }

  async *streamCompletion(request: CompletionStreamRequest): AsyncGenerator<string> {
    const stream = await this.getClient().chat.completions.create(
      {
        model: openaiConfig.model,
        messages: buildMessages(request.systemPrompt, request.history, request.userText),
        temperature: openaiConfig.temperature,
        max_tokens: openaiConfig.maxTokens,
        stream: true,
      },
      { signal: request.signal }
    );

    for await (const chunk of stream) {
      const content = chunk.choices[0]?.delta?.content;
      if (content) {
        yield content;
      }
    }
  }
}
