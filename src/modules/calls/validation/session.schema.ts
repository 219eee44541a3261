/**
 * Request validation for the calls API and Twilio webhooks
 */

import { z } from 'zod';

// BCP-47-like tag: primary subtag plus optional subtags (en, en-US, zh-Hant-TW)
export const LANGUAGE_TAG_PATTERN = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

const languageTag = z
  .string()
  .trim()
  .regex(LANGUAGE_TAG_PATTERN, 'Expected a language tag such as en-US');

const voiceField = z.string().trim().max(100).optional();

export const createSessionSchema = z.object({
  sourceLanguage: languageTag,
  targetLanguage: languageTag,
  sourceVoiceProvider: voiceField,
  sourceVoiceName: voiceField,
  targetVoiceProvider: voiceField,
  targetVoiceName: voiceField,
});

export type CreateSessionBody = z.infer<typeof createSessionSchema>;

// Languages for an inbound call arrive on the webhook's query string
export const inboundCallQuerySchema = z.object({
  sourceLanguage: languageTag.optional(),
  targetLanguage: languageTag.optional(),
});

export const TERMINAL_CALL_STATUSES = ['completed', 'busy', 'failed', 'no-answer', 'canceled'] as const;

export const statusCallbackSchema = z.object({
  CallSid: z.string().min(1),
  CallStatus: z.string().min(1),
});

export type StatusCallbackBody = z.infer<typeof statusCallbackSchema>;

export function isTerminalCallStatus(status: string): boolean {
  return TERMINAL_CALL_STATUSES.some((terminal) => terminal === status);
}
