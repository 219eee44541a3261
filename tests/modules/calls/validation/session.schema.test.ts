/**
 * Calls Validation Tests
 */

import { describe, it, expect } from 'vitest';
import { createSessionSchema, isTerminalCallStatus, statusCallbackSchema } from '@/modules/calls';

describe('createSessionSchema', () => {
  it('should accept language tags and optional voices', () => {
    const parsed = createSessionSchema.parse({
      sourceLanguage: ' en-US ',
      targetLanguage: 'zh-Hant-TW',
      targetVoiceName: 'voice-2',
    });

    expect(parsed).toEqual({ sourceLanguage: 'en-US', targetLanguage: 'zh-Hant-TW', targetVoiceName: 'voice-2' });
  });

  it('should reject missing or malformed languages', () => {
    const missing = createSessionSchema.safeParse({ sourceLanguage: 'en-US' });
    const malformed = createSessionSchema.safeParse({ sourceLanguage: 'english', targetLanguage: 'es-ES' });

    expect(missing.success).toBe(false);
    expect(missing.error?.issues.map((issue) => issue.path)).toEqual([['targetLanguage']]);
    expect(malformed.success).toBe(false);
    expect(malformed.error?.issues.map((issue) => issue.path)).toEqual([['sourceLanguage']]);
  });
});

describe('status callbacks', () => {
  it('should require a call sid and status', () => {
    expect(statusCallbackSchema.safeParse({ CallSid: 'CA1', CallStatus: 'completed' }).success).toBe(true);
    expect(statusCallbackSchema.safeParse({ CallStatus: 'completed' }).success).toBe(false);
  });

  it('should recognise terminal call statuses', () => {
    expect(['completed', 'busy', 'failed', 'no-answer', 'canceled'].every(isTerminalCallStatus)).toBe(true);
    expect(isTerminalCallStatus('in-progress')).toBe(false);
    expect(isTerminalCallStatus('ringing')).toBe(false);
  });
});
