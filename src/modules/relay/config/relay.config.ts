/**
 * Relay Configuration
 * Defaults for first-contact sessions, side-channel audio, readiness template and limits
 */

export const relayConfig = {
  // Languages for sessions created by a leg connecting first
  defaultSourceLanguage: process.env.RELAY_DEFAULT_SOURCE_LANGUAGE || 'en-US',
  defaultTargetLanguage: process.env.RELAY_DEFAULT_TARGET_LANGUAGE || 'es-ES',

  // Looped for a leg waiting on its peer
  holdAudioUrl:
    process.env.RELAY_HOLD_AUDIO_URL ||
    'http://com.twilio.sounds.music.s3.amazonaws.com/MARKOVICHAMP-Borghestral.mp3',

  // Played once to the speaking leg while its translation is in flight
  processingAudioUrl: process.env.RELAY_PROCESSING_AUDIO_URL || 'https://api.twilio.com/cowbell.mp3',

  // Announced to both legs when the pair completes, translated per leg
  readyTemplate:
    process.env.RELAY_READY_TEMPLATE ||
    'You are now connected. Your words will be translated for the other person.',
  templateLanguage: process.env.RELAY_TEMPLATE_LANGUAGE || 'en-US',

  // Leg errors per leg that tear the session down; the first is soft, a repeat escalates
  maxSoftErrors: parseInt(process.env.RELAY_MAX_SOFT_ERRORS || '2', 10),

  // Recent utterance/translation pairs per leg sent along as context (0 = none)
  historyTurns: parseInt(process.env.RELAY_HISTORY_TURNS || '6', 10),

  // Pending inbound events per leg (0 = unlimited)
  maxQueuedEvents: parseInt(process.env.RELAY_MAX_QUEUED_EVENTS || '32', 10),

  // Sessions without activity are torn down after this long
  sessionIdleTimeout: parseInt(process.env.RELAY_SESSION_IDLE_TIMEOUT_MS || '600000', 10), // 10 min
  cleanupInterval: parseInt(process.env.RELAY_CLEANUP_INTERVAL_MS || '60000', 10), // 1 min

  // Retired session ids remembered so they are never handed out again
  retiredIdLimit: parseInt(process.env.RELAY_RETIRED_ID_LIMIT || '10000', 10),

  /**
   * Validate configuration
   */
  validate(): void {
    if (!this.defaultSourceLanguage || !this.defaultTargetLanguage) {
      throw new Error('RELAY_DEFAULT_SOURCE_LANGUAGE and RELAY_DEFAULT_TARGET_LANGUAGE must be set');
    }
    if (!(this.maxSoftErrors >= 1)) {
      throw new Error('RELAY_MAX_SOFT_ERRORS must be at least 1');
    }
    if (!(this.historyTurns >= 0)) {
      throw new Error('RELAY_HISTORY_TURNS must be 0 or more');
    }
    if (!(this.maxQueuedEvents >= 0)) {
      throw new Error('RELAY_MAX_QUEUED_EVENTS must be 0 or more');
    }
    if (!(this.sessionIdleTimeout > 0) || !(this.cleanupInterval > 0)) {
      throw new Error('RELAY_SESSION_IDLE_TIMEOUT_MS and RELAY_CLEANUP_INTERVAL_MS must be positive');
    }
  },
} as const;

export type RelaySettings = Omit<typeof relayConfig, 'validate'>;
