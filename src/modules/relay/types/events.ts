/**
 * Relay Event Types
 * Internal event model; the ConversationRelay wire format lives in the codec.
 */

// ============================================================================
// Inbound (leg -> relay)
// ============================================================================

export interface SetupEvent {
  kind: 'setup';
  legId: string;
}

export interface UtteranceEvent {
  kind: 'utterance';
  text: string;
}

/** Incremental transcript; only complete utterances are translated */
export interface PartialUtteranceEvent {
  kind: 'partialUtterance';
  text: string;
}

export interface StatusEvent {
  kind: 'status';
  name: string;
  value: string;
}

export interface InterruptionEvent {
  kind: 'interruption';
  utteranceUntilInterrupt?: string;
}

export interface LegErrorEvent {
  kind: 'error';
  description: string;
}

export interface UnknownEvent {
  kind: 'unknown';
  type: string;
}

export type InboundEvent =
  | SetupEvent
  | UtteranceEvent
  | PartialUtteranceEvent
  | StatusEvent
  | InterruptionEvent
  | LegErrorEvent
  | UnknownEvent;

// ============================================================================
// Outbound (relay -> leg)
// ============================================================================

export interface TextFragmentEvent {
  kind: 'textFragment';
  text: string;
  isFinal: boolean;
}

export interface SideChannelAudioEvent {
  kind: 'sideChannelAudio';
  source: string;
  loop: number;
  preemptible: boolean;
  interruptible: boolean;
}

export interface SessionEndEvent {
  kind: 'sessionEnd';
  reason: EndReason;
}

export type OutboundEvent = TextFragmentEvent | SideChannelAudioEvent | SessionEndEvent;

// ============================================================================
// Reasons and codes
// ============================================================================

export type EndReason =
  | 'transport-closed'
  | 'escalated-error'
  | 'terminated'
  | 'call-ended'
  | 'idle-timeout'
  | 'shutdown'
  | 'leg-conflict'
  | 'session-unavailable';

/**
 * Relay error taxonomy. None of these is ever sent to a leg;
 * they only tag log lines and metrics.
 */
export enum RelayErrorCode {
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  PEER_NOT_READY = 'PEER_NOT_READY',
  TRANSPORT_CLOSED = 'TRANSPORT_CLOSED',
  UNKNOWN_EVENT = 'UNKNOWN_EVENT',
}
