/**
 * ConversationRelay Codec
 * Twilio ConversationRelay JSON messages <-> relay events
 *
 * Inbound:  setup | prompt | interrupt | dtmf | status | info | error
 * Outbound: text | play | end
 */

import type { RawData } from 'ws';
import type { InboundEvent, OutboundEvent } from '../types';

type WireMessage = Record<string, unknown>;

function isWireMessage(data: unknown): data is WireMessage {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

function readString(message: WireMessage, key: string): string | undefined {
  const value = message[key];
  return typeof value === 'string' ? value : undefined;
}

function stringifyValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Normalize a ws frame to text
 */
export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Decode one inbound frame. Never throws: anything unusable becomes `unknown`.
 */
export function decodeInboundMessage(raw: string): InboundEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { kind: 'unknown', type: 'malformed' };
  }

  if (!isWireMessage(parsed)) {
    return { kind: 'unknown', type: 'malformed' };
  }

  const type = readString(parsed, 'type');

  switch (type) {
    case 'setup': {
      const callSid = readString(parsed, 'callSid');
      if (!callSid) {
        return { kind: 'unknown', type: 'setup.missingCallSid' };
      }
      return { kind: 'setup', legId: callSid };
    }

    case 'prompt': {
      const text = readString(parsed, 'voicePrompt') ?? '';
      if (parsed.last === false) {
        return { kind: 'partialUtterance', text };
      }
      return { kind: 'utterance', text };
    }

    case 'interrupt':
      return {
        kind: 'interruption',
        utteranceUntilInterrupt: readString(parsed, 'utteranceUntilInterrupt'),
      };

    case 'dtmf':
      return { kind: 'status', name: 'dtmf', value: readString(parsed, 'digit') ?? '' };

    case 'status':
    case 'info':
      return {
        kind: 'status',
        name: readString(parsed, 'name') ?? type,
        value: stringifyValue(parsed.value),
      };

    case 'error':
      return { kind: 'error', description: readString(parsed, 'description') ?? '' };

    default:
      return { kind: 'unknown', type: type ?? 'missing' };
  }
}

/**
 * Encode one outbound event as a ConversationRelay message
 */
export function encodeOutboundEvent(event: OutboundEvent): string {
  switch (event.kind) {
    case 'textFragment':
      return JSON.stringify({ type: 'text', token: event.text, last: event.isFinal });

    case 'sideChannelAudio':
      return JSON.stringify({
        type: 'play',
        source: event.source,
        loop: event.loop,
        preemptible: event.preemptible,
        interruptible: event.interruptible,
      });

    case 'sessionEnd':
      return JSON.stringify({ type: 'end', handoffData: JSON.stringify({ reason: event.reason }) });
  }
}
