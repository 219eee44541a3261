/**
 * TwiML builders for ConversationRelay legs
 */

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export interface ConversationRelayTwimlOptions {
  relayUrl: string;
  language: string;
  ttsProvider?: string;
  voice?: string;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildConversationRelayTwiml(options: ConversationRelayTwimlOptions): string {
  const attributes: [string, string | undefined][] = [
    ['url', options.relayUrl],
    ['language', options.language],
    ['ttsProvider', options.ttsProvider],
    ['voice', options.voice],
  ];

  // Empty voice settings fall back to the ConversationRelay defaults
  const rendered = attributes
    .filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].length > 0)
    .map(([name, value]) => `${name}="${escapeXml(value)}"`)
    .join(' ');

  return `${XML_DECLARATION}<Response><Connect><ConversationRelay ${rendered}/></Connect></Response>`;
}

export function buildHangupTwiml(): string {
  return `${XML_DECLARATION}<Response><Hangup/></Response>`;
}
