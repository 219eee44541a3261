export { escapeXml, buildConversationRelayTwiml, buildHangupTwiml } from './twiml';
export type { ConversationRelayTwimlOptions } from './twiml';
export { resolvePublicHost, buildLegUrls } from './urls';
export type { LegUrls } from './urls';
