export { LegEventQueue } from './leg-event-queue';
export { decodeInboundMessage, encodeOutboundEvent, rawDataToString } from './conversation-relay.codec';
export { WebSocketLegChannel } from './websocket-leg-channel';
