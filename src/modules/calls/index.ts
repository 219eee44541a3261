/**
 * Calls Module - Public API
 */

export { createCallsRouter } from './routes/calls.routes';
export { errorHandler, notFoundHandler, HttpErrorCode } from './middleware';
export { buildConversationRelayTwiml, buildHangupTwiml, escapeXml } from './utils';
export {
  createSessionSchema,
  statusCallbackSchema,
  isTerminalCallStatus,
  LANGUAGE_TAG_PATTERN,
} from './validation/session.schema';
