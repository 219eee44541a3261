/**
 * WebSocket Configuration
 * One ConversationRelay socket per call leg: /ws/:role/:sessionId
 */

/**
 * WebSocket server configuration
 */
export const websocketConfig = {
  // Path prefix for leg sockets
  pathPrefix: '/ws',

  // ConversationRelay frames are small JSON text messages
  maxPayload: 1024 * 1024,

  perMessageDeflate: false,

  clientTracking: true,
};

/**
 * WebSocket server shutdown configuration
 */
export const websocketShutdownConfig = {
  // Timeout for graceful shutdown (milliseconds)
  shutdownTimeout: 5000,
};
