/**
 * Socket Module - Public API
 *
 * This is the public interface for the socket module.
 * Only export what other modules should use.
 */

// Server initialization and stats
export {
  initializeSocketServer,
  shutdownSocketServer,
  getSocketStats,
  parseLegRoute,
} from './socket.server';

export type { LegRoute, LegRouteResult } from './types';
