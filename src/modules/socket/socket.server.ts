/**
 * Native WebSocket Server Initialization
 * One ConversationRelay socket per call leg, routed by path: /ws/:role/:sessionId
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HTTPServer, IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import { logger, generateId } from '@/shared/utils';
import { websocketShutdownConfig, websocketConfig } from '@/shared/config';
import { handleLegConnection, isLegRole, relayController, type RegistryStats } from '@/modules/relay';
import type { LegRoute, LegRouteResult } from './types';
import { WebSocketUtils } from './utils';

/**
 * Parse `/ws/:role/:sessionId`
 */
export function parseLegRoute(url: string | undefined): LegRouteResult {
  const badRequest: LegRouteResult = { ok: false, status: 400, message: 'Bad Request' };

  let pathname: string;
  try {
    ({ pathname } = new URL(url ?? '/', 'http://localhost'));
  } catch {
    return badRequest;
  }

  const segments = pathname.split('/').filter((segment) => segment.length > 0);
  const prefix = websocketConfig.pathPrefix.replace(/^\/+|\/+$/g, '');

  if (segments[0] !== prefix) {
    return { ok: false, status: 404, message: 'Not Found' };
  }

  const [, role, encodedId, ...rest] = segments;
  if (!role || !encodedId || rest.length > 0 || !isLegRole(role)) {
    return badRequest;
  }

  let sessionId: string;
  try {
    sessionId = decodeURIComponent(encodedId);
  } catch {
    // Malformed percent-encoding
    return badRequest;
  }

  return { ok: true, route: { role, sessionId } };
}

/**
 * Initialize WebSocket server on the shared HTTP server
 */
export function initializeSocketServer(httpServer: HTTPServer): WebSocketServer {
  logger.info('Initializing ConversationRelay WebSocket server');

  const wss = new WebSocketServer({
    noServer: true,
    maxPayload: websocketConfig.maxPayload,
    perMessageDeflate: websocketConfig.perMessageDeflate,
    clientTracking: websocketConfig.clientTracking,
  });

  httpServer.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const parsed = parseLegRoute(request.url);
    if (!parsed.ok) {
      logger.warn('WebSocket upgrade refused', { url: request.url, status: parsed.status });
      WebSocketUtils.rejectUpgrade(socket, parsed.status, parsed.message);
      return;
    }

    if (!relayController.canAcceptLeg(parsed.route.sessionId)) {
      logger.warn('WebSocket upgrade refused, unknown or retired session', {
        sessionId: parsed.route.sessionId,
        role: parsed.route.role,
      });
      WebSocketUtils.rejectUpgrade(socket, 404, 'Not Found');
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
      handleConnection(ws, request, parsed.route);
    });
  });

  wss.on('error', (error: Error) => {
    logger.error('WebSocket server error', error);
  });

  logger.info('WebSocket server initialized successfully');

  return wss;
}

/**
 * Handle new leg connection
 */
function handleConnection(ws: WebSocket, request: IncomingMessage, route: LegRoute): void {
  const connectionId = generateId();

  logger.info('Leg connected', {
    connectionId,
    sessionId: route.sessionId,
    role: route.role,
    clientIP: request.socket.remoteAddress || 'unknown',
  });

  handleLegConnection(ws, route.role, route.sessionId, connectionId);
}

/**
 * Get socket server statistics
 * Exposed for health checks and monitoring
 */
export function getSocketStats(wss: WebSocketServer): {
  totalConnections: number;
  activeSessions: number;
  sessionStats: RegistryStats;
} {
  const sessionStats = relayController.getStats();

  return {
    totalConnections: wss.clients.size,
    activeSessions: sessionStats.active,
    sessionStats,
  };
}

/**
 * Graceful shutdown for WebSocket server.
 * Sessions are torn down first so every leg gets its end message.
 */
export async function shutdownSocketServer(wss: WebSocketServer): Promise<void> {
  logger.info('Shutting down WebSocket server');

  relayController.shutdown();

  return new Promise((resolve) => {
    let settled = false;
    const finish = (message: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(forceTimer);
      wss.close(() => {
        logger.info(message);
        resolve();
      });
    };

    const closePromises: Promise<void>[] = [];
    wss.clients.forEach((ws) => {
      closePromises.push(
        new Promise<void>((closeResolve) => {
          if (ws.readyState === WebSocket.CLOSED) {
            closeResolve();
            return;
          }
          ws.once('close', () => closeResolve());
          WebSocketUtils.safeClose(ws, 'server shutdown', 1001);
        })
      );
    });

    // Force close after timeout
    const forceTimer = setTimeout(() => {
      wss.clients.forEach((ws) => ws.terminate());
      finish('WebSocket server force closed after timeout');
    }, websocketShutdownConfig.shutdownTimeout);

    void Promise.all(closePromises).then(() => finish('WebSocket server closed'));
  });
}
