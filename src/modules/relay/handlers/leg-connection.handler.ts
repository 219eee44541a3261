/**
 * Leg Connection Handler
 * Wires one ConversationRelay socket to a RelayDispatcher
 */

import type { WebSocket } from 'ws';
import { logger } from '@/shared/utils';
import { relayController, type RelayController } from '../controllers/relay.controller';
import type { LegRole } from '../types';
import { decodeInboundMessage, rawDataToString } from '../utils/conversation-relay.codec';
import { WebSocketLegChannel } from '../utils/websocket-leg-channel';

/**
 * @returns false when the session could not take the leg (socket is ended)
 */
export function handleLegConnection(
  ws: WebSocket,
  role: LegRole,
  sessionId: string,
  connectionId: string,
  controller: RelayController = relayController
): boolean {
  const channel = new WebSocketLegChannel(connectionId, ws);
  const dispatcher = controller.openLeg(role, sessionId, channel);

  if (!dispatcher) {
    logger.warn('Leg connection refused, session unavailable', { sessionId, role, connectionId });
    channel.send({ kind: 'sessionEnd', reason: 'session-unavailable' });
    channel.close('session unavailable');
    return false;
  }

  ws.on('message', (data, isBinary) => {
    if (isBinary) {
      logger.warn('Binary frame ignored on leg socket', { sessionId, role, connectionId });
      return;
    }
    dispatcher.receive(decodeInboundMessage(rawDataToString(data)));
  });

  ws.on('close', (code: number, reason: Buffer) => {
    logger.info('Leg socket closed', { sessionId, role, connectionId, code, reason: reason.toString() });
    dispatcher.transportClosed();
  });

  ws.on('error', (error: Error) => {
    dispatcher.transportError(error);
  });

  return true;
}
