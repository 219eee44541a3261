/**
 * LegChannel over a ConversationRelay WebSocket
 */

import type { WebSocket } from 'ws';
import { WebSocketUtils } from '@/modules/socket/utils/WebSocketUtils';
import type { LegChannel, OutboundEvent } from '../types';
import { encodeOutboundEvent } from './conversation-relay.codec';

export class WebSocketLegChannel implements LegChannel {
  constructor(
    readonly id: string,
    private readonly ws: WebSocket
  ) {}

  isOpen(): boolean {
    return WebSocketUtils.canSend(this.ws);
  }

  send(event: OutboundEvent): boolean {
    return WebSocketUtils.safeSend(this.ws, encodeOutboundEvent(event), `leg ${this.id} ${event.kind}`);
  }

  close(reason: string): void {
    WebSocketUtils.safeClose(this.ws, reason);
  }
}
