/**
 * WebSocket utility functions for safe operations
 */

import { WebSocket } from 'ws';
import type { Duplex } from 'stream';
import { logger } from '@/shared/utils';

// ws rejects close reasons longer than 123 bytes
const MAX_CLOSE_REASON_BYTES = 123;

export class WebSocketUtils {
  /**
   * Safely close a WebSocket connection with error handling
   */
  static safeClose(ws: WebSocket | undefined, label: string, code = 1000): void {
    if (!ws) return;
    if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return;

    try {
      ws.close(code, Buffer.from(label).subarray(0, MAX_CLOSE_REASON_BYTES).toString());
    } catch (error) {
      logger.warn(`Error closing ${label} WebSocket`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Check if WebSocket is in a state where it can send messages
   */
  static canSend(ws: WebSocket | undefined): ws is WebSocket {
    return ws !== undefined && ws.readyState === WebSocket.OPEN;
  }

  /**
   * Safely send data over WebSocket with error handling
   */
  static safeSend(ws: WebSocket | undefined, data: string | Buffer, label: string): boolean {
    if (!this.canSend(ws)) {
      logger.warn(`Cannot send to ${label} WebSocket - not open`);
      return false;
    }

    try {
      ws.send(data);
      return true;
    } catch (error) {
      logger.error(`Error sending to ${label} WebSocket`, error);
      return false;
    }
  }

  /**
   * Answer a refused upgrade with a plain HTTP status and drop the socket
   */
  static rejectUpgrade(socket: Duplex, status: number, message: string): void {
    try {
      socket.once('finish', () => socket.destroy());
      socket.end(`HTTP/1.1 ${status} ${message}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
    } catch (error) {
      logger.debug('Failed to write upgrade rejection', {
        error: error instanceof Error ? error.message : String(error),
      });
      socket.destroy();
    }
  }
}
