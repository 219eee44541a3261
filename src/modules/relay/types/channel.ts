import type { OutboundEvent } from './events';

/**
 * Outbound handle for one leg's duplex connection.
 * `send` and `close` never throw and never block.
 */
export interface LegChannel {
  /** Connection id, unique per socket */
  readonly id: string;
  isOpen(): boolean;
  /** @returns false when the event could not be handed to the transport */
  send(event: OutboundEvent): boolean;
  close(reason: string): void;
}
