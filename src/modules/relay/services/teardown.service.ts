/**
 * Teardown Coordinator
 * Ends a session exactly once: notify both legs, close both handles,
 * mark CLOSED, remove from the registry. Every step is best-effort and
 * never stops the next one.
 */

import { logger } from '@/shared/utils';
import type { RelaySession } from '../models/relay-session.model';
import type { EndReason } from '../types';
import type { SessionRegistry } from './session-registry.service';

export class TeardownCoordinator {
  constructor(private readonly registry: SessionRegistry) {}

  /**
   * @returns false when the session was already draining or closed
   */
  teardown(session: RelaySession, reason: EndReason): boolean {
    const log = logger.child({ sessionId: session.sessionId });

    if (!session.beginDraining()) {
      log.debug('Teardown already in progress or complete', { state: session.state, reason });
      return false;
    }

    log.info('Tearing down session', { reason });

    const released = session.releaseChannels();

    for (const { role, channel } of released) {
      try {
        if (!channel.send({ kind: 'sessionEnd', reason })) {
          log.warn('Session end not delivered', { role, connectionId: channel.id });
        }
      } catch (error) {
        log.warn('Session end delivery failed', {
          role,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    for (const { role, channel } of released) {
      try {
        channel.close(`session ended: ${reason}`);
      } catch (error) {
        log.warn('Leg close failed', {
          role,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    session.markClosed();
    this.registry.remove(session.sessionId);

    log.info('Session closed', {
      reason,
      legsClosed: released.length,
      duration: Date.now() - session.createdAt,
    });
    return true;
  }
}
