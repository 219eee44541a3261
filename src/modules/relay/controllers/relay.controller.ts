/**
 * Relay Controller
 * Public API of the relay module, used by the socket server and the HTTP routes
 */

import { logger } from '@/shared/utils';
import { translationService, type Translator } from '@/modules/translation';
import { relayConfig, type RelaySettings } from '../config';
import { RelayDispatcher } from '../services/relay-dispatcher.service';
import { ReadinessGate } from '../services/readiness-gate.service';
import { SessionRegistry, sessionRegistry } from '../services/session-registry.service';
import { TeardownCoordinator } from '../services/teardown.service';
import type {
  EndReason,
  LegChannel,
  LegRole,
  RegistryStats,
  SessionCreateConfig,
  SessionOrigin,
  SessionSnapshot,
} from '../types';

export interface RelayControllerDeps {
  registry: SessionRegistry;
  translator: Translator;
  settings: RelaySettings;
}

export class RelayController {
  private readonly registry: SessionRegistry;
  readonly settings: RelaySettings;
  private readonly teardownCoordinator: TeardownCoordinator;
  private readonly readinessGate: ReadinessGate;
  private readonly translator: Translator;
  private sweepTimer?: NodeJS.Timeout;

  constructor(deps: RelayControllerDeps) {
    this.registry = deps.registry;
    this.settings = deps.settings;
    this.translator = deps.translator;
    this.teardownCoordinator = new TeardownCoordinator(deps.registry);
    this.readinessGate = new ReadinessGate(deps.translator, deps.settings);
  }

  /**
   * Create a session with full configuration (dual-outbound or inbound-call)
   * @returns the new sessionId
   */
  createSession(config: SessionCreateConfig, origin: SessionOrigin = 'dual-outbound'): string {
    return this.registry.create(config, origin).sessionId;
  }

  /**
   * Whether a leg socket naming this session should be upgraded
   */
  canAcceptLeg(sessionId: string): boolean {
    return this.registry.accepts(sessionId);
  }

  /**
   * Bind a freshly connected leg to its session (created on first contact).
   * The leg's handle is attached once its setup event arrives.
   */
  openLeg(role: LegRole, sessionId: string, channel: LegChannel): RelayDispatcher | undefined {
    const resolved = this.registry.attachOnFirstContact(sessionId, {
      sourceLanguage: this.settings.defaultSourceLanguage,
      targetLanguage: this.settings.defaultTargetLanguage,
    });
    if (!resolved) {
      return undefined;
    }

    logger.info('Leg connection opened', {
      sessionId,
      role,
      connectionId: channel.id,
      createdOnFirstContact: resolved.created,
    });

    return new RelayDispatcher(resolved.session, role, channel, {
      registry: this.registry,
      readinessGate: this.readinessGate,
      teardown: this.teardownCoordinator,
      translator: this.translator,
      settings: this.settings,
    });
  }

  /**
   * Explicit end of a session
   * @returns false when no such session exists
   */
  endSession(sessionId: string, reason: EndReason = 'terminated'): boolean {
    const session = this.registry.get(sessionId);
    if (!session) {
      return false;
    }
    this.teardownCoordinator.teardown(session, reason);
    return true;
  }

  /**
   * End the session owning an external leg id (e.g. a Twilio CallSid)
   */
  endSessionByLegId(legId: string, reason: EndReason = 'call-ended'): boolean {
    const session = this.registry.getByLegId(legId);
    if (!session) {
      return false;
    }
    this.teardownCoordinator.teardown(session, reason);
    return true;
  }

  getSession(sessionId: string): SessionSnapshot | undefined {
    return this.registry.get(sessionId)?.snapshot();
  }

  listSessions(): SessionSnapshot[] {
    return this.registry.getAllSessions().map((session) => session.snapshot());
  }

  getStats(): RegistryStats {
    return this.registry.getStats();
  }

  /**
   * Tear down sessions idle past the configured timeout
   * @returns number of sessions torn down
   */
  sweepExpired(now: number = Date.now()): number {
    const expired = this.registry.collectExpired(this.settings.sessionIdleTimeout, now);
    expired.forEach((session) => this.teardownCoordinator.teardown(session, 'idle-timeout'));

    if (expired.length > 0) {
      logger.info('Cleaned up idle sessions', { count: expired.length });
    }
    return expired.length;
  }

  startExpirySweep(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweepExpired();
    }, this.settings.cleanupInterval);
    this.sweepTimer.unref();

    logger.debug('Session expiry sweep started', { interval: this.settings.cleanupInterval });
  }

  stopExpirySweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
      logger.debug('Session expiry sweep stopped');
    }
  }

  /**
   * End every session (graceful shutdown)
   */
  shutdown(): number {
    this.stopExpirySweep();
    const sessions = this.registry.getAllSessions();
    sessions.forEach((session) => this.teardownCoordinator.teardown(session, 'shutdown'));
    logger.info('Relay shutdown complete', { sessionsEnded: sessions.length });
    return sessions.length;
  }
}

// Export singleton instance
export const relayController = new RelayController({
  registry: sessionRegistry,
  translator: translationService,
  settings: relayConfig,
});
