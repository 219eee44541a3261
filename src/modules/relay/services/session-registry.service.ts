/**
 * Session Registry
 * Sole owner of relay sessions: creates them, looks them up, removes them exactly once.
 * Registry operations are synchronous Map updates and never do per-session work.
 */

import { generateId, isGeneratedId, logger } from '@/shared/utils';
import { relayConfig } from '../config';
import { RelaySession } from '../models/relay-session.model';
import {
  SessionState,
  type RegistryStats,
  type SessionCreateConfig,
  type SessionOrigin,
} from '../types';

export class SessionRegistry {
  private sessions: Map<string, RelaySession> = new Map();
  private legIndex: Map<string, string> = new Map(); // legId -> sessionId
  private retiredIds: Set<string> = new Set();

  constructor(private readonly retiredIdLimit: number = relayConfig.retiredIdLimit) {}

  /**
   * Create a session with full configuration
   */
  create(config: SessionCreateConfig, origin: SessionOrigin): RelaySession {
    return this.insert(generateId(), config, origin);
  }

  /**
   * Resolve the session a connecting leg names, creating it on first contact.
   * Returns undefined for ids that are malformed, retired or already tearing down.
   */
  attachOnFirstContact(
    sessionId: string,
    defaults: SessionCreateConfig
  ): { session: RelaySession; created: boolean } | undefined {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing.isTerminating() ? undefined : { session: existing, created: false };
    }

    if (!this.canCreate(sessionId)) {
      logger.warn('Refusing first-contact session id', {
        sessionId,
        retired: this.retiredIds.has(sessionId),
      });
      return undefined;
    }

    return { session: this.insert(sessionId, defaults, 'first-contact'), created: true };
  }

  /**
   * Whether a leg naming this id would be attached (existing live session or a fresh id)
   */
  accepts(sessionId: string): boolean {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return !existing.isTerminating();
    }
    return this.canCreate(sessionId);
  }

  get(sessionId: string): RelaySession | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  getByLegId(legId: string): RelaySession | undefined {
    const sessionId = this.legIndex.get(legId);
    return sessionId ? this.sessions.get(sessionId) : undefined;
  }

  indexLeg(sessionId: string, legId: string): void {
    if (!this.sessions.has(sessionId)) {
      return;
    }
    this.legIndex.set(legId, sessionId);
  }

  isRetired(sessionId: string): boolean {
    return this.retiredIds.has(sessionId);
  }

  /**
   * Remove a session and retire its id. Only the first call for an id has an effect.
   */
  remove(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    this.sessions.delete(sessionId);
    for (const [legId, owner] of this.legIndex) {
      if (owner === sessionId) {
        this.legIndex.delete(legId);
      }
    }
    this.retire(sessionId);

    logger.info('Session removed from registry', {
      sessionId,
      duration: Date.now() - session.createdAt,
      remaining: this.sessions.size,
    });
    return true;
  }

  getAllSessions(): RelaySession[] {
    return Array.from(this.sessions.values());
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Sessions idle for longer than the timeout (not already tearing down)
   */
  collectExpired(idleTimeout: number, now: number = Date.now()): RelaySession[] {
    return this.getAllSessions().filter(
      (session) => !session.isTerminating() && now - session.lastActivity > idleTimeout
    );
  }

  getStats(): RegistryStats {
    const stats: RegistryStats = {
      total: this.sessions.size,
      pending: 0,
      awaitingPeer: 0,
      active: 0,
      draining: 0,
      retired: this.retiredIds.size,
    };

    for (const session of this.sessions.values()) {
      switch (session.state) {
        case SessionState.PENDING:
          stats.pending++;
          break;
        case SessionState.AWAITING_PEER:
          stats.awaitingPeer++;
          break;
        case SessionState.ACTIVE:
          stats.active++;
          break;
        case SessionState.DRAINING:
          stats.draining++;
          break;
      }
    }

    return stats;
  }

  private canCreate(sessionId: string): boolean {
    return isGeneratedId(sessionId) && !this.retiredIds.has(sessionId);
  }

  private insert(
    sessionId: string,
    config: SessionCreateConfig,
    origin: SessionOrigin
  ): RelaySession {
    if (this.sessions.has(sessionId) || this.retiredIds.has(sessionId)) {
      throw new Error(`Session id already used: ${sessionId}`);
    }

    const session = new RelaySession(sessionId, config, origin);
    this.sessions.set(sessionId, session);

    logger.info('Session created', {
      sessionId,
      origin,
      sourceLanguage: session.sourceLanguage,
      targetLanguage: session.targetLanguage,
    });

    return session;
  }

  private retire(sessionId: string): void {
    this.retiredIds.add(sessionId);
    // Sets iterate in insertion order, so the first entry is the oldest
    while (this.retiredIdLimit > 0 && this.retiredIds.size > this.retiredIdLimit) {
      const oldest = this.retiredIds.values().next();
      if (oldest.done) {
        break;
      }
      this.retiredIds.delete(oldest.value);
    }
  }
}

// Export singleton instance
export const sessionRegistry = new SessionRegistry();
