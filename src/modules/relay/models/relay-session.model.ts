/**
 * Relay Session
 * Paired-session record and its state machine:
 *
 *   PENDING -> AWAITING_PEER -> ACTIVE -> DRAINING -> CLOSED
 *
 * Every transition is a single synchronous method, so a read-then-write
 * (check readiness, swap a handle) cannot interleave with the other leg's task.
 */

import type { TranslationTurn } from '@/modules/translation';
import {
  LEG_ROLES,
  SessionState,
  type LegChannel,
  type LegRole,
  type LegSnapshot,
  type LegStatus,
  type SessionCreateConfig,
  type SessionOrigin,
  type SessionSnapshot,
  type VoiceConfig,
} from '../types';

interface LegRecord {
  readonly role: LegRole;
  readonly language: string;
  readonly voice: VoiceConfig;
  legId?: string;
  channel?: LegChannel;
  utterances: number;
  interruptions: number;
  softErrors: number;
  lastStatus?: LegStatus;
  history: TranslationTurn[];
}

export type AttachResult =
  | {
      outcome: 'attached';
      previousState: SessionState;
      state: SessionState;
      becameActive: boolean;
      /** Handle that was closed to make room for the new one */
      replaced?: LegChannel;
    }
  | { outcome: 'rejected'; reason: 'leg-conflict' | 'session-closed' };

export interface ReleasedChannel {
  role: LegRole;
  channel: LegChannel;
}

function makeLeg(role: LegRole, language: string, provider = '', name = ''): LegRecord {
  return {
    role,
    language,
    voice: { provider, name },
    utterances: 0,
    interruptions: 0,
    softErrors: 0,
    history: [],
  };
}

export class RelaySession {
  readonly sessionId: string;
  readonly origin: SessionOrigin;
  readonly createdAt: number;

  private currentState = SessionState.PENDING;
  private lastActivityAt: number;
  private readonly legs: Record<LegRole, LegRecord>;
  private activationPromise: Promise<void> = Promise.resolve();

  constructor(sessionId: string, config: SessionCreateConfig, origin: SessionOrigin) {
    if (!config.sourceLanguage.trim() || !config.targetLanguage.trim()) {
      throw new Error('Both sourceLanguage and targetLanguage are required');
    }

    this.sessionId = sessionId;
    this.origin = origin;
    this.createdAt = Date.now();
    this.lastActivityAt = this.createdAt;
    this.legs = {
      source: makeLeg(
        'source',
        config.sourceLanguage,
        config.sourceVoiceProvider,
        config.sourceVoiceName
      ),
      target: makeLeg(
        'target',
        config.targetLanguage,
        config.targetVoiceProvider,
        config.targetVoiceName
      ),
    };
  }

  get state(): SessionState {
    return this.currentState;
  }

  get lastActivity(): number {
    return this.lastActivityAt;
  }

  get sourceLanguage(): string {
    return this.legs.source.language;
  }

  get targetLanguage(): string {
    return this.legs.target.language;
  }

  /** Resolves once the ready announcement for the current pairing has finished */
  get activation(): Promise<void> {
    return this.activationPromise;
  }

  languageOf(role: LegRole): string {
    return this.legs[role].language;
  }

  voiceOf(role: LegRole): VoiceConfig {
    return { ...this.legs[role].voice };
  }

  legIdOf(role: LegRole): string | undefined {
    return this.legs[role].legId;
  }

  /**
   * Attached handle that can still carry events
   */
  liveChannel(role: LegRole): LegChannel | undefined {
    const channel = this.legs[role].channel;
    return channel && channel.isOpen() ? channel : undefined;
  }

  isCurrentChannel(role: LegRole, channel: LegChannel): boolean {
    return this.legs[role].channel === channel;
  }

  isTerminating(): boolean {
    return this.currentState === SessionState.DRAINING || this.currentState === SessionState.CLOSED;
  }

  touch(): void {
    this.lastActivityAt = Date.now();
  }

  /**
   * Attach (or re-attach) a leg's handle.
   * A different live handle for the same leg is closed before it is replaced.
   */
  attachLeg(role: LegRole, legId: string, channel: LegChannel): AttachResult {
    if (this.isTerminating()) {
      return { outcome: 'rejected', reason: 'session-closed' };
    }

    const leg = this.legs[role];
    if (leg.legId !== undefined && leg.legId !== legId) {
      return { outcome: 'rejected', reason: 'leg-conflict' };
    }

    let replaced: LegChannel | undefined;
    if (leg.channel && leg.channel !== channel) {
      replaced = leg.channel;
      replaced.close('replaced by new connection');
    }

    leg.legId = legId;
    leg.channel = channel;

    const previousState = this.currentState;
    const bothAttached = LEG_ROLES.every((r) => this.legs[r].channel !== undefined);
    this.currentState = bothAttached ? SessionState.ACTIVE : SessionState.AWAITING_PEER;
    this.touch();

    return {
      outcome: 'attached',
      previousState,
      state: this.currentState,
      becameActive: previousState !== SessionState.ACTIVE && this.currentState === SessionState.ACTIVE,
      replaced,
    };
  }

  setActivation(activation: Promise<void>): void {
    this.activationPromise = activation;
  }

  /**
   * PENDING | AWAITING_PEER | ACTIVE -> DRAINING.
   * @returns false when teardown already started
   */
  beginDraining(): boolean {
    if (this.isTerminating()) {
      return false;
    }
    this.currentState = SessionState.DRAINING;
    return true;
  }

  /**
   * Detach every handle (DRAINING only) and hand them to the caller for closing.
   * Translation history goes with them.
   */
  releaseChannels(): ReleasedChannel[] {
    if (this.currentState !== SessionState.DRAINING) {
      return [];
    }

    const released: ReleasedChannel[] = [];
    for (const role of LEG_ROLES) {
      const leg = this.legs[role];
      leg.history = [];
      if (leg.channel) {
        released.push({ role, channel: leg.channel });
        leg.channel = undefined;
      }
    }
    return released;
  }

  /**
   * DRAINING -> CLOSED
   */
  markClosed(): boolean {
    if (this.currentState !== SessionState.DRAINING) {
      return false;
    }
    this.currentState = SessionState.CLOSED;
    return true;
  }

  recordUtterance(role: LegRole): void {
    this.legs[role].utterances++;
    this.touch();
  }

  /**
   * Remember a relayed utterance, keeping only the latest `maxTurns`
   */
  recordTurn(role: LegRole, turn: TranslationTurn, maxTurns: number): void {
    if (this.isTerminating() || maxTurns <= 0) {
      return;
    }
    const history = this.legs[role].history;
    history.push({ ...turn });
    if (history.length > maxTurns) {
      history.splice(0, history.length - maxTurns);
    }
  }

  /** Oldest first */
  historyOf(role: LegRole): readonly TranslationTurn[] {
    return this.legs[role].history.map((turn) => ({ ...turn }));
  }

  recordInterruption(role: LegRole): number {
    this.touch();
    return ++this.legs[role].interruptions;
  }

  /** @returns the leg's soft error count including this one */
  recordSoftError(role: LegRole): number {
    this.touch();
    return ++this.legs[role].softErrors;
  }

  recordStatus(role: LegRole, name: string, value: string): void {
    this.legs[role].lastStatus = { name, value, receivedAt: Date.now() };
    this.touch();
  }

  snapshot(): SessionSnapshot {
    const legSnapshot = (role: LegRole): LegSnapshot => {
      const leg = this.legs[role];
      return {
        role,
        legId: leg.legId,
        language: leg.language,
        voice: { ...leg.voice },
        connected: this.liveChannel(role) !== undefined,
        utterances: leg.utterances,
        interruptions: leg.interruptions,
        softErrors: leg.softErrors,
        lastStatus: leg.lastStatus ? { ...leg.lastStatus } : undefined,
      };
    };

    return {
      sessionId: this.sessionId,
      state: this.currentState,
      origin: this.origin,
      createdAt: this.createdAt,
      lastActivity: this.lastActivityAt,
      legs: { source: legSnapshot('source'), target: legSnapshot('target') },
    };
  }
}
