/**
 * Relay Dispatcher
 * One instance per leg connection. Inbound events are handled strictly one at
 * a time in arrival order; translated fragments go to the counterpart leg in
 * the order the translator produced them.
 */

import { logger, type Logger } from '@/shared/utils';
import { isTranslationError, TranslationErrorType, type Translator } from '@/modules/translation';
import type { RelaySettings } from '../config';
import type { RelaySession } from '../models/relay-session.model';
import { LegEventQueue } from '../utils/leg-event-queue';
import {
  counterpartOf,
  RelayErrorCode,
  SessionState,
  type InboundEvent,
  type LegChannel,
  type LegRole,
} from '../types';
import type { ReadinessGate } from './readiness-gate.service';
import type { SessionRegistry } from './session-registry.service';
import type { TeardownCoordinator } from './teardown.service';

export interface RelayDispatcherDeps {
  registry: SessionRegistry;
  readinessGate: ReadinessGate;
  teardown: TeardownCoordinator;
  translator: Translator;
  settings: RelaySettings;
}

export class RelayDispatcher {
  private readonly queue: LegEventQueue<InboundEvent>;
  private readonly log: Logger;
  private transportEnded = false;

  constructor(
    private readonly session: RelaySession,
    readonly role: LegRole,
    private readonly channel: LegChannel,
    private readonly deps: RelayDispatcherDeps
  ) {
    this.log = logger.child({
      sessionId: session.sessionId,
      role,
      connectionId: channel.id,
    });
    this.queue = new LegEventQueue((event) => this.handle(event), deps.settings.maxQueuedEvents, this.log);
  }

  get sessionId(): string {
    return this.session.sessionId;
  }

  /**
   * Queue an inbound event
   * @returns false when the leg's task has ended or its queue is full
   */
  receive(event: InboundEvent): boolean {
    return this.queue.push(event);
  }

  /**
   * Resolves once every queued event has been handled
   */
  whenIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  /**
   * The leg's transport closed. Ends this leg's task; tears the session down
   * only when this connection is still the leg's attached handle.
   */
  transportClosed(): void {
    if (this.transportEnded) {
      return;
    }
    this.transportEnded = true;

    const dropped = this.queue.stop();
    this.log.info('Leg transport closed', { droppedEvents: dropped, code: RelayErrorCode.TRANSPORT_CLOSED });

    if (this.session.isCurrentChannel(this.role, this.channel)) {
      this.deps.teardown.teardown(this.session, 'transport-closed');
    }
  }

  /**
   * Transport-level failure on this leg's socket
   */
  transportError(error: Error): void {
    this.log.warn('Leg transport error', { error: error.message });

    if (this.session.isCurrentChannel(this.role, this.channel)) {
      this.deps.teardown.teardown(this.session, 'escalated-error');
    }
  }

  private async handle(event: InboundEvent): Promise<void> {
    if (this.session.isTerminating()) {
      this.log.debug('Session ending, event ignored', { kind: event.kind });
      return;
    }

    // Only the leg's attached handle speaks for the leg; other connections must set up first
    if (event.kind !== 'setup' && !this.session.isCurrentChannel(this.role, this.channel)) {
      this.log.warn('Event from a connection that is not the attached leg, ignored', { kind: event.kind });
      return;
    }

    switch (event.kind) {
      case 'setup':
        await this.handleSetup(event.legId);
        return;

      case 'utterance':
        await this.handleUtterance(event.text);
        return;

      case 'partialUtterance':
        this.log.debug('Partial utterance ignored', { length: event.text.length });
        return;

      case 'interruption': {
        const count = this.session.recordInterruption(this.role);
        this.log.info('Leg interrupted playback', {
          interruptions: count,
          heard: event.utteranceUntilInterrupt,
        });
        return;
      }

      case 'status':
        this.session.recordStatus(this.role, event.name, event.value);
        this.log.info('Leg status', { name: event.name, value: event.value });
        return;

      case 'error':
        this.handleLegError(event.description);
        return;

      case 'unknown':
        this.log.warn('Unknown leg event ignored', {
          type: event.type,
          code: RelayErrorCode.UNKNOWN_EVENT,
        });
        return;
    }
  }

  private async handleSetup(legId: string): Promise<void> {
    const result = this.session.attachLeg(this.role, legId, this.channel);

    if (result.outcome === 'rejected') {
      this.log.warn('Leg setup rejected', { legId, reason: result.reason });
      this.queue.stop();
      this.channel.send({
        kind: 'sessionEnd',
        reason: result.reason === 'leg-conflict' ? 'leg-conflict' : 'session-unavailable',
      });
      this.channel.close(result.reason);
      return;
    }

    this.deps.registry.indexLeg(this.session.sessionId, legId);
    this.log.info('Leg attached', {
      legId,
      state: result.state,
      replacedConnection: result.replaced?.id,
    });

    await this.deps.readinessGate.evaluate(this.session, this.role, result);
  }

  private async handleUtterance(rawText: string): Promise<void> {
    const text = rawText.trim();
    if (!text) {
      this.log.debug('Empty utterance ignored');
      return;
    }

    this.session.recordUtterance(this.role);
    const counterpart = counterpartOf(this.role);

    if (!this.isRelayable(counterpart)) {
      this.discardNotReady(text);
      return;
    }

    await this.session.activation;

    // The peer may have left while the ready announcement was playing
    if (!this.isRelayable(counterpart)) {
      this.discardNotReady(text);
      return;
    }

    await this.relay(text, counterpart);
  }

  private isRelayable(counterpart: LegRole): boolean {
    return (
      this.session.state === SessionState.ACTIVE &&
      this.session.liveChannel(counterpart) !== undefined
    );
  }

  private discardNotReady(text: string): void {
    this.log.info('Utterance discarded, peer not ready', {
      state: this.session.state,
      length: text.length,
      code: RelayErrorCode.PEER_NOT_READY,
    });
    if (this.session.state === SessionState.AWAITING_PEER) {
      this.deps.readinessGate.sendWaiting(this.session, this.role);
    }
  }

  /**
   * Translate one utterance and stream it to the counterpart.
   * The processing cue goes to this leg right after the request is issued.
   */
  private async relay(text: string, counterpart: LegRole): Promise<void> {
    const startedAt = Date.now();
    const fragments = this.deps.translator
      .translate(
        text,
        this.session.languageOf(this.role),
        this.session.languageOf(counterpart),
        this.session.historyOf(this.role)
      )
      [Symbol.asyncIterator]();

    // Calling next() starts the upstream request
    let pending = fragments.next();
    this.sendProcessingCue();

    let forwarded = 0;
    let discarded = 0;
    let finalForwarded = false;
    let translation = '';

    try {
      while (true) {
        const result = await pending;
        if (result.done) {
          break;
        }

        const fragment = result.value;
        const target = this.session.liveChannel(counterpart);
        if (target && target.send({ kind: 'textFragment', text: fragment.text, isFinal: fragment.isFinal })) {
          forwarded++;
          finalForwarded = fragment.isFinal;
          translation += fragment.text;
        } else {
          discarded++;
        }

        pending = fragments.next();
      }
    } catch (error) {
      this.handleTranslationFailure(error, counterpart, forwarded > 0 && !finalForwarded);
      return;
    }

    if (discarded > 0) {
      this.log.info('Translated fragments discarded, counterpart gone', {
        forwarded,
        discarded,
        code: RelayErrorCode.TRANSPORT_CLOSED,
      });
      return;
    }

    if (translation.trim()) {
      this.session.recordTurn(
        this.role,
        { text, translation: translation.trim() },
        this.deps.settings.historyTurns
      );
    }

    this.log.debug('Utterance relayed', { fragments: forwarded, durationMs: Date.now() - startedAt });
  }

  private sendProcessingCue(): void {
    const own = this.session.liveChannel(this.role);
    if (!own) {
      return;
    }
    own.send({
      kind: 'sideChannelAudio',
      source: this.deps.settings.processingAudioUrl,
      loop: 1,
      preemptible: true,
      interruptible: true,
    });
  }

  private handleTranslationFailure(error: unknown, counterpart: LegRole, turnOpen: boolean): void {
    if (isTranslationError(error)) {
      this.log.warn('Translation failed, utterance dropped', {
        code:
          error.type === TranslationErrorType.UPSTREAM_UNAVAILABLE
            ? RelayErrorCode.UPSTREAM_UNAVAILABLE
            : RelayErrorCode.UPSTREAM_ERROR,
        error: error.message,
      });
    } else {
      this.log.error('Unexpected relay failure, utterance dropped', error);
    }

    // Close the counterpart's speech turn if part of it already went out
    if (turnOpen) {
      this.session.liveChannel(counterpart)?.send({ kind: 'textFragment', text: '', isFinal: true });
    }
  }

  private handleLegError(description: string): void {
    const count = this.session.recordSoftError(this.role);
    const transportDown = !this.channel.isOpen();

    this.log.warn('Leg reported error', { description, softErrors: count, transportDown });

    if (count >= this.deps.settings.maxSoftErrors || transportDown) {
      this.log.error('Leg errors escalated to teardown', {
        softErrors: count,
        maxSoftErrors: this.deps.settings.maxSoftErrors,
        transportDown,
      });
      this.deps.teardown.teardown(this.session, 'escalated-error');
    }
  }
}
