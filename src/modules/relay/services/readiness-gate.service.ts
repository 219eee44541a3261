/**
 * Readiness Gate
 * Decides, on every attach, whether the pair is complete and tells the legs:
 * - a lone leg hears hold audio instead of an error
 * - when the second leg lands, each leg gets the ready announcement in its own language
 */

import { logger } from '@/shared/utils';
import { FINAL_FRAGMENT, type Translator } from '@/modules/translation';
import type { RelaySettings } from '../config';
import type { AttachResult, RelaySession } from '../models/relay-session.model';
import { LEG_ROLES, SessionState, type LegChannel, type LegRole } from '../types';

type Attached = Extract<AttachResult, { outcome: 'attached' }>;

export class ReadinessGate {
  constructor(
    private readonly translator: Translator,
    private readonly settings: RelaySettings
  ) {}

  /**
   * Evaluate pair completeness after `role` attached.
   * Resolves once any ready announcement has been delivered.
   */
  async evaluate(session: RelaySession, role: LegRole, result: Attached): Promise<void> {
    if (result.state === SessionState.AWAITING_PEER) {
      this.sendWaiting(session, role);
      return;
    }

    if (result.becameActive) {
      const activation = this.announceReady(session);
      session.setActivation(activation);
      await activation;
    }
  }

  /**
   * Hold audio on the leg's own handle
   */
  sendWaiting(session: RelaySession, role: LegRole): boolean {
    const channel = session.liveChannel(role);
    if (!channel) {
      return false;
    }

    return channel.send({
      kind: 'sideChannelAudio',
      source: this.settings.holdAudioUrl,
      loop: 0,
      preemptible: true,
      interruptible: true,
    });
  }

  private async announceReady(session: RelaySession): Promise<void> {
    const log = logger.child({ sessionId: session.sessionId });
    log.info('Both legs connected, session active');

    await Promise.all(
      LEG_ROLES.map(async (role) => {
        const channel = session.liveChannel(role);
        if (channel) {
          await this.announceTo(session, role, channel);
        }
      })
    );
  }

  private async announceTo(session: RelaySession, role: LegRole, channel: LegChannel): Promise<void> {
    const { readyTemplate, templateLanguage } = this.settings;
    const language = session.languageOf(role);
    const log = logger.child({ sessionId: session.sessionId, role });
    let sent = 0;
    let finished = false;

    try {
      for await (const fragment of this.translator.translate(readyTemplate, templateLanguage, language)) {
        channel.send({ kind: 'textFragment', text: fragment.text, isFinal: fragment.isFinal });
        sent++;
        if (fragment.isFinal) {
          finished = true;
        }
      }
    } catch (error) {
      log.warn('Ready announcement translation failed, sending template', {
        language,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (finished) {
      return;
    }

    // Nothing went out: fall back to the untranslated template. Partial output: close the turn.
    if (sent === 0) {
      channel.send({ kind: 'textFragment', text: readyTemplate, isFinal: false });
    }
    channel.send({ kind: 'textFragment', ...FINAL_FRAGMENT });
  }
}
