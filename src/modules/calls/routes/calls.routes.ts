/**
 * Calls API Routes
 *
 * Session creation for dual-outbound calls, the Twilio voice webhooks that
 * answer each leg with ConversationRelay TwiML, and call status callbacks.
 */

import express, { Router, type Request, type Response } from 'express';
import { logger } from '@/shared/utils';
import { isLegRole, relayController, type LegRole, type RelayController } from '@/modules/relay';
import { HttpErrorCode, sendError } from '../middleware';
import { buildConversationRelayTwiml, buildHangupTwiml, buildLegUrls, resolvePublicHost } from '../utils';
import {
  createSessionSchema,
  inboundCallQuerySchema,
  isTerminalCallStatus,
  statusCallbackSchema,
} from '../validation/session.schema';

function sendTwiml(res: Response, twiml: string, status = 200): void {
  res.status(status).type('text/xml').send(twiml);
}

function paramOf(req: Request, name: string): string {
  return req.params[name] ?? '';
}

export function createCallsRouter(controller: RelayController = relayController): Router {
  const router = Router();

  router.use(express.json());
  // Twilio posts webhooks form-encoded
  router.use(express.urlencoded({ extended: false }));

  /**
   * Answer a leg with ConversationRelay TwiML pointing at its relay socket
   */
  const legTwiml = (req: Request, role: LegRole, sessionId: string): string | undefined => {
    const snapshot = controller.getSession(sessionId);
    if (!snapshot) {
      return undefined;
    }
    const leg = snapshot.legs[role];
    return buildConversationRelayTwiml({
      relayUrl: buildLegUrls(resolvePublicHost(req), role, sessionId).relayUrl,
      language: leg.language,
      ttsProvider: leg.voice.provider,
      voice: leg.voice.name,
    });
  };

  // ==========================================================================
  // SESSION API
  // ==========================================================================

  /**
   * POST /sessions
   * Create a session for two outbound calls placed by an orchestrator
   */
  router.post('/sessions', (req: Request, res: Response) => {
    const parsed = createSessionSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, 400, HttpErrorCode.INVALID_REQUEST, 'Invalid session configuration', parsed.error.issues);
      return;
    }

    const sessionId = controller.createSession(parsed.data, 'dual-outbound');
    const host = resolvePublicHost(req);

    logger.info('Session created via API', {
      sessionId,
      sourceLanguage: parsed.data.sourceLanguage,
      targetLanguage: parsed.data.targetLanguage,
    });

    res.status(201).json({
      sessionId,
      legs: {
        source: buildLegUrls(host, 'source', sessionId),
        target: buildLegUrls(host, 'target', sessionId),
      },
    });
  });

  /**
   * GET /sessions/:sessionId
   */
  router.get('/sessions/:sessionId', (req: Request, res: Response) => {
    const snapshot = controller.getSession(paramOf(req, 'sessionId'));
    if (!snapshot) {
      sendError(res, 404, HttpErrorCode.SESSION_NOT_FOUND, 'Session not found');
      return;
    }
    res.json(snapshot);
  });

  /**
   * DELETE /sessions/:sessionId
   * Explicit end: both legs receive an end message
   */
  router.delete('/sessions/:sessionId', (req: Request, res: Response) => {
    const sessionId = paramOf(req, 'sessionId');
    if (!controller.endSession(sessionId, 'terminated')) {
      sendError(res, 404, HttpErrorCode.SESSION_NOT_FOUND, 'Session not found');
      return;
    }
    logger.info('Session ended via API', { sessionId });
    res.status(204).end();
  });

  // ==========================================================================
  // TWILIO WEBHOOKS
  // ==========================================================================

  /**
   * POST /incoming, POST /voice
   * Inbound call: the caller becomes the source leg of a new session
   */
  router.post(['/incoming', '/voice'], (req: Request, res: Response) => {
    const query = inboundCallQuerySchema.safeParse(req.query);
    if (!query.success) {
      logger.warn('Inbound call rejected, invalid languages', { issues: query.error.issues.length });
      sendTwiml(res, buildHangupTwiml(), 400);
      return;
    }

    const settings = controller.settings;
    const sessionId = controller.createSession(
      {
        sourceLanguage: query.data.sourceLanguage ?? settings.defaultSourceLanguage,
        targetLanguage: query.data.targetLanguage ?? settings.defaultTargetLanguage,
      },
      'inbound-call'
    );

    const form: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};
    logger.info('Incoming call', {
      sessionId,
      callSid: form.CallSid,
      from: form.From,
      to: form.To,
      callStatus: form.CallStatus,
      targetTwimlUrl: buildLegUrls(resolvePublicHost(req), 'target', sessionId).twimlUrl,
    });

    sendTwiml(res, legTwiml(req, 'source', sessionId) ?? buildHangupTwiml());
  });

  /**
   * POST /twiml/:role/:sessionId
   * TwiML for a leg of an existing session
   */
  router.post('/twiml/:role/:sessionId', (req: Request, res: Response) => {
    const role = paramOf(req, 'role');
    const sessionId = paramOf(req, 'sessionId');

    if (!isLegRole(role)) {
      sendTwiml(res, buildHangupTwiml(), 404);
      return;
    }

    const twiml = legTwiml(req, role, sessionId);
    if (!twiml) {
      logger.warn('TwiML requested for unknown session', { sessionId, role });
      sendTwiml(res, buildHangupTwiml(), 404);
      return;
    }

    sendTwiml(res, twiml);
  });

  /**
   * POST /status
   * Call status callback: a terminal status ends the session owning that call
   */
  router.post('/status', (req: Request, res: Response) => {
    const parsed = statusCallbackSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, 400, HttpErrorCode.INVALID_REQUEST, 'Invalid status callback', parsed.error.issues);
      return;
    }

    const { CallSid: callSid, CallStatus: callStatus } = parsed.data;
    if (isTerminalCallStatus(callStatus)) {
      const ended = controller.endSessionByLegId(callSid, 'call-ended');
      logger.info('Call ended', { callSid, callStatus, sessionEnded: ended });
    } else {
      logger.debug('Call status update', { callSid, callStatus });
    }

    res.status(204).end();
  });

  return router;
}
