/**
 * Calls Routes Tests
 * Runs the router on an ephemeral local port
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express from 'express';
import { createServer, type Server } from 'http';
import { z } from 'zod';
import { createCallsRouter, errorHandler, notFoundHandler } from '@/modules/calls';
import type { RelayController } from '@/modules/relay';
import type { SessionRegistry } from '@/modules/relay/services';
import { FakeLegChannel, createRelayHarness, testSettings } from '../../relay/utils/relay-fakes';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const createdSessionSchema = z.object({ sessionId: z.string() });

describe('Calls routes', () => {
  let server: Server;
  let baseUrl: string;
  let host: string;
  let controller: RelayController;
  let registry: SessionRegistry;

  beforeEach(async () => {
    const harness = createRelayHarness();
    controller = harness.controller;
    registry = harness.registry;

    const app = express();
    app.use(createCallsRouter(controller));
    app.use(notFoundHandler);
    app.use(errorHandler);

    server = createServer(app);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    host = `127.0.0.1:${address.port}`;
    baseUrl = `http://${host}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const postJson = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });

  const postForm = (path: string, fields: Record<string, string>) =>
    fetch(`${baseUrl}${path}`, { method: 'POST', body: new URLSearchParams(fields) });

  describe('POST /sessions', () => {
    it('should create a session and return per-leg URLs', async () => {
      const response = await postJson('/sessions', { sourceLanguage: 'en-US', targetLanguage: 'ko-KR' });
      const body = await response.json();
      const { sessionId } = createdSessionSchema.parse(body);

      expect(response.status).toBe(201);
      expect(body).toEqual({
        sessionId,
        legs: {
          source: {
            relayUrl: `wss://${host}/ws/source/${sessionId}`,
            twimlUrl: `https://${host}/twiml/source/${sessionId}`,
          },
          target: {
            relayUrl: `wss://${host}/ws/target/${sessionId}`,
            twimlUrl: `https://${host}/twiml/target/${sessionId}`,
          },
        },
      });
      expect(controller.getSession(sessionId)?.legs.target.language).toBe('ko-KR');
      expect(controller.getSession(sessionId)?.origin).toBe('dual-outbound');
    });

    it('should reject an invalid configuration with its issues', async () => {
      const response = await postJson('/sessions', { sourceLanguage: 'en-US', targetLanguage: 'english please' });
      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { code: 'INVALID_REQUEST', issues: [{ path: ['targetLanguage'] }] },
      });
      expect(controller.listSessions()).toEqual([]);
    });

    it('should reject a body that is not JSON', async () => {
      const response = await postJson('/sessions', '{"sourceLanguage":');
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: { code: 'INVALID_REQUEST', message: 'Malformed request body' } });
    });
  });

  describe('GET and DELETE /sessions/:sessionId', () => {
    it('should return a snapshot and end the session', async () => {
      const sessionId = controller.createSession({ sourceLanguage: 'en-US', targetLanguage: 'es-ES' });

      const snapshot = await fetch(`${baseUrl}/sessions/${sessionId}`);
      expect(snapshot.status).toBe(200);
      expect(await snapshot.json()).toMatchObject({ state: 'pending' });

      const ended = await fetch(`${baseUrl}/sessions/${sessionId}`, { method: 'DELETE' });
      expect(ended.status).toBe(204);

      const again = await fetch(`${baseUrl}/sessions/${sessionId}`, { method: 'DELETE' });
      expect(again.status).toBe(404);
      expect(await again.json()).toMatchObject({ error: { code: 'SESSION_NOT_FOUND' } });
    });

    it('should answer 404 for an unknown session', async () => {
      const response = await fetch(`${baseUrl}/sessions/unknown`);

      expect(response.status).toBe(404);
      expect(await response.json()).toMatchObject({ error: { code: 'SESSION_NOT_FOUND' } });
    });
  });

  describe('POST /twiml/:role/:sessionId', () => {
    it('should answer a leg with its ConversationRelay settings', async () => {
      const sessionId = controller.createSession({
        sourceLanguage: 'en-US',
        targetLanguage: 'es-ES',
        targetVoiceProvider: 'ElevenLabs',
        targetVoiceName: 'voice-b',
      });

      const response = await postForm(`/twiml/target/${sessionId}`, { CallSid: 'CA-target' });

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toContain('text/xml');
      expect(await response.text()).toBe(
        `${XML_DECLARATION}<Response><Connect>` +
          `<ConversationRelay url="wss://${host}/ws/target/${sessionId}" language="es-ES" ttsProvider="ElevenLabs" voice="voice-b"/>` +
          '</Connect></Response>'
      );
    });

    it('should hang up on an unknown session or role', async () => {
      const sessionId = controller.createSession({ sourceLanguage: 'en-US', targetLanguage: 'es-ES' });
      const hangup = `${XML_DECLARATION}<Response><Hangup/></Response>`;

      const unknownSession = await postForm('/twiml/source/unknown', {});
      expect(unknownSession.status).toBe(404);
      expect(await unknownSession.text()).toBe(hangup);

      const unknownRole = await postForm(`/twiml/caller/${sessionId}`, {});
      expect(unknownRole.status).toBe(404);
      expect(await unknownRole.text()).toBe(hangup);
    });
  });

  describe('POST /incoming and /voice', () => {
    it('should start a session for an inbound caller', async () => {
      const response = await postForm('/voice?sourceLanguage=fr-FR', {
        CallSid: 'CA-inbound',
        From: '+15550001111',
        To: '+15550002222',
        CallStatus: 'ringing',
      });

      const sessions = controller.listSessions();
      expect(sessions).toHaveLength(1);
      const [session] = sessions;
      expect(session?.origin).toBe('inbound-call');
      expect(session?.legs.source.language).toBe('fr-FR');
      expect(session?.legs.target.language).toBe(testSettings.defaultTargetLanguage);

      expect(response.status).toBe(200);
      expect(await response.text()).toBe(
        `${XML_DECLARATION}<Response><Connect>` +
          `<ConversationRelay url="wss://${host}/ws/source/${session?.sessionId}" language="fr-FR"/>` +
          '</Connect></Response>'
      );
    });

    it('should use default languages on /incoming', async () => {
      const response = await postForm('/incoming', { CallSid: 'CA-inbound' });

      expect(response.status).toBe(200);
      expect(controller.listSessions()[0]?.legs.source.language).toBe(testSettings.defaultSourceLanguage);
    });

    it('should hang up when the requested language is malformed', async () => {
      const response = await postForm('/incoming?targetLanguage=not%20a%20tag', { CallSid: 'CA-inbound' });

      expect(response.status).toBe(400);
      expect(await response.text()).toBe(`${XML_DECLARATION}<Response><Hangup/></Response>`);
      expect(controller.listSessions()).toEqual([]);
    });
  });

  describe('POST /status', () => {
    const attachSource = async (sessionId: string, channel: FakeLegChannel) => {
      const dispatcher = controller.openLeg('source', sessionId, channel);
      dispatcher?.receive({ kind: 'setup', legId: 'CA-source' });
      await dispatcher?.whenIdle();
    };

    it('should end the session when its call completes', async () => {
      const sessionId = controller.createSession({ sourceLanguage: 'en-US', targetLanguage: 'es-ES' });
      const channel = new FakeLegChannel('A');
      await attachSource(sessionId, channel);

      const response = await postForm('/status', { CallSid: 'CA-source', CallStatus: 'completed' });

      expect(response.status).toBe(204);
      expect(channel.endReasons()).toEqual(['call-ended']);
      expect(registry.isRetired(sessionId)).toBe(true);
    });

    it('should ignore progress updates', async () => {
      const sessionId = controller.createSession({ sourceLanguage: 'en-US', targetLanguage: 'es-ES' });
      const channel = new FakeLegChannel('A');
      await attachSource(sessionId, channel);

      const response = await postForm('/status', { CallSid: 'CA-source', CallStatus: 'in-progress' });

      expect(response.status).toBe(204);
      expect(channel.endReasons()).toEqual([]);
      expect(controller.getSession(sessionId)).toBeDefined();
    });

    it('should reject a callback without a call sid', async () => {
      const response = await postForm('/status', { CallStatus: 'completed' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: { code: 'INVALID_REQUEST' } });
    });
  });

  it('should answer unknown routes with a JSON 404', async () => {
    const response = await fetch(`${baseUrl}/nowhere`);

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: { code: 'NOT_FOUND' } });
  });
});
