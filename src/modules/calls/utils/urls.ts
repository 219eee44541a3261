/**
 * Public URLs handed to Twilio for each leg
 */

import type { Request } from 'express';
import { env, websocketConfig } from '@/shared/config';
import type { LegRole } from '@/modules/relay';

export interface LegUrls {
  relayUrl: string;
  twimlUrl: string;
}

export function resolvePublicHost(req: Request): string {
  return env.PUBLIC_HOST || req.get('host') || `localhost:${env.PORT}`;
}

export function buildLegUrls(host: string, role: LegRole, sessionId: string): LegUrls {
  const id = encodeURIComponent(sessionId);
  return {
    relayUrl: `wss://${host}${websocketConfig.pathPrefix}/${role}/${id}`,
    twimlUrl: `https://${host}/twiml/${role}/${id}`,
  };
}
