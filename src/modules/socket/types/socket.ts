/**
 * WebSocket-related type definitions
 */

import type { LegRole } from '@/modules/relay';

/**
 * Leg addressed by an upgrade path
 */
export interface LegRoute {
  role: LegRole;
  sessionId: string;
}

export type LegRouteResult =
  | { ok: true; route: LegRoute }
  | { ok: false; status: 400 | 404; message: string };
