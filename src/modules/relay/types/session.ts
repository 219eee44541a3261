/**
 * Relay Session Types
 */

// ============================================================================
// Legs
// ============================================================================

export type LegRole = 'source' | 'target';

export const LEG_ROLES: readonly LegRole[] = ['source', 'target'];

export function isLegRole(value: string): value is LegRole {
  return value === 'source' || value === 'target';
}

export function counterpartOf(role: LegRole): LegRole {
  return role === 'source' ? 'target' : 'source';
}

// ============================================================================
// Session State
// ============================================================================

export enum SessionState {
  PENDING = 'pending', // Record exists, no leg attached
  AWAITING_PEER = 'awaiting_peer', // One leg attached
  ACTIVE = 'active', // Both legs attached
  DRAINING = 'draining', // Teardown in progress
  CLOSED = 'closed', // Terminal, removed from registry
}

/**
 * How the session came to exist
 */
export type SessionOrigin = 'first-contact' | 'dual-outbound' | 'inbound-call';

// ============================================================================
// Configuration accepted at creation
// ============================================================================

export interface VoiceConfig {
  provider: string; // '' = caller-side default
  name: string; // '' = caller-side default
}

export interface SessionCreateConfig {
  sourceLanguage: string;
  targetLanguage: string;
  sourceVoiceProvider?: string;
  sourceVoiceName?: string;
  targetVoiceProvider?: string;
  targetVoiceName?: string;
}

// ============================================================================
// Snapshots (read-only views handed outside the registry)
// ============================================================================

export interface LegStatus {
  name: string;
  value: string;
  receivedAt: number;
}

export interface LegSnapshot {
  role: LegRole;
  legId?: string;
  language: string;
  voice: VoiceConfig;
  connected: boolean;
  utterances: number;
  interruptions: number;
  softErrors: number;
  lastStatus?: LegStatus;
}

export interface SessionSnapshot {
  sessionId: string;
  state: SessionState;
  origin: SessionOrigin;
  createdAt: number;
  lastActivity: number;
  legs: Record<LegRole, LegSnapshot>;
}

export interface RegistryStats {
  total: number;
  pending: number;
  awaitingPeer: number;
  active: number;
  draining: number;
  retired: number;
}
