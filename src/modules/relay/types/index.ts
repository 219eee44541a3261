/**
 * Relay Module Types
 */

export * from './session';
export * from './events';
export type { LegChannel } from './channel';
