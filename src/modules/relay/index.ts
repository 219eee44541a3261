/**
 * Relay Module - Public API
 */

export { relayController, RelayController } from './controllers/relay.controller';
export type { RelayControllerDeps } from './controllers/relay.controller';
export { handleLegConnection } from './handlers';
export { relayConfig } from './config';
export type { RelaySettings } from './config';
export { isLegRole, counterpartOf, LEG_ROLES, SessionState } from './types';
export type {
  LegRole,
  LegChannel,
  SessionCreateConfig,
  SessionSnapshot,
  LegSnapshot,
  RegistryStats,
  EndReason,
  InboundEvent,
  OutboundEvent,
} from './types';
