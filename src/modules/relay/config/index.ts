export { relayConfig } from './relay.config';
export type { RelaySettings } from './relay.config';
