/**
 * Relay Services
 */

export { SessionRegistry, sessionRegistry } from './session-registry.service';
export { ReadinessGate } from './readiness-gate.service';
export { RelayDispatcher } from './relay-dispatcher.service';
export type { RelayDispatcherDeps } from './relay-dispatcher.service';
export { TeardownCoordinator } from './teardown.service';
