/**
 * Teardown Coordinator Tests
 */

import { describe, it, expect } from 'vitest';
import { SessionRegistry, TeardownCoordinator } from '@/modules/relay/services';
import { SessionState, type OutboundEvent } from '@/modules/relay';
import { FakeLegChannel } from '../utils/relay-fakes';

class ThrowingChannel extends FakeLegChannel {
  send(_event: OutboundEvent): boolean {
    throw new Error('socket exploded');
  }
}

describe('TeardownCoordinator', () => {
  const setup = () => {
    const registry = new SessionRegistry(10);
    const teardown = new TeardownCoordinator(registry);
    const session = registry.create({ sourceLanguage: 'en-US', targetLanguage: 'es-ES' }, 'dual-outbound');
    return { registry, teardown, session };
  };

  it('should notify and close both legs exactly once', () => {
    const { registry, teardown, session } = setup();
    const a = new FakeLegChannel('A');
    const b = new FakeLegChannel('B');
    session.attachLeg('source', 'CA1', a);
    session.attachLeg('target', 'CA2', b);

    expect(teardown.teardown(session, 'terminated')).toBe(true);
    expect(teardown.teardown(session, 'transport-closed')).toBe(false);

    expect(a.sent).toEqual([{ kind: 'sessionEnd', reason: 'terminated' }]);
    expect(b.sent).toEqual([{ kind: 'sessionEnd', reason: 'terminated' }]);
    expect(a.closeReasons).toEqual(['session ended: terminated']);
    expect(b.closeReasons).toEqual(['session ended: terminated']);
    expect(session.state).toBe(SessionState.CLOSED);
    expect(registry.has(session.sessionId)).toBe(false);
  });

  it('should close a session that never had a leg', () => {
    const { registry, teardown, session } = setup();

    expect(teardown.teardown(session, 'idle-timeout')).toBe(true);
    expect(session.state).toBe(SessionState.CLOSED);
    expect(registry.isRetired(session.sessionId)).toBe(true);
  });

  it('should reach closed even when a leg fails to take the end message', () => {
    const { teardown, session } = setup();
    const broken = new ThrowingChannel('A');
    const b = new FakeLegChannel('B');
    session.attachLeg('source', 'CA1', broken);
    session.attachLeg('target', 'CA2', b);

    expect(teardown.teardown(session, 'escalated-error')).toBe(true);

    expect(broken.closeReasons).toEqual(['session ended: escalated-error']);
    expect(b.sent).toEqual([{ kind: 'sessionEnd', reason: 'escalated-error' }]);
    expect(session.state).toBe(SessionState.CLOSED);
  });
});
