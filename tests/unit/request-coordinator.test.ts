/**
 * Unit tests for RequestCoordinator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RequestCoordinator } from '../../src/request-coordinator';

describe('RequestCoordinator', () => {
  let coordinator: RequestCoordinator;
  const target = { serverTag: 'IRCnet', channelName: '#i-line', nick: 'alice' };

  beforeEach(() => {
    coordinator = new RequestCoordinator();
  });

  it('should start idle', () => {
    expect(coordinator.isBusy()).toBe(false);
    expect(coordinator.current).toBeNull();
  });

  it('should open a pending request for the target', () => {
    const request = coordinator.open(target);

    expect(request).toEqual({ id: 1, serverTag: 'IRCnet', channelName: '#i-line', nick: 'alice', state: 'pending' });
    expect(coordinator.isBusy()).toBe(true);
    expect(coordinator.current).toBe(request);
  });

  it('should carry the nick that asked for the lookup', () => {
    const request = coordinator.open({ ...target, nick: 'bob', requestedBy: 'alice' });

    expect(request.requestedBy).toBe('alice');
  });

  it('should refuse a second request while one is live', () => {
    coordinator.open(target);

    expect(() => coordinator.open({ ...target, nick: 'bob' })).toThrow('Lookup 1 for alice is still in flight');
  });

  it('should number requests in order', () => {
    const first = coordinator.open(target);
    coordinator.close(first);
    const second = coordinator.open(target);

    expect(second.id).toBe(2);
  });

  it('should advance the live request', () => {
    const request = coordinator.open(target);

    coordinator.advance(request, 'awaiting-status-reply');
    expect(request.state).toBe('awaiting-status-reply');

    coordinator.advance(request, 'fetching');
    expect(request.state).toBe('fetching');
  });

  it('should not advance a request that was closed', () => {
    const request = coordinator.open(target);
    coordinator.close(request);

    coordinator.advance(request, 'fetching');

    expect(request.state).toBe('pending');
  });

  it('should only close the request it is given', () => {
    const stale = coordinator.open(target);
    expect(coordinator.close(stale)).toBe(true);

    const fresh = coordinator.open(target);

    expect(coordinator.close(stale)).toBe(false);
    expect(coordinator.current).toBe(fresh);
    expect(coordinator.close(fresh)).toBe(true);
    expect(coordinator.isBusy()).toBe(false);
  });
});
