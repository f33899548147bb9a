import { describe, it, expect } from 'vitest';
import { isFailureState, transition } from './state-machine';
import { EndpointMonitor, EndpointState, ProbeOutcome } from '../types';

const probedAt = new Date('2026-01-01T00:00:00.000Z');

function monitor(overrides: Partial<EndpointMonitor> = {}): EndpointMonitor {
  return {
    endpoint: 'https://api.example.com',
    config: { expectedStatus: 200, timeoutMs: 10000, pollIntervalMs: 30000, failureThreshold: 3 },
    state: EndpointState.INITIALIZING,
    consecutiveFailures: 0,
    successCount: 0,
    failureCount: 0,
    createdAt: probedAt,
    ...overrides
  };
}

const ok: ProbeOutcome = { kind: 'success', statusCode: 200, responseTimeMs: 12.3456 };
const refused: ProbeOutcome = { kind: 'connection_failed', message: 'ECONNREFUSED' };

describe('transition', () => {
  it('marks a successful probe healthy and resets consecutive failures', () => {
    const { next, effects } = transition(monitor({ consecutiveFailures: 2, state: EndpointState.DEGRADED }), ok, probedAt);

    expect(next.state).toBe(EndpointState.HEALTHY);
    expect(next.consecutiveFailures).toBe(0);
    expect(next.successCount).toBe(1);
    expect(next.lastResponseTimeMs).toBe(12.35);
    expect(next.lastProbeAt).toBe(probedAt);
    expect(effects).toEqual([]);
  });

  it('does not mutate the input monitor', () => {
    const before = monitor();
    transition(before, refused, probedAt);

    expect(before.consecutiveFailures).toBe(0);
    expect(before.state).toBe(EndpointState.INITIALIZING);
  });

  it('stays degraded below the threshold', () => {
    const { next, effects } = transition(monitor({ consecutiveFailures: 1 }), refused, probedAt);

    expect(next.state).toBe(EndpointState.DEGRADED);
    expect(next.consecutiveFailures).toBe(2);
    expect(next.failureCount).toBe(1);
    expect(next.lastError).toBe('Connection failed: ECONNREFUSED');
    expect(effects).toEqual([]);
  });

  it('enters the failure state exactly at the threshold and emits alert and failover', () => {
    const { next, effects } = transition(monitor({ consecutiveFailures: 2 }), refused, probedAt);

    expect(next.state).toBe(EndpointState.CONNECTION_ERROR);
    expect(next.consecutiveFailures).toBe(3);
    expect(effects).toEqual(['raise_alert', 'trigger_failover']);
  });

  it('re-emits effects on every failing probe past the threshold', () => {
    const { next, effects } = transition(
      monitor({ consecutiveFailures: 5, state: EndpointState.TIMED_OUT }),
      { kind: 'timeout' },
      probedAt
    );

    expect(next.state).toBe(EndpointState.TIMED_OUT);
    expect(next.consecutiveFailures).toBe(6);
    expect(next.lastError).toBe('Request timeout');
    expect(effects).toEqual(['raise_alert', 'trigger_failover']);
  });

  it('maps each failure kind to its own state', () => {
    const atThreshold = monitor({ consecutiveFailures: 2 });

    expect(transition(atThreshold, { kind: 'unexpected_status', statusCode: 503, responseTimeMs: 4 }, probedAt).next)
      .toMatchObject({ state: EndpointState.UNHEALTHY, lastError: 'HTTP 503' });
    expect(transition(atThreshold, { kind: 'timeout' }, probedAt).next.state).toBe(EndpointState.TIMED_OUT);
    expect(transition(atThreshold, refused, probedAt).next.state).toBe(EndpointState.CONNECTION_ERROR);
    expect(transition(atThreshold, { kind: 'other_error', message: 'boom' }, probedAt).next)
      .toMatchObject({ state: EndpointState.ERROR, lastError: 'boom' });
  });

  it('treats a success with a different status code as unexpected', () => {
    const { next } = transition(monitor(), { kind: 'success', statusCode: 204, responseTimeMs: 1 }, probedAt);

    expect(next.state).toBe(EndpointState.DEGRADED);
    expect(next.failureCount).toBe(1);
    expect(next.lastError).toBe('HTTP 204');
  });

  it('honours a non-default expected status', () => {
    const custom = monitor({
      config: { expectedStatus: 204, timeoutMs: 1000, pollIntervalMs: 1000, failureThreshold: 1 }
    });
    expect(transition(custom, { kind: 'success', statusCode: 204, responseTimeMs: 1 }, probedAt).next.state)
      .toBe(EndpointState.HEALTHY);
  });

  it('keeps healthy state and zero consecutive failures in lockstep over any sequence', () => {
    const outcomes: ProbeOutcome[] = [ok, refused, { kind: 'timeout' }, { kind: 'other_error', message: 'x' }];
    let seed = 7;
    const nextIndex = (): number => {
      seed = (seed * 75 + 74) % 65537;
      return seed % outcomes.length;
    };

    let current = monitor({ config: { expectedStatus: 200, timeoutMs: 1000, pollIntervalMs: 1000, failureThreshold: 2 } });
    for (let i = 0; i < 200; i++) {
      current = transition(current, outcomes[nextIndex()], probedAt).next;
      expect(current.state === EndpointState.HEALTHY).toBe(current.consecutiveFailures === 0);
      expect(isFailureState(current.state)).toBe(current.consecutiveFailures >= 2);
    }
    expect(current.successCount + current.failureCount).toBe(200);
  });
});
