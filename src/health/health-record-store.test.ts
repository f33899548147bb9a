import { describe, it, expect } from 'vitest';
import { HealthRecordStore } from './health-record-store';
import { EndpointState, HealthCheckConfig } from '../types';

const config: HealthCheckConfig = { expectedStatus: 200, timeoutMs: 10000, pollIntervalMs: 30000, failureThreshold: 3 };
const t0 = new Date('2026-01-01T00:00:00.000Z');
const t1 = new Date('2026-01-01T01:00:00.000Z');

describe('HealthRecordStore', () => {
  it('registers a monitor in the initializing state', () => {
    const store = new HealthRecordStore();
    const { monitor, replaced } = store.register('https://a.example.com', config, t0);

    expect(replaced).toBe(false);
    expect(monitor).toMatchObject({
      endpoint: 'https://a.example.com',
      state: EndpointState.INITIALIZING,
      consecutiveFailures: 0,
      successCount: 0,
      failureCount: 0,
      createdAt: t0
    });
    expect(monitor.lastProbeAt).toBeUndefined();
    expect(Object.isFrozen(monitor.config)).toBe(true);
    expect(store.size).toBe(1);
  });

  it('preserves lifetime counters on re-registration by default', () => {
    const store = new HealthRecordStore();
    const { monitor } = store.register('https://a.example.com', config, t0);
    store.commit(monitor, { ...monitor, state: EndpointState.DEGRADED, consecutiveFailures: 2, successCount: 4, failureCount: 2 });

    const { monitor: again, replaced } = store.register('https://a.example.com', { ...config, pollIntervalMs: 60000 }, t1);

    expect(replaced).toBe(true);
    expect(again).toMatchObject({
      state: EndpointState.INITIALIZING,
      consecutiveFailures: 0,
      successCount: 4,
      failureCount: 2,
      createdAt: t0
    });
    expect(again.config.pollIntervalMs).toBe(60000);
    expect(store.size).toBe(1);
  });

  it('resets counters on re-registration under the reset policy', () => {
    const store = new HealthRecordStore('reset-counters');
    const { monitor } = store.register('https://a.example.com', config, t0);
    store.commit(monitor, { ...monitor, successCount: 4, failureCount: 2 });

    const { monitor: again } = store.register('https://a.example.com', config, t1);

    expect(again.successCount).toBe(0);
    expect(again.failureCount).toBe(0);
  });

  it('rejects a commit when the monitor was replaced or removed', () => {
    const store = new HealthRecordStore();
    const { monitor: first } = store.register('https://a.example.com', config, t0);
    store.register('https://a.example.com', config, t1);

    expect(store.commit(first, { ...first, successCount: 1 })).toBe(false);
    expect(store.get('https://a.example.com')?.successCount).toBe(0);

    const current = store.get('https://a.example.com');
    expect(current).toBeDefined();
    if (!current) return;
    store.remove('https://a.example.com');
    expect(store.commit(current, { ...current, successCount: 1 })).toBe(false);
    expect(store.has('https://a.example.com')).toBe(false);
  });

  it('finds healthy monitors except the excluded one', () => {
    const store = new HealthRecordStore();
    for (const endpoint of ['https://a.example.com', 'https://b.example.com', 'https://c.example.com']) {
      const { monitor } = store.register(endpoint, config, t0);
      if (endpoint !== 'https://c.example.com') {
        store.commit(monitor, { ...monitor, state: EndpointState.HEALTHY });
      }
    }

    expect(store.findHealthy('https://a.example.com').map(m => m.endpoint)).toEqual(['https://b.example.com']);
    expect(store.findHealthy()).toHaveLength(2);
  });

  it('clears every monitor', () => {
    const store = new HealthRecordStore();
    store.register('https://a.example.com', config, t0);
    store.clear();

    expect(store.size).toBe(0);
    expect(store.snapshot()).toEqual([]);
  });
});
