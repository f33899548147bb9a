import { describe, it, expect, vi } from 'vitest';
import { MonitorLoop, isDue } from './monitor-loop';
import { HealthRecordStore } from './health-record-store';
import { ProbeOptions, Prober } from './prober';
import { AlertLog } from '../alerts/alert-log';
import { FailoverCoordinator } from '../failover/failover-coordinator';
import { MetricsCollector } from '../metrics/metrics-collector';
import { NoopProviderAdapter } from '../provider/provider-adapter';
import { ProviderDispatcher } from '../provider/provider-dispatcher';
import { Clock, EndpointState, HealthCheckConfig, ProbeOutcome } from '../types';

class FakeClock implements Clock {
  private current: number;

  constructor(iso: string) {
    this.current = new Date(iso).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Answers from a per-endpoint script; the last outcome repeats
 */
class ScriptedProber implements Prober {
  calls: string[] = [];
  private scripts: Map<string, ProbeOutcome[]> = new Map();

  script(endpoint: string, ...outcomes: ProbeOutcome[]): void {
    this.scripts.set(endpoint, outcomes);
  }

  async probe(endpoint: string, _options: ProbeOptions): Promise<ProbeOutcome> {
    this.calls.push(endpoint);
    const script = this.scripts.get(endpoint) ?? [];
    const outcome = script.length > 1 ? script.shift() : script[0];
    if (!outcome) {
      throw new Error(`no script for ${endpoint}`);
    }
    return outcome;
  }
}

const config: HealthCheckConfig = { expectedStatus: 200, timeoutMs: 10000, pollIntervalMs: 30000, failureThreshold: 3 };
const refused: ProbeOutcome = { kind: 'connection_failed', message: 'ECONNREFUSED' };
const ok: ProbeOutcome = { kind: 'success', statusCode: 200, responseTimeMs: 40 };

function setup(options: { sleep?: (ms: number) => Promise<void>; prober?: Prober; alertLog?: AlertLog } = {}) {
  const clock = new FakeClock('2026-01-01T00:00:00.000Z');
  const store = new HealthRecordStore();
  const prober = new ScriptedProber();
  const alertLog = options.alertLog ?? new AlertLog();
  const metrics = new MetricsCollector();
  const failover = new FailoverCoordinator(store, new ProviderDispatcher(new NoopProviderAdapter(), metrics), metrics);
  const loop = new MonitorLoop(store, options.prober ?? prober, failover, alertLog, metrics, { clock, sleep: options.sleep });
  return { clock, store, prober, alertLog, metrics, loop };
}

describe('isDue', () => {
  it('is due when never probed or once the interval has elapsed', () => {
    const store = new HealthRecordStore();
    const { monitor } = store.register('https://a.example.com', config, new Date(0));

    expect(isDue(monitor, new Date(0))).toBe(true);
    const probed = { ...monitor, lastProbeAt: new Date(0) };
    expect(isDue(probed, new Date(29999))).toBe(false);
    expect(isDue(probed, new Date(30000))).toBe(true);
  });
});

describe('MonitorLoop.tick', () => {
  it('raises one alert after three connection failures with no failover target', async () => {
    const { clock, store, prober, alertLog, metrics, loop } = setup();
    store.register('https://api.example.com', config, clock.now());
    prober.script('https://api.example.com', refused);

    for (let i = 0; i < 3; i++) {
      expect(await loop.tick()).toBe(1);
      clock.advance(30000);
    }

    const monitor = store.get('https://api.example.com');
    expect(monitor?.state).toBe(EndpointState.CONNECTION_ERROR);
    expect(monitor?.consecutiveFailures).toBe(3);
    expect(monitor?.failureCount).toBe(3);

    const alerts = alertLog.recent();
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      id: 1,
      endpoint: 'https://api.example.com',
      state: EndpointState.CONNECTION_ERROR,
      consecutiveFailures: 3,
      lastError: 'Connection failed: ECONNREFUSED',
      actionTaken: 'failover_attempted',
      failoverSuccess: false
    });
    expect(metrics.getMetrics()).toMatchObject({ failedHealthChecks: 3, failoversTriggered: 1 });
  });

  it('reports a successful failover when another endpoint is healthy', async () => {
    const { clock, store, prober, alertLog, loop } = setup();
    // outcomes apply in registration order, so b is healthy before a fails
    store.register('https://b.example.com', config, clock.now());
    store.register('https://a.example.com', { ...config, failureThreshold: 1 }, clock.now());
    prober.script('https://a.example.com', { kind: 'timeout' });
    prober.script('https://b.example.com', ok);

    await loop.tick();

    expect(store.get('https://b.example.com')?.state).toBe(EndpointState.HEALTHY);
    expect(alertLog.recent()).toEqual([
      expect.objectContaining({ endpoint: 'https://a.example.com', state: EndpointState.TIMED_OUT, failoverSuccess: true })
    ]);
  });

  it('only probes endpoints whose interval has elapsed', async () => {
    const { clock, store, prober, loop } = setup();
    store.register('https://a.example.com', config, clock.now());
    prober.script('https://a.example.com', ok);

    await loop.tick();
    clock.advance(2000);
    expect(await loop.tick()).toBe(0);
    clock.advance(28000);
    expect(await loop.tick()).toBe(1);

    expect(prober.calls).toEqual(['https://a.example.com', 'https://a.example.com']);
    expect(store.get('https://a.example.com')?.lastProbeAt).toEqual(clock.now());
  });

  it('turns a throwing prober into an error outcome', async () => {
    const { clock, store, loop } = setup();
    store.register('https://unscripted.example.com', { ...config, failureThreshold: 1 }, clock.now());

    await loop.tick();

    const monitor = store.get('https://unscripted.example.com');
    expect(monitor?.state).toBe(EndpointState.ERROR);
    expect(monitor?.lastError).toBe('no script for https://unscripted.example.com');
  });

  it('probes endpoints concurrently so a slow one does not hold back the others', async () => {
    let release: () => void = () => undefined;
    const slowResponse = new Promise<void>(resolve => {
      release = resolve;
    });
    const started: string[] = [];
    const prober: Prober = {
      probe: async (endpoint: string): Promise<ProbeOutcome> => {
        started.push(endpoint);
        if (endpoint === 'https://slow.example.com') {
          await slowResponse;
          return { kind: 'timeout' };
        }
        return ok;
      }
    };
    const { clock, store, loop } = setup({ prober });
    store.register('https://slow.example.com', config, clock.now());
    store.register('https://fast.example.com', config, clock.now());

    const tick = loop.tick();
    await new Promise<void>(resolve => setImmediate(resolve));
    expect(started).toEqual(['https://slow.example.com', 'https://fast.example.com']);

    release();
    expect(await tick).toBe(2);
    expect(store.get('https://fast.example.com')?.state).toBe(EndpointState.HEALTHY);
    expect(store.get('https://slow.example.com')?.state).toBe(EndpointState.DEGRADED);
  });

  it('keeps applying outcomes when one endpoint fails to apply', async () => {
    class FailingAlertLog extends AlertLog {
      append(): never {
        throw new Error('alert storage unavailable');
      }
    }
    const { clock, store, prober, loop } = setup({ alertLog: new FailingAlertLog() });
    store.register('https://broken.example.com', { ...config, failureThreshold: 1 }, clock.now());
    store.register('https://fine.example.com', config, clock.now());
    prober.script('https://broken.example.com', refused);
    prober.script('https://fine.example.com', ok);

    await expect(loop.tick()).resolves.toBe(2);

    expect(store.get('https://broken.example.com')?.state).toBe(EndpointState.CONNECTION_ERROR);
    expect(store.get('https://fine.example.com')).toMatchObject({ state: EndpointState.HEALTHY, successCount: 1 });
  });

  it('drops the outcome of an endpoint removed while its probe was in flight', async () => {
    const { clock, store, loop, metrics } = setup();
    const { monitor } = store.register('https://a.example.com', config, clock.now());
    store.remove('https://a.example.com');

    expect(loop.applyOutcome(monitor, refused, clock.now())).toBeUndefined();
    expect(store.has('https://a.example.com')).toBe(false);
    expect(metrics.getMetrics().failedHealthChecks).toBe(0);
  });
});

describe('MonitorLoop lifecycle', () => {
  it('runs a single loop and stops cooperatively', async () => {
    const sleep = vi.fn(async (_ms: number) => {
      await new Promise<void>(resolve => setImmediate(resolve));
    });
    const { clock, store, prober, loop } = setup({ sleep });
    store.register('https://a.example.com', config, clock.now());
    prober.script('https://a.example.com', ok);

    const handle = loop.start();
    expect(loop.start()).toBe(handle);
    expect(loop.isRunning()).toBe(true);

    await vi.waitFor(() => expect(sleep).toHaveBeenCalledWith(2000));
    handle.stop();
    expect(loop.isRunning()).toBe(false);
    await handle.done;

    expect(prober.calls).toEqual(['https://a.example.com']);
    expect(store.get('https://a.example.com')?.state).toBe(EndpointState.HEALTHY);
  });

  it('idles while nothing is registered', async () => {
    const sleep = vi.fn(async (_ms: number) => {
      await new Promise<void>(resolve => setImmediate(resolve));
    });
    const { loop, prober } = setup({ sleep });

    const handle = loop.start();
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledWith(5000));
    handle.stop();
    await loop.stopped();

    expect(prober.calls).toEqual([]);
  });

  it('wakes the default pause when stopped', async () => {
    const { loop } = setup();

    const handle = loop.start();
    await new Promise<void>(resolve => setImmediate(resolve));
    handle.stop();
    await handle.done;

    expect(loop.isRunning()).toBe(false);
  });
});
