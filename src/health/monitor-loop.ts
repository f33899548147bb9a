import { HealthRecordStore } from './health-record-store';
import { Prober } from './prober';
import { transition } from './state-machine';
import { AlertLog } from '../alerts/alert-log';
import { FailoverCoordinator } from '../failover/failover-coordinator';
import { MetricsCollector } from '../metrics/metrics-collector';
import { Clock, EndpointMonitor, EndpointState, MonitorEffect, ProbeOutcome } from '../types';
import { alertsTotal } from '../utils/prometheus';
import { logger } from '../utils/logger';

export const DEFAULT_TICK_MS = 2000;
export const DEFAULT_IDLE_MS = 5000;

export const systemClock: Clock = { now: () => new Date() };

export interface MonitorLoopOptions {
  tickMs?: number;
  idleMs?: number;
  clock?: Clock;
  /** Replaces the timer-based pause between ticks, mainly for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface MonitorHandle {
  stop(): void;
  /** Settles once the loop has observed the stop request and exited */
  readonly done: Promise<void>;
}

export function isDue(monitor: EndpointMonitor, now: Date): boolean {
  if (!monitor.lastProbeAt) {
    return true;
  }
  return now.getTime() - monitor.lastProbeAt.getTime() >= monitor.config.pollIntervalMs;
}

/**
 * Single scheduler for every registered endpoint. Each tick probes the
 * endpoints that are due, concurrently, then applies the outcomes one at a
 * time through the state machine. A due probe can fire up to one tick late.
 */
export class MonitorLoop {
  private store: HealthRecordStore;
  private prober: Prober;
  private failoverCoordinator: FailoverCoordinator;
  private alertLog: AlertLog;
  private metricsCollector: MetricsCollector;
  private tickMs: number;
  private idleMs: number;
  private clock: Clock;
  private sleepFn?: (ms: number) => Promise<void>;

  private handle?: MonitorHandle;
  private stopRequested: boolean = false;
  private wake?: () => void;

  constructor(
    store: HealthRecordStore,
    prober: Prober,
    failoverCoordinator: FailoverCoordinator,
    alertLog: AlertLog,
    metricsCollector: MetricsCollector,
    options: MonitorLoopOptions = {}
  ) {
    this.store = store;
    this.prober = prober;
    this.failoverCoordinator = failoverCoordinator;
    this.alertLog = alertLog;
    this.metricsCollector = metricsCollector;
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.idleMs = options.idleMs ?? DEFAULT_IDLE_MS;
    this.clock = options.clock ?? systemClock;
    this.sleepFn = options.sleep;
  }

  /**
   * False as soon as a stop is requested, even if the last tick is still finishing
   */
  isRunning(): boolean {
    return this.handle !== undefined && !this.stopRequested;
  }

  /**
   * Starts the loop, or returns the handle of the loop already running
   */
  start(): MonitorHandle {
    this.stopRequested = false;
    if (this.handle) {
      return this.handle;
    }

    const done = this.run().finally(() => {
      this.handle = undefined;
    });
    const handle: MonitorHandle = {
      stop: () => this.stop(),
      done
    };
    this.handle = handle;
    return handle;
  }

  stop(): void {
    if (!this.handle) {
      return;
    }
    this.stopRequested = true;
    this.wake?.();
  }

  /**
   * Resolves when no loop is running
   */
  async stopped(): Promise<void> {
    await this.handle?.done;
  }

  /**
   * One pass over the store. Returns the number of endpoints probed.
   */
  async tick(): Promise<number> {
    const now = this.clock.now();
    const due = this.store.snapshot().filter(monitor => isDue(monitor, now));
    if (due.length === 0) {
      return 0;
    }

    const results = await Promise.all(
      due.map(async monitor => ({ monitor, outcome: await this.safeProbe(monitor) }))
    );

    for (const { monitor, outcome } of results) {
      try {
        this.applyOutcome(monitor, outcome, now);
      } catch (error) {
        logger.error(`Failed to apply probe outcome for ${monitor.endpoint}`, {
          endpoint: monitor.endpoint,
          outcome: outcome.kind,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined
        });
      }
    }

    return due.length;
  }

  /**
   * Runs the state machine for one outcome, stores the result and executes
   * its effects. Outcomes for monitors removed or re-registered while the
   * probe was in flight are dropped.
   */
  applyOutcome(monitor: EndpointMonitor, outcome: ProbeOutcome, probedAt: Date): EndpointMonitor | undefined {
    const { next, effects } = transition(monitor, outcome, probedAt);
    if (!this.store.commit(monitor, next)) {
      logger.debug(`Discarding probe outcome for ${monitor.endpoint}: monitor changed during probe`, {
        endpoint: monitor.endpoint
      });
      return undefined;
    }

    this.metricsCollector.recordProbe(next, outcome);
    this.logTransition(monitor, next);
    this.executeEffects(next, effects);
    return next;
  }

  private executeEffects(monitor: EndpointMonitor, effects: MonitorEffect[]): void {
    if (effects.length === 0) {
      return;
    }

    const failoverSuccess = effects.includes('trigger_failover')
      ? this.failoverCoordinator.failover(monitor.endpoint)
      : false;

    if (effects.includes('raise_alert')) {
      const alert = this.alertLog.append({
        timestamp: this.clock.now(),
        type: 'endpoint_unhealthy',
        endpoint: monitor.endpoint,
        state: monitor.state,
        consecutiveFailures: monitor.consecutiveFailures,
        lastError: monitor.lastError ?? 'Unknown error',
        actionTaken: 'failover_attempted',
        failoverSuccess
      });
      alertsTotal.inc({ state: monitor.state });

      logger.error(`ALERT: Endpoint ${monitor.endpoint} is unhealthy - ${monitor.consecutiveFailures} failures`, {
        alertId: alert.id,
        endpoint: monitor.endpoint,
        state: monitor.state,
        lastError: alert.lastError,
        failoverSuccess,
        event: 'endpoint_unhealthy'
      });
    }
  }

  private logTransition(previous: EndpointMonitor, next: EndpointMonitor): void {
    if (next.state === EndpointState.HEALTHY) {
      if (previous.state !== EndpointState.HEALTHY && previous.state !== EndpointState.INITIALIZING) {
        logger.info('Endpoint recovered - marked as healthy', {
          endpoint: next.endpoint,
          previousState: previous.state,
          responseTimeMs: next.lastResponseTimeMs,
          event: 'endpoint_recovered'
        });
      }
      return;
    }

    if (next.state === EndpointState.DEGRADED) {
      logger.warn(`Endpoint ${next.endpoint} health check failed (${next.consecutiveFailures}/${next.config.failureThreshold})`, {
        endpoint: next.endpoint,
        error: next.lastError,
        consecutiveFailures: next.consecutiveFailures,
        remainingFailures: next.config.failureThreshold - next.consecutiveFailures
      });
    }
  }

  private async safeProbe(monitor: EndpointMonitor): Promise<ProbeOutcome> {
    try {
      return await this.prober.probe(monitor.endpoint, {
        timeoutMs: monitor.config.timeoutMs,
        expectedStatus: monitor.config.expectedStatus
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Prober failed for ${monitor.endpoint}`, {
        endpoint: monitor.endpoint,
        error: message,
        stack: error instanceof Error ? error.stack : undefined
      });
      return { kind: 'other_error', message };
    }
  }

  private async run(): Promise<void> {
    logger.info('Starting health monitoring loop', { tickMs: this.tickMs, idleMs: this.idleMs });

    while (!this.stopRequested) {
      if (this.store.size === 0) {
        await this.pause(this.idleMs);
        continue;
      }

      try {
        await this.tick();
      } catch (error) {
        logger.error('Health monitoring tick failed', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
      if (!this.stopRequested) {
        await this.pause(this.tickMs);
      }
    }

    logger.info('Health monitoring loop stopped');
  }

  private pause(ms: number): Promise<void> {
    if (this.sleepFn) {
      return this.sleepFn(ms);
    }
    return new Promise(resolve => {
      const timer = setTimeout(() => finish(), ms);
      const finish = (): void => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
      this.wake = finish;
    });
  }
}
