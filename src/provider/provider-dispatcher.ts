import { ProviderAdapter } from './provider-adapter';
import { MetricsCollector } from '../metrics/metrics-collector';
import { ProviderMode, ScalingAlarmIntent, TrafficShiftIntent } from '../types';
import { logger } from '../utils/logger';

/**
 * Fire-and-forget gateway to the provider adapter. Failures are logged and
 * counted here and never reach the caller.
 */
export class ProviderDispatcher {
  private adapter: ProviderAdapter;
  private metricsCollector: MetricsCollector;
  private inFlight: Set<Promise<void>> = new Set();

  constructor(adapter: ProviderAdapter, metricsCollector: MetricsCollector) {
    this.adapter = adapter;
    this.metricsCollector = metricsCollector;
  }

  get mode(): ProviderMode {
    return this.adapter.mode;
  }

  shiftTraffic(intent: TrafficShiftIntent): void {
    this.dispatch('applyTrafficShift', () => this.adapter.applyTrafficShift(intent));
  }

  createScalingAlarm(intent: ScalingAlarmIntent): void {
    this.dispatch('createScalingAlarm', () => this.adapter.createScalingAlarm(intent));
  }

  /**
   * Resolves once every call dispatched so far has settled
   */
  async idle(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight));
  }

  private dispatch(operation: string, call: () => Promise<void>): void {
    let pending: Promise<void>;
    try {
      pending = call();
    } catch (error) {
      pending = Promise.reject(error);
    }

    const tracked = pending
      .catch((error: unknown) => {
        logger.error(`Provider ${operation} failed`, {
          operation,
          mode: this.adapter.mode,
          error: error instanceof Error ? error.message : String(error)
        });
        this.metricsCollector.recordProviderFailure(operation);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
