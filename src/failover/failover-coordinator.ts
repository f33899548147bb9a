import { HealthRecordStore } from '../health/health-record-store';
import { ProviderDispatcher } from '../provider/provider-dispatcher';
import { MetricsCollector } from '../metrics/metrics-collector';
import { failoversTotal } from '../utils/prometheus';
import { logger } from '../utils/logger';

export interface FailoverDecision {
  success: boolean;
  target?: string;
}

/**
 * Picks a healthy alternative for a failing endpoint and asks the provider to
 * shift traffic to it. Candidates are taken round-robin so repeated
 * failovers spread over every healthy endpoint.
 */
export class FailoverCoordinator {
  private store: HealthRecordStore;
  private provider: ProviderDispatcher;
  private metricsCollector: MetricsCollector;
  private currentIndex: number = 0;

  constructor(store: HealthRecordStore, provider: ProviderDispatcher, metricsCollector: MetricsCollector) {
    this.store = store;
    this.provider = provider;
    this.metricsCollector = metricsCollector;
  }

  failover(failedEndpoint: string): boolean {
    return this.decide(failedEndpoint).success;
  }

  decide(failedEndpoint: string): FailoverDecision {
    logger.info(`Initiating failover for ${failedEndpoint}`, { endpoint: failedEndpoint });
    this.metricsCollector.recordFailover();

    const healthy = this.store.findHealthy(failedEndpoint);
    if (healthy.length === 0) {
      logger.error('No healthy endpoints available for failover', {
        endpoint: failedEndpoint,
        totalEndpoints: this.store.size,
        event: 'failover_failed'
      });
      failoversTotal.inc({ result: 'no_target' });
      return { success: false };
    }

    const target = healthy[this.currentIndex % healthy.length].endpoint;
    this.currentIndex = (this.currentIndex + 1) % healthy.length;

    logger.warn('Failover triggered', {
      endpoint: failedEndpoint,
      target,
      healthyEndpoints: healthy.map(m => m.endpoint),
      mode: this.provider.mode,
      event: 'failover_triggered'
    });
    failoversTotal.inc({ result: 'success' });

    this.provider.shiftTraffic({ from: failedEndpoint, to: target, weight: 100, reason: 'failover' });
    return { success: true, target };
  }

  reset(): void {
    this.currentIndex = 0;
  }
}
