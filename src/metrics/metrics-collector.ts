import { EndpointMonitor, EndpointState, ProbeOutcome, SystemMetrics } from '../types';
import {
  endpointConsecutiveFailures,
  endpointHealthStatus,
  probeResponseTime,
  probeResultsTotal,
  providerFailuresTotal
} from '../utils/prometheus';

const PROBE_OUTCOMES: ProbeOutcome['kind'][] = ['success', 'unexpected_status', 'timeout', 'connection_failed', 'other_error'];

export class MetricsCollector {
  private metrics: SystemMetrics = MetricsCollector.emptyMetrics(0);
  // Endpoints this collector has written Prometheus series for
  private labelledEndpoints: Set<string> = new Set();

  private static emptyMetrics(totalRequests: number): SystemMetrics {
    return {
      totalRequests,
      successfulHealthChecks: 0,
      failedHealthChecks: 0,
      trafficRoutesCreated: 0,
      autoScaleTriggers: 0,
      failoversTriggered: 0,
      providerFailures: 0
    };
  }

  recordRequest(): void {
    this.metrics.totalRequests++;
  }

  recordProbe(monitor: EndpointMonitor, outcome: ProbeOutcome): void {
    const healthy = monitor.state === EndpointState.HEALTHY;
    if (healthy) {
      this.metrics.successfulHealthChecks++;
    } else {
      this.metrics.failedHealthChecks++;
    }

    this.labelledEndpoints.add(monitor.endpoint);
    probeResultsTotal.inc({ endpoint: monitor.endpoint, outcome: outcome.kind });
    if ('responseTimeMs' in outcome) {
      probeResponseTime.observe({ endpoint: monitor.endpoint }, outcome.responseTimeMs / 1000);
    }
    endpointHealthStatus.set({ endpoint: monitor.endpoint }, healthy ? 1 : 0);
    endpointConsecutiveFailures.set({ endpoint: monitor.endpoint }, monitor.consecutiveFailures);
  }

  recordTrafficRule(): void {
    this.metrics.trafficRoutesCreated++;
  }

  recordAutoScaleRule(): void {
    this.metrics.autoScaleTriggers++;
  }

  recordFailover(): void {
    this.metrics.failoversTriggered++;
  }

  recordProviderFailure(operation: string): void {
    this.metrics.providerFailures++;
    providerFailuresTotal.inc({ operation });
  }

  /**
   * Drops every Prometheus series labelled with the endpoint
   */
  forgetEndpoint(endpoint: string): void {
    endpointHealthStatus.remove({ endpoint });
    endpointConsecutiveFailures.remove({ endpoint });
    probeResponseTime.remove({ endpoint });
    for (const outcome of PROBE_OUTCOMES) {
      probeResultsTotal.remove({ endpoint, outcome });
    }
    this.labelledEndpoints.delete(endpoint);
  }

  getMetrics(): SystemMetrics {
    return { ...this.metrics };
  }

  /**
   * Zeroes every counter except the lifetime request count
   */
  reset(): void {
    this.metrics = MetricsCollector.emptyMetrics(this.metrics.totalRequests);
    for (const endpoint of Array.from(this.labelledEndpoints)) {
      this.forgetEndpoint(endpoint);
    }
  }
}
