import { HealthRecordStore } from '../health/health-record-store';
import { TrafficTable } from '../traffic/traffic-table';
import { AutoScaleRules } from '../scaling/auto-scale-rules';
import { AlertLog } from '../alerts/alert-log';
import { MetricsCollector } from '../metrics/metrics-collector';
import { Clock, EndpointMonitor, EndpointState, ProviderMode, SystemMetrics } from '../types';

export const RECENT_ALERT_WINDOW_MS = 60 * 60 * 1000;
export const SLOW_RESPONSE_MS = 2000;

export type Uptime = 'N/A' | `${string}%`;

export interface EndpointDetail {
  status: EndpointState;
  lastCheck: string | null;
  failures: number;
  successCount: number;
  failureCount: number;
  responseTime: number | 'N/A';
  lastError: string | null;
  uptimePercentage: Uptime;
}

export interface EndpointSummary {
  status: EndpointState;
  responseTime: number | 'N/A';
  uptime: Uptime;
}

export interface SystemStatus {
  timestamp: string;
  overallStatus: 'healthy' | 'degraded';
  totalEndpoints: number;
  healthyEndpoints: number;
  trafficRules: number;
  autoScaleRules: number;
  monitoringActive: boolean;
  recentAlerts: number;
  metrics: SystemMetrics;
  avgResponseTimeMs: number;
  mode: ProviderMode;
  endpoints: Record<string, EndpointSummary>;
}

export interface TargetStatus {
  target: string;
  matches: number;
  results: Record<string, EndpointDetail>;
}

export interface StatusSources {
  store: HealthRecordStore;
  trafficTable: TrafficTable;
  autoScaleRules: AutoScaleRules;
  alertLog: AlertLog;
  metricsCollector: MetricsCollector;
  clock: Clock;
  isMonitoringActive(): boolean;
  mode(): ProviderMode;
}

export function calculateUptime(monitor: Pick<EndpointMonitor, 'successCount' | 'failureCount'>): Uptime {
  const total = monitor.successCount + monitor.failureCount;
  if (total === 0) {
    return 'N/A';
  }
  return `${((monitor.successCount / total) * 100).toFixed(1)}%`;
}

/**
 * Read-only summaries computed on demand from the live collections
 */
export class StatusAggregator {
  private sources: StatusSources;

  constructor(sources: StatusSources) {
    this.sources = sources;
  }

  getSystemStatus(): SystemStatus {
    const { store, trafficTable, autoScaleRules, metricsCollector, clock } = this.sources;
    const monitors = store.snapshot();
    const healthy = monitors.filter(m => m.state === EndpointState.HEALTHY);

    const responseTimes = healthy
      .map(m => m.lastResponseTimeMs)
      .filter((t): t is number => t !== undefined);
    const avgResponseTimeMs = responseTimes.length > 0
      ? Math.round((responseTimes.reduce((sum, t) => sum + t, 0) / responseTimes.length) * 100) / 100
      : 0;

    const endpoints: Record<string, EndpointSummary> = {};
    for (const monitor of monitors) {
      endpoints[monitor.endpoint] = {
        status: monitor.state,
        responseTime: monitor.lastResponseTimeMs ?? 'N/A',
        uptime: calculateUptime(monitor)
      };
    }

    return {
      timestamp: clock.now().toISOString(),
      overallStatus: monitors.length > 0 && healthy.length === monitors.length ? 'healthy' : 'degraded',
      totalEndpoints: monitors.length,
      healthyEndpoints: healthy.length,
      trafficRules: trafficTable.size,
      autoScaleRules: autoScaleRules.size,
      monitoringActive: this.sources.isMonitoringActive(),
      recentAlerts: this.countRecentAlerts(),
      metrics: metricsCollector.getMetrics(),
      avgResponseTimeMs,
      mode: this.sources.mode(),
      endpoints
    };
  }

  /**
   * Detail for every endpoint whose identity contains `target`, ignoring case.
   * Returns undefined when nothing matches.
   */
  getTargetStatus(target: string): TargetStatus | undefined {
    const needle = target.toLowerCase();
    const matching = this.sources.store.snapshot().filter(m => m.endpoint.toLowerCase().includes(needle));
    if (matching.length === 0) {
      return undefined;
    }

    const results: Record<string, EndpointDetail> = {};
    for (const monitor of matching) {
      results[monitor.endpoint] = describeEndpoint(monitor);
    }
    return { target, matches: matching.length, results };
  }

  getRecommendations(): string[] {
    const { store, trafficTable, autoScaleRules } = this.sources;
    const monitors = store.snapshot();
    const recommendations: string[] = [];

    const unhealthy = monitors.filter(
      m => m.state !== EndpointState.HEALTHY && m.state !== EndpointState.INITIALIZING
    );
    if (unhealthy.length > 0) {
      const sample = unhealthy.slice(0, 2).map(m => m.endpoint).join(', ');
      recommendations.push(`${unhealthy.length} endpoints are unhealthy. Check: ${sample}`);
    }

    const recentAlerts = this.countRecentAlerts();
    if (recentAlerts > 0) {
      recommendations.push(`${recentAlerts} alerts in the last hour. Check system health.`);
    }

    if (monitors.length < 2) {
      recommendations.push('Add more endpoints for redundancy and high availability.');
    }

    if (trafficTable.size === 0 && monitors.length > 1) {
      recommendations.push('Configure traffic routing rules for better load distribution.');
    }

    if (autoScaleRules.size === 0) {
      recommendations.push('Set up auto-scaling to handle traffic spikes automatically.');
    }

    const slow = monitors.filter(
      m => m.state === EndpointState.HEALTHY && (m.lastResponseTimeMs ?? 0) > SLOW_RESPONSE_MS
    );
    if (slow.length > 0) {
      recommendations.push(`${slow.length} endpoints have slow response times (>2s).`);
    }

    if (!this.sources.isMonitoringActive() && monitors.length > 0) {
      recommendations.push('Health monitoring is not active. Check system configuration.');
    }

    if (recommendations.length === 0) {
      recommendations.push('Your traffic management system is running optimally!');
    }
    return recommendations;
  }

  private countRecentAlerts(): number {
    const since = new Date(this.sources.clock.now().getTime() - RECENT_ALERT_WINDOW_MS);
    return this.sources.alertLog.countSince(since);
  }
}

export function describeEndpoint(monitor: EndpointMonitor): EndpointDetail {
  return {
    status: monitor.state,
    lastCheck: monitor.lastProbeAt ? monitor.lastProbeAt.toISOString() : null,
    failures: monitor.consecutiveFailures,
    successCount: monitor.successCount,
    failureCount: monitor.failureCount,
    responseTime: monitor.lastResponseTimeMs ?? 'N/A',
    lastError: monitor.lastError ?? null,
    uptimePercentage: calculateUptime(monitor)
  };
}
