import { AlertLog } from '../alerts/alert-log';
import { FailoverCoordinator } from '../failover/failover-coordinator';
import { HealthRecordStore, ReregistrationPolicy } from '../health/health-record-store';
import { MonitorHandle, MonitorLoop, MonitorLoopOptions, systemClock } from '../health/monitor-loop';
import { HttpProber, Prober } from '../health/prober';
import { MetricsCollector } from '../metrics/metrics-collector';
import { NoopProviderAdapter, ProviderAdapter } from '../provider/provider-adapter';
import { ProviderDispatcher } from '../provider/provider-dispatcher';
import { AutoScaleRules } from '../scaling/auto-scale-rules';
import {
  EndpointDetail,
  StatusAggregator,
  SystemStatus,
  TargetStatus,
  describeEndpoint
} from '../status/status-aggregator';
import { TrafficTable } from '../traffic/traffic-table';
import {
  Alert,
  AutoScaleRule,
  Clock,
  HealthCheckConfig,
  OperationResult,
  ProviderMode,
  ScalingAction,
  ScalingMetric,
  SystemMetrics,
  TrafficRule
} from '../types';
import { logger } from '../utils/logger';
import { autoScaleRuleSchema, healthCheckConfigSchema } from '../utils/validation-schemas';

export const DEFAULT_HEALTH_CHECK: HealthCheckConfig = {
  expectedStatus: 200,
  timeoutMs: 10000,
  pollIntervalMs: 30000,
  failureThreshold: 3
};

export const DEFAULT_ALERT_LIMIT = 50;

export interface TrafficControllerOptions {
  healthCheck?: Partial<HealthCheckConfig>;
  monitor?: MonitorLoopOptions;
  prober?: Prober;
  provider?: ProviderAdapter;
  clock?: Clock;
  alertHistory?: number;
  reregistration?: ReregistrationPolicy;
  /** Start the monitor loop on the first registration (default true) */
  autoStart?: boolean;
}

export interface EndpointOverrides {
  expectedStatus?: number;
  timeoutSeconds?: number;
  failureThreshold?: number;
}

export type RegisterResult = OperationResult<{ endpoint: string; interval: number; monitoringActive: boolean }>;
export type RuleResult<R> = OperationResult<{ ruleId: number; rule: R }>;
export type TargetStatusResult = OperationResult<TargetStatus>;

export interface EndpointListing extends EndpointDetail {
  createdAt: string;
}

/**
 * Adds `https://` to identities given without a scheme and checks the result
 * parses as an http(s) URL. Returns undefined for malformed input.
 */
export function normalizeEndpoint(raw: string): string | undefined {
  const trimmed = raw.trim();
  if (trimmed.length === 0 || /\s/.test(trimmed)) {
    return undefined;
  }

  const endpoint = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    const url = new URL(endpoint);
    if ((url.protocol !== 'http:' && url.protocol !== 'https:') || url.hostname.length === 0) {
      return undefined;
    }
  } catch {
    return undefined;
  }
  return endpoint;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns every collection of one controller instance and exposes the operations
 * front ends are allowed to call. All of them work on in-memory state only
 * and return structured results instead of throwing.
 */
export class TrafficController {
  private readonly store: HealthRecordStore;
  private readonly trafficTable: TrafficTable = new TrafficTable();
  private readonly autoScaleRules: AutoScaleRules = new AutoScaleRules();
  private readonly alertLog: AlertLog;
  private readonly metricsCollector: MetricsCollector = new MetricsCollector();
  private readonly provider: ProviderDispatcher;
  private readonly failoverCoordinator: FailoverCoordinator;
  private readonly monitorLoop: MonitorLoop;
  private readonly statusAggregator: StatusAggregator;
  private readonly healthCheckDefaults: HealthCheckConfig;
  private readonly clock: Clock;
  private readonly autoStart: boolean;

  constructor(options: TrafficControllerOptions = {}) {
    this.clock = options.clock ?? options.monitor?.clock ?? systemClock;
    this.healthCheckDefaults = { ...DEFAULT_HEALTH_CHECK, ...options.healthCheck };
    this.autoStart = options.autoStart ?? true;

    this.store = new HealthRecordStore(options.reregistration);
    this.alertLog = new AlertLog(options.alertHistory);
    this.provider = new ProviderDispatcher(options.provider ?? new NoopProviderAdapter(), this.metricsCollector);
    this.failoverCoordinator = new FailoverCoordinator(this.store, this.provider, this.metricsCollector);
    this.monitorLoop = new MonitorLoop(
      this.store,
      options.prober ?? new HttpProber(),
      this.failoverCoordinator,
      this.alertLog,
      this.metricsCollector,
      { ...options.monitor, clock: this.clock }
    );
    this.statusAggregator = new StatusAggregator({
      store: this.store,
      trafficTable: this.trafficTable,
      autoScaleRules: this.autoScaleRules,
      alertLog: this.alertLog,
      metricsCollector: this.metricsCollector,
      clock: this.clock,
      isMonitoringActive: () => this.monitorLoop.isRunning(),
      mode: () => this.provider.mode
    });

    logger.info(`Traffic controller initialized (${this.provider.mode} mode)`, {
      mode: this.provider.mode,
      healthCheckDefaults: this.healthCheckDefaults
    });
  }

  get mode(): ProviderMode {
    return this.provider.mode;
  }

  registerEndpoint(url: string, intervalSeconds: number = 30, overrides: EndpointOverrides = {}): RegisterResult {
    this.metricsCollector.recordRequest();

    const endpoint = normalizeEndpoint(url);
    if (!endpoint) {
      return { status: 'error', message: `Invalid endpoint: "${url}"` };
    }

    const parsed = healthCheckConfigSchema.safeParse({
      expectedStatus: overrides.expectedStatus ?? this.healthCheckDefaults.expectedStatus,
      timeoutMs: overrides.timeoutSeconds !== undefined
        ? Math.round(overrides.timeoutSeconds * 1000)
        : this.healthCheckDefaults.timeoutMs,
      pollIntervalMs: Math.round(intervalSeconds * 1000),
      failureThreshold: overrides.failureThreshold ?? this.healthCheckDefaults.failureThreshold
    });
    if (!parsed.success) {
      return {
        status: 'error',
        message: parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
      };
    }

    const { replaced } = this.store.register(endpoint, parsed.data, this.clock.now());
    logger.info(replaced ? 'Health check reconfigured' : 'Health check configured', {
      endpoint,
      intervalSeconds,
      config: parsed.data
    });

    if (this.autoStart && !this.monitorLoop.isRunning()) {
      this.startMonitoring();
    }

    return {
      status: 'success',
      message: `Health check configured for ${endpoint}`,
      endpoint,
      interval: intervalSeconds,
      monitoringActive: this.monitorLoop.isRunning()
    };
  }

  unregisterEndpoint(url: string): OperationResult<{ endpoint: string }> {
    this.metricsCollector.recordRequest();

    const endpoint = normalizeEndpoint(url);
    if (!endpoint || !this.store.remove(endpoint)) {
      return { status: 'error', message: `Endpoint not found: "${url}"` };
    }

    this.metricsCollector.forgetEndpoint(endpoint);
    logger.info('Health check removed', { endpoint, remainingEndpoints: this.store.size });
    return { status: 'success', message: `Health check removed for ${endpoint}`, endpoint };
  }

  addTrafficRule(source: string, target: string, weight: number = 100, condition?: string): RuleResult<TrafficRule> {
    this.metricsCollector.recordRequest();

    if (source.trim().length === 0 || target.trim().length === 0) {
      return { status: 'error', message: 'source and target are required' };
    }
    if (Number.isNaN(weight)) {
      return { status: 'error', message: 'weight must be a number' };
    }

    const { ruleId, rule } = this.trafficTable.addRule(source.trim(), target.trim(), weight, condition);
    this.metricsCollector.recordTrafficRule();
    this.provider.shiftTraffic({ from: rule.sourcePattern, to: rule.target, weight: rule.weight, reason: 'traffic_rule' });

    logger.info('Traffic rule created', { ruleId, ...rule, requestedWeight: weight });
    return {
      status: 'success',
      message: `Traffic routing configured: ${rule.weight}% from ${rule.sourcePattern} to ${rule.target}`,
      ruleId,
      rule
    };
  }

  addAutoScaleRule(metric: ScalingMetric, threshold: number, action: ScalingAction): RuleResult<AutoScaleRule> {
    this.metricsCollector.recordRequest();

    const parsed = autoScaleRuleSchema.safeParse({ metric, threshold, action });
    if (!parsed.success) {
      return { status: 'error', message: parsed.error.errors.map(issue => issue.message).join('; ') };
    }

    const { ruleId, rule } = this.autoScaleRules.addRule(parsed.data.metric, parsed.data.threshold, parsed.data.action);
    this.metricsCollector.recordAutoScaleRule();
    this.provider.createScalingAlarm({
      alarmName: `traffic-controller-${rule.metric}-${rule.action}-${ruleId}`,
      ...rule
    });

    logger.info('Auto-scaling rule created', { ruleId, ...rule });
    return {
      status: 'success',
      message: `Auto-scaling configured: ${rule.action} when ${rule.metric} reaches ${rule.threshold}%`,
      ruleId,
      rule
    };
  }

  getStatus(): SystemStatus;
  getStatus(target: string): TargetStatusResult;
  getStatus(target?: string): SystemStatus | TargetStatusResult {
    if (target === undefined) {
      return this.statusAggregator.getSystemStatus();
    }
    const found = this.statusAggregator.getTargetStatus(target);
    if (!found) {
      return { status: 'error', message: `No endpoints found matching "${target}"` };
    }
    return { status: 'success', message: `${found.matches} endpoint(s) matching "${target}"`, ...found };
  }

  getRecommendations(): string[] {
    return this.statusAggregator.getRecommendations();
  }

  getAlerts(limit: number = DEFAULT_ALERT_LIMIT): Alert[] {
    return this.alertLog.recent(limit);
  }

  get totalAlerts(): number {
    return this.alertLog.size;
  }

  getEndpoints(): Record<string, EndpointListing> {
    const endpoints: Record<string, EndpointListing> = {};
    for (const monitor of this.store.snapshot()) {
      endpoints[monitor.endpoint] = {
        ...describeEndpoint(monitor),
        createdAt: monitor.createdAt.toISOString()
      };
    }
    return endpoints;
  }

  getTrafficRules(): TrafficRule[] {
    return this.trafficTable.getRules();
  }

  getAutoScaleRules(): AutoScaleRule[] {
    return this.autoScaleRules.getRules();
  }

  getMetrics(): SystemMetrics {
    return this.metricsCollector.getMetrics();
  }

  /**
   * Drops every endpoint, rule and alert. Metrics go back to zero except the
   * lifetime request count, which counts this call too.
   */
  clearAll(): OperationResult {
    try {
      this.store.clear();
      this.trafficTable.clear();
      this.autoScaleRules.clear();
      this.alertLog.clear();
      this.failoverCoordinator.reset();
      this.metricsCollector.reset();
      this.metricsCollector.recordRequest();
      logger.info('System configuration cleared');
      return { status: 'success', message: 'All configurations cleared and system reset' };
    } catch (error) {
      logger.error('Failed to clear configuration', { error: errorMessage(error) });
      return { status: 'error', message: errorMessage(error) };
    }
  }

  isMonitoringActive(): boolean {
    return this.monitorLoop.isRunning();
  }

  startMonitoring(): MonitorHandle {
    const handle = this.monitorLoop.start();
    logger.info('Health monitoring started');
    return handle;
  }

  stopMonitoring(): void {
    this.monitorLoop.stop();
  }

  /**
   * Runs one monitor pass immediately, independent of the background loop
   */
  tick(): Promise<number> {
    return this.monitorLoop.tick();
  }

  /**
   * Stops the loop and waits for it and for pending provider calls to settle
   */
  async shutdown(): Promise<void> {
    this.monitorLoop.stop();
    await this.monitorLoop.stopped();
    await this.provider.idle();
  }

  /**
   * Resolves once every provider call dispatched so far has settled
   */
  providerIdle(): Promise<void> {
    return this.provider.idle();
  }
}
