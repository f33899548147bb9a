export enum EndpointState {
  INITIALIZING = 'initializing',
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
  TIMED_OUT = 'timeout',
  CONNECTION_ERROR = 'connection_error',
  ERROR = 'error'
}

export interface HealthCheckConfig {
  expectedStatus: number;
  timeoutMs: number;
  pollIntervalMs: number;
  failureThreshold: number; // consecutive failures before entering a failure state
}

export interface EndpointMonitor {
  endpoint: string;
  config: Readonly<HealthCheckConfig>;
  state: EndpointState;
  consecutiveFailures: number;
  successCount: number;
  failureCount: number;
  lastProbeAt?: Date;
  lastResponseTimeMs?: number;
  lastError?: string;
  createdAt: Date;
}

export type ProbeOutcome =
  | { kind: 'success'; statusCode: number; responseTimeMs: number }
  | { kind: 'unexpected_status'; statusCode: number; responseTimeMs: number }
  | { kind: 'timeout' }
  | { kind: 'connection_failed'; message: string }
  | { kind: 'other_error'; message: string };

export type MonitorEffect = 'raise_alert' | 'trigger_failover';

export interface TrafficRule {
  sourcePattern: string;
  target: string;
  weight: number;
  condition?: string;
}

export type ScalingMetric = 'cpu' | 'memory' | 'disk' | 'network';
export type ScalingAction = 'scale_up' | 'scale_down';

export interface AutoScaleRule {
  metric: ScalingMetric;
  threshold: number;
  action: ScalingAction;
  cooldownSeconds: number;
}

export interface Alert {
  id: number;
  timestamp: Date;
  type: 'endpoint_unhealthy';
  endpoint: string;
  state: EndpointState;
  consecutiveFailures: number;
  lastError: string;
  actionTaken: 'failover_attempted';
  failoverSuccess: boolean;
}

export interface SystemMetrics {
  totalRequests: number;
  successfulHealthChecks: number;
  failedHealthChecks: number;
  trafficRoutesCreated: number;
  autoScaleTriggers: number;
  failoversTriggered: number;
  providerFailures: number;
}

export type ProviderMode = 'LIVE' | 'MOCK';

export interface TrafficShiftIntent {
  from: string;
  to: string;
  weight: number;
  reason: 'failover' | 'traffic_rule';
}

export interface ScalingAlarmIntent {
  alarmName: string;
  metric: ScalingMetric;
  threshold: number;
  action: ScalingAction;
  cooldownSeconds: number;
}

export interface Clock {
  now(): Date;
}

export type OperationResult<T extends object = object> =
  | ({ status: 'success'; message: string } & T)
  | { status: 'error'; message: string };

export interface ControllerConfig {
  port: number;
  monitor: {
    tickMs: number;
    idleMs: number;
    reregistration: 'preserve-counters' | 'reset-counters';
  };
  healthCheck: HealthCheckConfig;
  provider: {
    type: 'noop' | 'webhook';
    webhookUrl?: string;
    timeoutMs: number;
  };
  alerts: {
    maxHistory: number;
  };
  monitoring: {
    enabled: boolean;
    metricsEndpoint: string;
  };
  security?: {
    adminApiKey?: string;
    requireAuth?: boolean;
  };
}
