import { EndpointMonitor, EndpointState, MonitorEffect, ProbeOutcome } from '../types';

export interface Transition {
  next: EndpointMonitor;
  effects: MonitorEffect[];
}

const FAILURE_STATES: Record<Exclude<ProbeOutcome['kind'], 'success'>, EndpointState> = {
  unexpected_status: EndpointState.UNHEALTHY,
  timeout: EndpointState.TIMED_OUT,
  connection_failed: EndpointState.CONNECTION_ERROR,
  other_error: EndpointState.ERROR
};

export function isFailureState(state: EndpointState): boolean {
  return state !== EndpointState.HEALTHY
    && state !== EndpointState.DEGRADED
    && state !== EndpointState.INITIALIZING;
}

function describeFailure(outcome: Exclude<ProbeOutcome, { kind: 'success' }>): string {
  switch (outcome.kind) {
    case 'unexpected_status':
      return `HTTP ${outcome.statusCode}`;
    case 'timeout':
      return 'Request timeout';
    case 'connection_failed':
      return outcome.message ? `Connection failed: ${outcome.message}` : 'Connection failed';
    case 'other_error':
      return outcome.message;
  }
}

/**
 * Applies one probe outcome to a monitor. Pure: the probe time is an input
 * and the returned monitor is a new object.
 *
 * A `success` whose status differs from the configured expected status is
 * treated like `unexpected_status`. Once the failure threshold is reached,
 * every further failing probe emits the alert and failover effects again.
 */
export function transition(monitor: EndpointMonitor, outcome: ProbeOutcome, probedAt: Date): Transition {
  if (outcome.kind === 'success' && outcome.statusCode === monitor.config.expectedStatus) {
    return {
      next: {
        ...monitor,
        state: EndpointState.HEALTHY,
        consecutiveFailures: 0,
        successCount: monitor.successCount + 1,
        lastResponseTimeMs: Math.round(outcome.responseTimeMs * 100) / 100,
        lastProbeAt: probedAt
      },
      effects: []
    };
  }

  const failure: Exclude<ProbeOutcome, { kind: 'success' }> = outcome.kind === 'success'
    ? { kind: 'unexpected_status', statusCode: outcome.statusCode, responseTimeMs: outcome.responseTimeMs }
    : outcome;

  const consecutiveFailures = monitor.consecutiveFailures + 1;
  const thresholdReached = consecutiveFailures >= monitor.config.failureThreshold;

  return {
    next: {
      ...monitor,
      state: thresholdReached ? FAILURE_STATES[failure.kind] : EndpointState.DEGRADED,
      consecutiveFailures,
      failureCount: monitor.failureCount + 1,
      lastError: describeFailure(failure),
      lastProbeAt: probedAt
    },
    effects: thresholdReached ? ['raise_alert', 'trigger_failover'] : []
  };
}
