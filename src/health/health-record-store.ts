import { EndpointMonitor, EndpointState, HealthCheckConfig } from '../types';

export type ReregistrationPolicy = 'preserve-counters' | 'reset-counters';

export class HealthRecordStore {
  private monitors: Map<string, EndpointMonitor> = new Map();
  private policy: ReregistrationPolicy;

  constructor(policy: ReregistrationPolicy = 'preserve-counters') {
    this.policy = policy;
  }

  /**
   * Creates the monitor for an endpoint, or replaces the config of an existing
   * one and puts it back to `initializing`. Lifetime counters survive a
   * re-registration under the default policy.
   */
  register(endpoint: string, config: HealthCheckConfig, now: Date): { monitor: EndpointMonitor; replaced: boolean } {
    const existing = this.monitors.get(endpoint);
    const keepCounters = existing !== undefined && this.policy === 'preserve-counters';

    const monitor: EndpointMonitor = {
      endpoint,
      config: Object.freeze({ ...config }),
      state: EndpointState.INITIALIZING,
      consecutiveFailures: 0,
      successCount: keepCounters ? existing.successCount : 0,
      failureCount: keepCounters ? existing.failureCount : 0,
      createdAt: existing?.createdAt ?? now
    };

    this.monitors.set(endpoint, monitor);
    return { monitor, replaced: existing !== undefined };
  }

  remove(endpoint: string): boolean {
    return this.monitors.delete(endpoint);
  }

  get(endpoint: string): EndpointMonitor | undefined {
    return this.monitors.get(endpoint);
  }

  has(endpoint: string): boolean {
    return this.monitors.has(endpoint);
  }

  /**
   * Stores `next` only if `previous` is still the current record. Returns
   * false when the endpoint was removed or re-registered in the meantime.
   */
  commit(previous: EndpointMonitor, next: EndpointMonitor): boolean {
    if (this.monitors.get(previous.endpoint) !== previous) {
      return false;
    }
    this.monitors.set(next.endpoint, next);
    return true;
  }

  snapshot(): EndpointMonitor[] {
    return Array.from(this.monitors.values());
  }

  findHealthy(excluding?: string): EndpointMonitor[] {
    return this.snapshot().filter(m => m.state === EndpointState.HEALTHY && m.endpoint !== excluding);
  }

  get size(): number {
    return this.monitors.size;
  }

  clear(): void {
    this.monitors.clear();
  }
}
