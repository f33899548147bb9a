import { ProviderMode, ScalingAlarmIntent, TrafficShiftIntent } from '../types';
import { logger } from '../utils/logger';

/**
 * Boundary towards the infrastructure that actually moves traffic and
 * creates alarms. The engine calls it fire-and-forget.
 */
export interface ProviderAdapter {
  readonly mode: ProviderMode;
  applyTrafficShift(intent: TrafficShiftIntent): Promise<void>;
  createScalingAlarm(intent: ScalingAlarmIntent): Promise<void>;
}

/**
 * Simulated provider: logs intents and changes nothing
 */
export class NoopProviderAdapter implements ProviderAdapter {
  readonly mode: ProviderMode = 'MOCK';

  async applyTrafficShift(intent: TrafficShiftIntent): Promise<void> {
    logger.info(`MOCK: Routing ${intent.weight}% traffic from ${intent.from} to ${intent.to}`, {
      reason: intent.reason
    });
  }

  async createScalingAlarm(intent: ScalingAlarmIntent): Promise<void> {
    logger.info(`MOCK: Auto-scaling rule - ${intent.action} when ${intent.metric} ${intent.threshold}%`, {
      alarmName: intent.alarmName
    });
  }
}
