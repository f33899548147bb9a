import axios, { AxiosInstance } from 'axios';
import { ProviderAdapter } from './provider-adapter';
import { ProviderMode, ScalingAlarmIntent, TrafficShiftIntent } from '../types';
import { logger } from '../utils/logger';

/**
 * Posts intents as JSON to an external service that owns the provider
 * credentials. Paths are relative to the configured base URL.
 */
export class WebhookProviderAdapter implements ProviderAdapter {
  readonly mode: ProviderMode = 'LIVE';
  private httpClient: AxiosInstance;

  constructor(baseURL: string, timeoutMs: number = 5000, httpClient?: AxiosInstance) {
    this.httpClient = httpClient ?? axios.create({ baseURL, timeout: timeoutMs });
  }

  async applyTrafficShift(intent: TrafficShiftIntent): Promise<void> {
    await this.httpClient.post('/traffic-shifts', intent);
    logger.info('Traffic shift sent to provider', { from: intent.from, to: intent.to, weight: intent.weight });
  }

  async createScalingAlarm(intent: ScalingAlarmIntent): Promise<void> {
    await this.httpClient.post('/scaling-alarms', intent);
    logger.info('Scaling alarm sent to provider', { alarmName: intent.alarmName });
  }
}
