import { ControllerConfig } from '../types';
import { NoopProviderAdapter, ProviderAdapter } from './provider-adapter';
import { WebhookProviderAdapter } from './webhook-provider-adapter';

export { NoopProviderAdapter, WebhookProviderAdapter };
export type { ProviderAdapter };

export function createProviderAdapter(config: ControllerConfig['provider']): ProviderAdapter {
  if (config.type === 'webhook') {
    if (!config.webhookUrl) {
      throw new Error('provider.webhookUrl is required when provider.type is "webhook"');
    }
    return new WebhookProviderAdapter(config.webhookUrl, config.timeoutMs);
  }
  return new NoopProviderAdapter();
}
