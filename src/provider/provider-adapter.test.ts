import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import http from 'http';
import { AddressInfo } from 'net';
import { createProviderAdapter, NoopProviderAdapter, WebhookProviderAdapter } from './index';
import { ProviderDispatcher } from './provider-dispatcher';
import { MetricsCollector } from '../metrics/metrics-collector';

interface Received {
  path?: string;
  body: unknown;
}

describe('createProviderAdapter', () => {
  it('builds the simulated adapter by default', () => {
    const adapter = createProviderAdapter({ type: 'noop', timeoutMs: 5000 });

    expect(adapter).toBeInstanceOf(NoopProviderAdapter);
    expect(adapter.mode).toBe('MOCK');
  });

  it('builds the webhook adapter in LIVE mode', () => {
    const adapter = createProviderAdapter({ type: 'webhook', webhookUrl: 'http://127.0.0.1:9/provider', timeoutMs: 5000 });

    expect(adapter).toBeInstanceOf(WebhookProviderAdapter);
    expect(adapter.mode).toBe('LIVE');
  });

  it('requires a URL for the webhook adapter', () => {
    expect(() => createProviderAdapter({ type: 'webhook', timeoutMs: 5000 }))
      .toThrow('provider.webhookUrl is required when provider.type is "webhook"');
  });
});

describe('WebhookProviderAdapter', () => {
  let server: http.Server;
  let baseUrl: string;
  let received: Received[] = [];
  let failNext = false;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      let raw = '';
      req.on('data', chunk => {
        raw += chunk;
      });
      req.on('end', () => {
        received.push({ path: req.url, body: JSON.parse(raw) });
        res.writeHead(failNext ? 500 : 202, { 'Content-Type': 'application/json' });
        res.end('{}');
      });
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const { port } = server.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${port}/provider`;
  });

  afterEach(() => {
    received = [];
    failNext = false;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('posts traffic shifts and scaling alarms as JSON', async () => {
    const adapter = new WebhookProviderAdapter(baseUrl, 2000);

    await adapter.applyTrafficShift({ from: 'https://a.example.com', to: 'https://b.example.com', weight: 100, reason: 'failover' });
    await adapter.createScalingAlarm({
      alarmName: 'traffic-controller-cpu-scale_up-1',
      metric: 'cpu',
      threshold: 80,
      action: 'scale_up',
      cooldownSeconds: 300
    });

    expect(received).toEqual([
      {
        path: '/provider/traffic-shifts',
        body: { from: 'https://a.example.com', to: 'https://b.example.com', weight: 100, reason: 'failover' }
      },
      {
        path: '/provider/scaling-alarms',
        body: { alarmName: 'traffic-controller-cpu-scale_up-1', metric: 'cpu', threshold: 80, action: 'scale_up', cooldownSeconds: 300 }
      }
    ]);
  });

  it('surfaces provider errors through the dispatcher metrics', async () => {
    failNext = true;
    const metrics = new MetricsCollector();
    const dispatcher = new ProviderDispatcher(new WebhookProviderAdapter(baseUrl, 2000), metrics);

    dispatcher.shiftTraffic({ from: 'a', to: 'b', weight: 10, reason: 'traffic_rule' });
    await dispatcher.idle();

    expect(received).toHaveLength(1);
    expect(metrics.getMetrics().providerFailures).toBe(1);
    expect(dispatcher.mode).toBe('LIVE');
  });
});
