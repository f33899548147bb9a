import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import { Request, Response, NextFunction } from 'express';

// Create a Registry to register the metrics
export const register = new Registry();

register.setDefaultLabels({
  app: 'traffic-controller'
});

// Request metrics
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 3, 5]
});

export const httpRequestTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code']
});

// Probe metrics
export const probeResultsTotal = new Counter({
  name: 'probe_results_total',
  help: 'Total number of endpoint probes by outcome',
  labelNames: ['endpoint', 'outcome']
});

export const probeResponseTime = new Histogram({
  name: 'probe_response_time_seconds',
  help: 'Response time of successful and unexpected-status probes in seconds',
  labelNames: ['endpoint'],
  buckets: [0.1, 0.3, 0.5, 0.7, 1, 2, 3, 5, 10]
});

export const endpointHealthStatus = new Gauge({
  name: 'endpoint_health_status',
  help: 'Health status of monitored endpoints (1 = healthy, 0 = not healthy)',
  labelNames: ['endpoint']
});

export const endpointConsecutiveFailures = new Gauge({
  name: 'endpoint_consecutive_failures',
  help: 'Consecutive failed probes per endpoint',
  labelNames: ['endpoint']
});

// Failover and alert metrics
export const alertsTotal = new Counter({
  name: 'alerts_total',
  help: 'Total number of alerts raised',
  labelNames: ['state']
});

export const failoversTotal = new Counter({
  name: 'failovers_total',
  help: 'Total number of failover attempts',
  labelNames: ['result']
});

export const providerFailuresTotal = new Counter({
  name: 'provider_failures_total',
  help: 'Total number of failed provider adapter calls',
  labelNames: ['operation']
});

// Register all metrics
register.registerMetric(httpRequestDuration);
register.registerMetric(httpRequestTotal);
register.registerMetric(probeResultsTotal);
register.registerMetric(probeResponseTime);
register.registerMetric(endpointHealthStatus);
register.registerMetric(endpointConsecutiveFailures);
register.registerMetric(alertsTotal);
register.registerMetric(failoversTotal);
register.registerMetric(providerFailuresTotal);

/**
 * Prometheus metrics middleware
 */
export function prometheusMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const route = req.route?.path || req.path;
    const statusCode = res.statusCode.toString();

    httpRequestDuration.observe({ method: req.method, route, status_code: statusCode }, duration);
    httpRequestTotal.inc({ method: req.method, route, status_code: statusCode });
  });

  next();
}
