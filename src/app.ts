import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { z, ZodError } from 'zod';
import { TrafficController } from './controller/traffic-controller';
import { parseCommand } from './commands/command-parser';
import { dispatchCommand } from './commands/command-dispatcher';
import { requestIdMiddleware } from './middleware/request-id';
import { allowAll, createAuthMiddleware } from './middleware/auth';
import { prometheusMiddleware, register } from './utils/prometheus';
import {
  autoScaleRuleSchema,
  commandSchema,
  registerEndpointSchema,
  trafficRuleSchema
} from './utils/validation-schemas';
import { sanitizeError } from './utils/security';
import { logger } from './utils/logger';

export const SERVICE_VERSION = '2.0.0';

export interface AppOptions {
  adminApiKey?: string;
  requireAuth?: boolean;
  isProduction?: boolean;
  metricsEndpoint?: string;
  corsOrigins?: string[];
}

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional()
});

const endpointQuerySchema = z.object({
  url: z.string().min(1, 'url query parameter is required')
});

// Helper function to format uptime
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${secs}s`;
  return `${secs}s`;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * HTTP façade over a controller. Every handler only touches in-memory state.
 */
export function createApp(controller: TrafficController, options: AppOptions = {}): Express {
  const app = express();
  const startedAt = Date.now();
  const isProduction = options.isProduction ?? false;

  let requireKey = allowAll;
  if (options.requireAuth !== false && options.adminApiKey) {
    requireKey = createAuthMiddleware(options.adminApiKey);
  } else if (options.requireAuth !== false) {
    logger.warn('No ADMIN_API_KEY configured - mutating API routes are unauthenticated');
  }

  app.use(helmet());
  app.use(cors({
    origin: options.corsOrigins && options.corsOrigins.length > 0 ? options.corsOrigins : !isProduction,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Request-ID']
  }));
  app.use(express.json({ limit: '1mb' }));
  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(prometheusMiddleware);

  app.post('/api/command', requireKey, (req: Request, res: Response) => {
    const { command } = commandSchema.parse(req.body);
    logger.info(`Processing command: ${command}`, { requestId: req.requestId });

    const parsed = parseCommand(command);
    const result = dispatchCommand(controller, parsed);

    res.json({
      command,
      parsed,
      result,
      recommendations: controller.getRecommendations(),
      timestamp: new Date().toISOString()
    });
  });

  app.get('/api/status', (req: Request, res: Response) => {
    res.json(controller.getStatus());
  });

  // Targets may contain '/', e.g. api.example.com/v1
  app.get(/^\/api\/status\/(.+)$/, (req: Request, res: Response) => {
    const result = controller.getStatus(req.params[0]);
    res.status(result.status === 'success' ? 200 : 404).json(result);
  });

  app.get('/api/recommendations', (req: Request, res: Response) => {
    res.json({
      recommendations: controller.getRecommendations(),
      timestamp: new Date().toISOString()
    });
  });

  app.get('/api/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'traffic-controller',
      version: SERVICE_VERSION,
      mode: controller.mode,
      monitoringActive: controller.isMonitoringActive()
    });
  });

  app.get('/api/metrics', (req: Request, res: Response) => {
    res.json({
      metrics: controller.getMetrics(),
      timestamp: new Date().toISOString(),
      uptime: formatUptime(Math.floor((Date.now() - startedAt) / 1000))
    });
  });

  app.get('/api/alerts', (req: Request, res: Response) => {
    const { limit } = limitQuerySchema.parse(req.query);
    res.json({
      alerts: controller.getAlerts(limit),
      totalAlerts: controller.totalAlerts,
      timestamp: new Date().toISOString()
    });
  });

  app.get('/api/endpoints', (req: Request, res: Response) => {
    const endpoints = controller.getEndpoints();
    res.json({
      endpoints,
      total: Object.keys(endpoints).length,
      timestamp: new Date().toISOString()
    });
  });

  app.post('/api/endpoints', requireKey, (req: Request, res: Response) => {
    const input = registerEndpointSchema.parse(req.body);
    const result = controller.registerEndpoint(input.url, input.interval, {
      expectedStatus: input.expectedStatus,
      timeoutSeconds: input.timeout,
      failureThreshold: input.failureThreshold
    });
    res.status(result.status === 'success' ? 201 : 400).json(result);
  });

  app.delete('/api/endpoints', requireKey, (req: Request, res: Response) => {
    const { url } = endpointQuerySchema.parse(req.query);
    const result = controller.unregisterEndpoint(url);
    res.status(result.status === 'success' ? 200 : 404).json(result);
  });

  app.get('/api/traffic-rules', (req: Request, res: Response) => {
    res.json({ rules: controller.getTrafficRules() });
  });

  app.post('/api/traffic-rules', requireKey, (req: Request, res: Response) => {
    const input = trafficRuleSchema.parse(req.body);
    const result = controller.addTrafficRule(input.source, input.target, input.weight, input.condition);
    res.status(result.status === 'success' ? 201 : 400).json(result);
  });

  app.get('/api/auto-scale-rules', (req: Request, res: Response) => {
    res.json({ rules: controller.getAutoScaleRules() });
  });

  app.post('/api/auto-scale-rules', requireKey, (req: Request, res: Response) => {
    const input = autoScaleRuleSchema.parse(req.body);
    const result = controller.addAutoScaleRule(input.metric, input.threshold, input.action);
    res.status(result.status === 'success' ? 201 : 400).json(result);
  });

  app.post('/api/clear', requireKey, (req: Request, res: Response) => {
    res.json(controller.clearAll());
  });

  // Prometheus metrics endpoint
  app.get(options.metricsEndpoint ?? '/metrics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.set('Content-Type', register.contentType);
      res.end(await register.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Endpoint not found' });
  });

  // Zod validation error handler
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (!(err instanceof ZodError)) {
      next(err);
      return;
    }

    const sanitized = sanitizeError(err, isProduction);
    logger.warn('Validation error', {
      errors: err.errors,
      requestId: req.requestId,
      path: req.path,
      method: req.method
    });

    res.status(400).json({
      error: 'Validation Error',
      message: sanitized.message,
      ...(sanitized.details && { details: sanitized.details }),
      requestId: req.requestId
    });
  });

  // Global error handling middleware (must be last)
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    const status = httpStatusOf(err);

    logger.error('Unhandled error', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      requestId: req.requestId,
      path: req.path,
      method: req.method
    });

    if (res.headersSent) {
      next(err);
      return;
    }

    const sanitized = sanitizeError(err, isProduction);
    res.status(status ?? 500).json({
      error: status && status < 500 ? 'Bad Request' : 'Internal Server Error',
      message: status ? sanitized.message : 'An unexpected error occurred',
      requestId: req.requestId
    });
  });

  return app;
}
