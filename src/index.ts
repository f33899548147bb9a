import http from 'http';
import { createApp } from './app';
import { TrafficController } from './controller/traffic-controller';
import { createProviderAdapter } from './provider';
import { ControllerConfig } from './types';
import { loadConfig } from './utils/config-loader';
import { logger } from './utils/logger';

// Load configuration first
const config: ControllerConfig = loadConfig();
logger.info('Configuration loaded', {
  port: config.port,
  provider: config.provider.type,
  monitor: config.monitor,
  healthCheck: config.healthCheck
});

const isProduction = process.env.NODE_ENV === 'production';
const requireAuth = config.security?.requireAuth !== false;

const controller = new TrafficController({
  healthCheck: config.healthCheck,
  monitor: { tickMs: config.monitor.tickMs, idleMs: config.monitor.idleMs },
  reregistration: config.monitor.reregistration,
  provider: createProviderAdapter(config.provider),
  alertHistory: config.alerts.maxHistory,
  autoStart: config.monitoring.enabled
});

const app = createApp(controller, {
  adminApiKey: config.security?.adminApiKey,
  requireAuth,
  isProduction,
  metricsEndpoint: config.monitoring.metricsEndpoint,
  corsOrigins: process.env.CORS_ORIGINS?.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
});

let server: http.Server | null = null;
let shuttingDown = false;

function errorDetails(reason: unknown): { error: string; stack?: string } {
  return reason instanceof Error
    ? { error: reason.message, stack: reason.stack }
    : { error: String(reason) };
}

// Graceful shutdown function
function gracefulShutdown(signal: string): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, shutting down gracefully`, { signal });

  const cleanup = (): void => {
    controller.shutdown()
      .then(() => {
        logger.info('Cleanup completed, exiting');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Cleanup failed', errorDetails(error));
        process.exit(1);
      });
  };

  // Force close after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();

  if (server) {
    server.close(() => {
      logger.info('HTTP server closed');
      cleanup();
    });
  } else {
    cleanup();
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection', errorDetails(reason));
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', {
    error: error.message,
    stack: error.stack
  });
  gracefulShutdown('uncaughtException');
});

server = app.listen(config.port, () => {
  logger.info(`Traffic controller started on HTTP port ${config.port}`, {
    port: config.port,
    mode: controller.mode,
    authRequired: requireAuth && Boolean(config.security?.adminApiKey),
    monitoringEnabled: config.monitoring.enabled,
    environment: process.env.NODE_ENV || 'development'
  });
});

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

export { app, controller };
