import { z } from 'zod';

const positiveInt = (field: string) => z.number().int(`${field} must be an integer`).positive(`${field} must be positive`);

// Health check settings, shared by the config file and the registration API
export const healthCheckConfigSchema = z.object({
  expectedStatus: z.number().int().min(100).max(599),
  timeoutMs: positiveInt('timeoutMs'),
  pollIntervalMs: positiveInt('pollIntervalMs'),
  failureThreshold: positiveInt('failureThreshold')
});

export const controllerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  monitor: z.object({
    tickMs: positiveInt('monitor.tickMs'),
    idleMs: positiveInt('monitor.idleMs'),
    reregistration: z.enum(['preserve-counters', 'reset-counters']).default('preserve-counters')
  }),
  healthCheck: healthCheckConfigSchema,
  provider: z.object({
    type: z.enum(['noop', 'webhook']),
    webhookUrl: z.string().url('provider.webhookUrl must be a valid URL').optional(),
    timeoutMs: positiveInt('provider.timeoutMs').default(5000)
  }),
  alerts: z.object({
    maxHistory: positiveInt('alerts.maxHistory').default(100)
  }).default({}),
  monitoring: z.object({
    enabled: z.boolean(),
    metricsEndpoint: z.string().startsWith('/')
  }),
  security: z.object({
    adminApiKey: z.string().optional(),
    requireAuth: z.boolean().optional()
  }).optional()
});

// Endpoint registration; interval is in seconds like the command grammar
export const registerEndpointSchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  interval: z.number().int().min(1, 'interval must be at least 1 second').max(86400).optional(),
  expectedStatus: z.number().int().min(100).max(599).optional(),
  timeout: z.number().positive('timeout must be positive').max(300).optional(),
  failureThreshold: z.number().int().min(1).max(100).optional()
});

export const trafficRuleSchema = z.object({
  source: z.string().trim().min(1, 'source is required'),
  target: z.string().trim().min(1, 'target is required'),
  weight: z.number().default(100),
  condition: z.string().optional()
});

export const autoScaleRuleSchema = z.object({
  metric: z.enum(['cpu', 'memory', 'disk', 'network'], {
    errorMap: () => ({ message: 'metric must be one of: cpu, memory, disk, network' })
  }),
  threshold: z.number().finite(),
  action: z.enum(['scale_up', 'scale_down'], {
    errorMap: () => ({ message: 'action must be one of: scale_up, scale_down' })
  })
});

export const commandSchema = z.object({
  command: z.string().trim().min(1, 'No command provided')
});

export type RegisterEndpointInput = z.infer<typeof registerEndpointSchema>;
export type TrafficRuleInput = z.infer<typeof trafficRuleSchema>;
export type AutoScaleRuleInput = z.infer<typeof autoScaleRuleSchema>;
