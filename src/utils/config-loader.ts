import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { ControllerConfig } from '../types';
import { controllerConfigSchema } from './validation-schemas';

const CONFIG_RELATIVE_PATH = path.join('config', 'default-config.json');

/**
 * Finds `config/default-config.json` in the nearest ancestor of `fromDir`, so
 * the same lookup works from `src/utils` and from the built `dist/src/utils`.
 */
export function resolveDefaultConfigPath(fromDir: string = __dirname): string {
  let dir = path.resolve(fromDir);
  for (;;) {
    const candidate = path.join(dir, CONFIG_RELATIVE_PATH);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return path.resolve(fromDir, '../..', CONFIG_RELATIVE_PATH);
    }
    dir = parent;
  }
}

export const DEFAULT_CONFIG_PATH = resolveDefaultConfigPath();

function formatZodError(error: ZodError): string {
  return error.errors
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
    .join('; ');
}

/**
 * Environment variables win over the file
 */
function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config = { ...raw };

  if (env.PORT) {
    config.port = parseInt(env.PORT, 10);
  }

  if (env.PROVIDER_WEBHOOK_URL) {
    const provider = typeof config.provider === 'object' && config.provider !== null ? config.provider : {};
    config.provider = { ...provider, type: 'webhook', webhookUrl: env.PROVIDER_WEBHOOK_URL };
  }

  return config;
}

export function loadConfig(configPath: string = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): ControllerConfig {
  let configData: string;
  try {
    configData = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(configData);
  } catch (error) {
    throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Invalid configuration: expected a JSON object');
  }

  try {
    const config: ControllerConfig = controllerConfigSchema.parse(applyEnvOverrides({ ...raw }, env));
    if (env.ADMIN_API_KEY) {
      config.security = { ...config.security, adminApiKey: env.ADMIN_API_KEY };
    }
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`Invalid configuration: ${formatZodError(error)}`);
    }
    throw error;
  }
}
