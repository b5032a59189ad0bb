/**
 * Runtime configuration from the environment.
 */

import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './core/errors.js';
import type { LogLevel } from './services/logger.js';
import { DEFAULT_WORKER_INTERVAL_MS } from './services/scheduler/worker.js';

export const MIN_WORKER_INTERVAL_MS = 5_000;
export const MAX_WORKER_INTERVAL_MS = 5 * 60_000;

const DEVELOPMENT_TOKEN_SECRET = 'development-token-secret';

export interface AppConfig {
  dataDir: string;
  port: number;
  logLevel: LogLevel;
  workerEnabled: boolean;
  workerIntervalMs: number;
  seedDefaultSlots: boolean;
  tokenSecret: string;
  linkedin: {
    clientId?: string;
    clientSecret?: string;
  };
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function getWorkerIntervalMs(raw: string | undefined): number {
  const parsed = Number.parseInt(String(raw ?? ''), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return DEFAULT_WORKER_INTERVAL_MS;
  return Math.max(MIN_WORKER_INTERVAL_MS, Math.min(parsed, MAX_WORKER_INTERVAL_MS));
}

const optionalText = z.string().trim().optional().transform(value => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  DATA_DIR: z.string().trim().min(1).default('./data'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(5001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SCHEDULER_WORKER_ENABLED: z.string().optional(),
  SCHEDULER_WORKER_INTERVAL_MS: z.string().optional(),
  SCHEDULER_SEED_DEFAULT_SLOTS: z.string().optional(),
  TOKEN_ENCRYPTION_SECRET: optionalText,
  LINKEDIN_CLIENT_ID: optionalText,
  LINKEDIN_CLIENT_SECRET: optionalText,
});

/**
 * Validates the environment. Throws ConfigError listing every problem;
 * TOKEN_ENCRYPTION_SECRET is required in production.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const values = parsed.data;

  const production = values.NODE_ENV === 'production';
  if (production && !values.TOKEN_ENCRYPTION_SECRET) {
    throw new ConfigError(['TOKEN_ENCRYPTION_SECRET: required in production']);
  }

  return {
    dataDir: resolve(values.DATA_DIR),
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    workerEnabled: parseBoolean(values.SCHEDULER_WORKER_ENABLED, true),
    workerIntervalMs: getWorkerIntervalMs(values.SCHEDULER_WORKER_INTERVAL_MS),
    seedDefaultSlots: parseBoolean(values.SCHEDULER_SEED_DEFAULT_SLOTS, true),
    tokenSecret: values.TOKEN_ENCRYPTION_SECRET ?? DEVELOPMENT_TOKEN_SECRET,
    linkedin: {
      clientId: values.LINKEDIN_CLIENT_ID,
      clientSecret: values.LINKEDIN_CLIENT_SECRET,
    },
  };
}
