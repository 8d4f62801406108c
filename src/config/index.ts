/**
 * Application configuration from environment variables
 *
 * Entry points load `.env` (dotenv) before calling loadConfig().
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import { LOG_LEVELS } from '../logger';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  ENVIRONMENT: z.enum(['development', 'production', 'test']).default('development'),
  JWT_SECRET: z.string().min(8, 'JWT_SECRET must be at least 8 characters').optional(),
  DATABASE_PATH: z.string().min(1).optional(),
  SCHEDULE_TIMEZONE: z.string().refine(isTimeZone, 'Unknown IANA time zone').default('UTC'),
  SCHEDULE_GENERATION_WEEKS: z.coerce.number().int().min(1).max(52).default(2),
  MAX_GENERATION_WEEKS: z.coerce.number().int().min(1).max(104).default(26),
  DEFAULT_LESSON_DURATION_MINUTES: z.coerce.number().int().min(30).max(180).default(60),
  CORS_ORIGINS: z.string().default('http://localhost:5173'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
}).refine(env => env.SCHEDULE_GENERATION_WEEKS <= env.MAX_GENERATION_WEEKS, {
  message: 'SCHEDULE_GENERATION_WEEKS cannot exceed MAX_GENERATION_WEEKS',
  path: ['SCHEDULE_GENERATION_WEEKS'],
});

export interface SchedulingSettings {
  timezone: string;
  defaultHorizonWeeks: number;
  maxHorizonWeeks: number;
  defaultDurationMinutes: number;
}

export interface AppConfig {
  port: number;
  environment: 'development' | 'production' | 'test';
  /** Null only when loaded without requireJwtSecret */
  jwtSecret: string | null;
  databasePath: string | null;
  corsOrigins: string[];
  logLevel: typeof LOG_LEVELS[number];
  scheduling: SchedulingSettings;
}

export const DEFAULT_SCHEDULING_SETTINGS: SchedulingSettings = {
  timezone: 'UTC',
  defaultHorizonWeeks: 2,
  maxHorizonWeeks: 26,
  defaultDurationMinutes: 60,
};

export interface LoadConfigOptions {
  /** The HTTP server needs a signing secret; the CLIs do not. Default true. */
  requireJwtSecret?: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadConfigOptions = {}
): AppConfig {
  const { requireJwtSecret = true } = options;

  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration: ${issues.map(i => i.path).join(', ')}`,
      issues
    );
  }

  const cfg = result.data;
  if (requireJwtSecret && cfg.JWT_SECRET === undefined) {
    throw new ValidationError('Invalid configuration: JWT_SECRET', [
      { path: 'JWT_SECRET', message: 'Required' },
    ]);
  }

  return {
    port: cfg.PORT,
    environment: cfg.ENVIRONMENT,
    jwtSecret: cfg.JWT_SECRET ?? null,
    databasePath: cfg.DATABASE_PATH ?? null,
    corsOrigins: cfg.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean),
    logLevel: cfg.LOG_LEVEL,
    scheduling: {
      timezone: cfg.SCHEDULE_TIMEZONE,
      defaultHorizonWeeks: cfg.SCHEDULE_GENERATION_WEEKS,
      maxHorizonWeeks: cfg.MAX_GENERATION_WEEKS,
      defaultDurationMinutes: cfg.DEFAULT_LESSON_DURATION_MINUTES,
    },
  };
}
