/**
 * Shared setup for the command-line entry points: configuration, logger,
 * store and scheduling context.
 */

import { loadConfig, type AppConfig } from '../config';
import { createContext, type SchedulingContext } from '../context';
import { createLogger, type Logger } from '../logger';
import { openPatternStore, type SqlPatternStore } from '../store';
import type { ProgressCallback } from '../types';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  store: SqlPatternStore;
  ctx: SchedulingContext;
}

export interface RuntimeOptions {
  /** Database file; overrides DATABASE_PATH. ':memory:' for a throwaway store. */
  database?: string;
  requireJwtSecret?: boolean;
  quiet?: boolean;
  onProgress?: ProgressCallback;
}

export async function openRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const config = loadConfig(process.env, { requireJwtSecret: options.requireJwtSecret ?? false });
  const logger = createLogger({
    level: options.quiet ? 'warn' : config.logLevel,
    color: process.stdout.isTTY === true,
  });

  const databasePath = options.database ?? config.databasePath;
  const store = await openPatternStore(databasePath);
  logger.debug('Opened store', { database: databasePath ?? ':memory:' });

  const ctx = createContext(store, {
    settings: config.scheduling,
    logger,
    onProgress: options.onProgress,
  });

  return { config, logger, store, ctx };
}
