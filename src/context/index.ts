/**
 * Everything a core operation needs: the store, scheduling policy, a clock
 * and a logger. Entry points build one context and pass it down.
 */

import { todayIn } from '../calendar';
import { DEFAULT_SCHEDULING_SETTINGS, type SchedulingSettings } from '../config';
import { silentLogger, type Logger } from '../logger';
import type { PatternStore } from '../store';
import type { IsoDate, ProgressCallback } from '../types';

export interface SchedulingContext {
  store: PatternStore;
  settings: SchedulingSettings;
  clock: () => Date;
  logger: Logger;
  onProgress?: ProgressCallback;
}

export interface ContextOptions {
  settings?: Partial<SchedulingSettings>;
  clock?: () => Date;
  logger?: Logger;
  onProgress?: ProgressCallback;
}

export function createContext(store: PatternStore, options: ContextOptions = {}): SchedulingContext {
  return {
    store,
    settings: { ...DEFAULT_SCHEDULING_SETTINGS, ...options.settings },
    clock: options.clock ?? (() => new Date()),
    logger: options.logger ?? silentLogger,
    onProgress: options.onProgress,
  };
}

/**
 * Same context, different store. Used to run core steps inside a transaction.
 */
export function withStore(ctx: SchedulingContext, store: PatternStore): SchedulingContext {
  return { ...ctx, store };
}

export function today(ctx: SchedulingContext): IsoDate {
  return todayIn(ctx.settings.timezone, ctx.clock());
}
