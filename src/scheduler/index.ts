/**
 * Lesson Generator
 *
 * Materializes the lessons of a recurring pattern up to a horizon:
 * 1. Expand the weekly rule into candidate slots (calendar)
 * 2. Drop slots the pattern already produced (by original date)
 * 3. Check the rest against the studio's lessons for the same teacher,
 *    room or students, plus slots accepted earlier in this run
 * 4. Persist accepted lessons with attendance seeded from the pattern
 *
 * Conflicting slots are skipped and reported, never moved.
 */

import { addDaysToDate, earlierDate, isIsoDate, occurrencesFor } from '../calendar';
import { describeConflicts, findConflicts, toBooking } from '../conflicts';
import { withStore, today, type SchedulingContext } from '../context';
import {
  HorizonTooLargeError,
  PatternNotFoundError,
  ValidationError,
} from '../errors';
import type {
  Booking,
  GenerationResult,
  GenerationRun,
  IsoDate,
  LessonOccurrence,
  PatternId,
  ProgressReport,
  RecurringPattern,
  SkippedOccurrence,
  StudioId,
} from '../types';

export interface GenerateOptions {
  /** First date to consider. Defaults to the pattern's validFrom. */
  from?: IsoDate;
}

export interface GenerateAllOptions {
  studioId?: StudioId;
}

function emptyResult(patternId: PatternId): GenerationResult {
  return { patternId, created: [], skipped: [], alreadyMaterialized: [] };
}

/**
 * Today plus the default generation window.
 */
export function defaultHorizon(ctx: SchedulingContext): IsoDate {
  return addDaysToDate(today(ctx), ctx.settings.defaultHorizonWeeks * 7);
}

/**
 * Reject horizons past today plus the maximum generation window.
 */
export function assertHorizon(ctx: SchedulingContext, horizonEnd: IsoDate): void {
  if (!isIsoDate(horizonEnd)) {
    throw new ValidationError(`Invalid horizon: ${horizonEnd}`, [
      { path: 'horizonEnd', message: 'expected YYYY-MM-DD' },
    ]);
  }
  const limit = addDaysToDate(today(ctx), ctx.settings.maxHorizonWeeks * 7);
  if (horizonEnd > limit) {
    throw new HorizonTooLargeError(horizonEnd, limit, ctx.settings.maxHorizonWeeks);
  }
}

/**
 * Generate lessons for one pattern in its own transaction.
 */
export async function generateLessons(
  ctx: SchedulingContext,
  patternId: PatternId,
  horizonEnd: IsoDate,
  options: GenerateOptions = {}
): Promise<GenerationResult> {
  assertHorizon(ctx, horizonEnd);

  return ctx.store.transaction(async tx => {
    const pattern = await tx.getPattern(patternId);
    if (!pattern) throw new PatternNotFoundError(patternId);
    return materializePattern(withStore(ctx, tx), pattern, horizonEnd, options);
  });
}

/**
 * Generation body. Callers must already be inside a transaction on
 * `ctx.store`; the horizon is not re-checked here.
 */
export async function materializePattern(
  ctx: SchedulingContext,
  pattern: RecurringPattern,
  horizonEnd: IsoDate,
  options: GenerateOptions = {}
): Promise<GenerationResult> {
  const { store, logger, onProgress } = ctx;
  const result = emptyResult(pattern.id);

  const report = (phase: ProgressReport['phase'], percent: number, operation: string, stats?: ProgressReport['stats']) => {
    onProgress?.({ phase, percentComplete: percent, currentOperation: operation, stats });
  };

  if (!pattern.isActive) {
    logger.debug('Skipping inactive pattern', { patternId: pattern.id });
    return result;
  }

  report('initializing', 0, `Expanding pattern ${pattern.id}`);

  // Without an explicit start, a pattern beginning after the horizon simply
  // has nothing to generate
  const horizonStart = options.from ?? earlierDate(pattern.validFrom, horizonEnd);
  const slots = [...occurrencesFor(pattern, horizonStart, horizonEnd)];
  if (slots.length === 0) {
    report('complete', 100, 'No dates in range', { candidates: 0, created: 0, skipped: 0 });
    return result;
  }

  const materialized = new Set(
    (await store.getPatternOccurrences(pattern.id)).map(o => o.originalDate ?? o.date)
  );
  const candidates = slots.filter(slot => {
    if (!materialized.has(slot.date)) return true;
    result.alreadyMaterialized.push(slot.date);
    return false;
  });

  if (candidates.length === 0) {
    report('complete', 100, 'All dates already generated', { candidates: 0, created: 0, skipped: 0 });
    return result;
  }

  report('checking', 20, `Checking ${candidates.length} date(s) for conflicts`, { candidates: candidates.length });

  const studentIds = await store.getStudentLinks(pattern.id);
  const persisted = await store.getOccurrencesInRange({
    studioId: pattern.studioId,
    teacherId: pattern.teacherId,
    roomId: pattern.roomId,
    studentIds,
    dateFrom: candidates[0].date,
    dateTo: candidates[candidates.length - 1].date,
  });

  const existing: Booking[] = persisted.map(toBooking);
  const accepted: Booking[] = [];

  for (const slot of candidates) {
    const booking: Booking = {
      id: null,
      date: slot.date,
      startTime: slot.startTime,
      endTime: slot.endTime,
      teacherId: pattern.teacherId,
      roomId: pattern.roomId,
      studentIds,
      status: 'scheduled',
    };

    const conflicts = findConflicts(booking, [...existing, ...accepted]);
    if (conflicts.length > 0) {
      const skipped: SkippedOccurrence = { date: slot.date, reason: describeConflicts(conflicts), conflicts };
      result.skipped.push(skipped);
      logger.info('Skipped conflicting lesson', { patternId: pattern.id, date: slot.date, reason: skipped.reason });
      continue;
    }
    accepted.push(booking);
  }

  report('persisting', 60, `Saving ${accepted.length} lesson(s)`, {
    candidates: candidates.length,
    skipped: result.skipped.length,
  });

  for (const booking of accepted) {
    const lesson: LessonOccurrence = await store.upsertOccurrence({
      studioId: pattern.studioId,
      teacherId: pattern.teacherId,
      roomId: pattern.roomId,
      patternId: pattern.id,
      date: booking.date,
      originalDate: booking.date,
      startTime: booking.startTime,
      endTime: booking.endTime,
      status: 'scheduled',
      isException: false,
      cancellationReason: null,
      notes: pattern.notes,
      attendance: studentIds.map(studentId => ({ studentId, status: 'scheduled' as const })),
    });
    result.created.push(lesson);
  }

  logger.debug('Generated lessons', {
    patternId: pattern.id,
    horizonEnd,
    created: result.created.length,
    skipped: result.skipped.length,
    alreadyMaterialized: result.alreadyMaterialized.length,
  });

  report('complete', 100, 'Generation complete', {
    candidates: candidates.length,
    created: result.created.length,
    skipped: result.skipped.length,
  });

  return result;
}

/**
 * Generate for every active pattern (optionally of one studio), one
 * transaction per pattern. A failing pattern is recorded and the run goes on.
 */
export async function generateAllPatterns(
  ctx: SchedulingContext,
  horizonEnd: IsoDate = defaultHorizon(ctx),
  options: GenerateAllOptions = {}
): Promise<GenerationRun> {
  assertHorizon(ctx, horizonEnd);

  const { onProgress, logger } = ctx;
  const patterns = await ctx.store.listPatterns({ studioId: options.studioId, activeOnly: true });
  const inner: SchedulingContext = { ...ctx, onProgress: undefined };

  const run: GenerationRun = {
    horizonEnd,
    results: [],
    failures: [],
    generatedAt: ctx.clock().toISOString(),
  };

  onProgress?.({
    phase: 'initializing',
    percentComplete: 0,
    currentOperation: `Generating ${patterns.length} pattern(s) up to ${horizonEnd}`,
  });

  let created = 0;
  let skipped = 0;

  for (const [index, pattern] of patterns.entries()) {
    try {
      const result = await generateLessons(inner, pattern.id, horizonEnd);
      run.results.push(result);
      created += result.created.length;
      skipped += result.skipped.length;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      run.failures.push({ patternId: pattern.id, message });
      logger.warn('Pattern generation failed', { patternId: pattern.id, error: message });
    }

    onProgress?.({
      phase: 'persisting',
      percentComplete: Math.round(((index + 1) / patterns.length) * 100),
      currentOperation: `Pattern ${pattern.id}`,
      stats: { candidates: patterns.length, created, skipped },
    });
  }

  onProgress?.({
    phase: 'complete',
    percentComplete: 100,
    currentOperation: 'Generation complete',
    stats: { created, skipped },
  });

  logger.info('Generation run finished', {
    horizonEnd,
    patterns: patterns.length,
    created,
    skipped,
    failures: run.failures.length,
  });

  return run;
}

/**
 * Top up a studio's active patterns to the default horizon. Patterns that
 * already hold their last slot before the horizon are left alone.
 */
export async function ensureStudioHorizon(ctx: SchedulingContext, studioId: StudioId): Promise<GenerationRun> {
  const horizonEnd = defaultHorizon(ctx);
  const from = today(ctx);
  const patterns = await ctx.store.listPatterns({ studioId, activeOnly: true });

  const run: GenerationRun = {
    horizonEnd,
    results: [],
    failures: [],
    generatedAt: ctx.clock().toISOString(),
  };

  for (const pattern of patterns) {
    let lastSlot: IsoDate | null = null;
    for (const slot of occurrencesFor(pattern, from, horizonEnd)) {
      lastSlot = slot.date;
    }
    if (lastSlot === null) continue;

    const lessons = await ctx.store.getPatternOccurrences(pattern.id, from);
    const last = lessons.reduce<IsoDate | null>((latest, lesson) => {
      const date = lesson.originalDate ?? lesson.date;
      return latest === null || date > latest ? date : latest;
    }, null);
    if (last !== null && last >= lastSlot) continue;

    try {
      run.results.push(await generateLessons(ctx, pattern.id, horizonEnd, { from }));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      run.failures.push({ patternId: pattern.id, message });
      ctx.logger.warn('Horizon top-up failed', { studioId, patternId: pattern.id, error: message });
    }
  }

  return run;
}
