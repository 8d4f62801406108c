/**
 * Report Generator
 *
 * Human-readable and machine-readable reports for generation runs and
 * schedules.
 */

import chalk from 'chalk';
import { isoWeekday } from '../calendar';
import type { AuditResult } from '../validator';
import type { GenerationRun, IsoDate, ScheduleItem } from '../types';

const DAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export type ReportFormat = 'text' | 'json' | 'markdown';

export interface ReportOptions {
  format: ReportFormat;
  title?: string;
  colorOutput?: boolean;
}

interface Palette {
  bold: (s: string) => string;
  green: (s: string) => string;
  red: (s: string) => string;
  yellow: (s: string) => string;
  cyan: (s: string) => string;
  gray: (s: string) => string;
}

const plain: Palette = {
  bold: s => s,
  green: s => s,
  red: s => s,
  yellow: s => s,
  cyan: s => s,
  gray: s => s,
};

function palette(colorOutput?: boolean): Palette {
  return colorOutput ? chalk : plain;
}

export function dayName(date: IsoDate): string {
  return DAYS[isoWeekday(date) - 1];
}

function lessonKind(item: ScheduleItem): string {
  if (item.isException) return 'exception';
  return item.isRecurring ? 'recurring' : 'one-off';
}

function groupByDate(items: ScheduleItem[]): Map<IsoDate, ScheduleItem[]> {
  const byDate = new Map<IsoDate, ScheduleItem[]>();
  for (const item of items) {
    const list = byDate.get(item.date) || [];
    list.push(item);
    byDate.set(item.date, list);
  }
  return new Map([...byDate].sort(([a], [b]) => a.localeCompare(b)));
}

// ============================================================================
// Generation runs
// ============================================================================

export function runTotals(run: GenerationRun) {
  return {
    patterns: run.results.length + run.failures.length,
    created: run.results.reduce((sum, r) => sum + r.created.length, 0),
    skipped: run.results.reduce((sum, r) => sum + r.skipped.length, 0),
    alreadyMaterialized: run.results.reduce((sum, r) => sum + r.alreadyMaterialized.length, 0),
    failures: run.failures.length,
  };
}

export function generateRunReport(run: GenerationRun, options: ReportOptions): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify({ ...run, totals: runTotals(run) }, null, 2);
    case 'markdown':
      return generateRunMarkdown(run, options);
    case 'text':
    default:
      return generateRunText(run, options);
  }
}

function generateRunMarkdown(run: GenerationRun, options: ReportOptions): string {
  const lines: string[] = [];
  const totals = runTotals(run);

  lines.push(`# ${options.title ?? 'Lesson Generation Report'}`);
  lines.push('');
  lines.push(`Generated: ${run.generatedAt}`);
  lines.push(`Horizon: ${run.horizonEnd}`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Patterns | ${totals.patterns} |`);
  lines.push(`| Lessons created | ${totals.created} |`);
  lines.push(`| Skipped (conflicts) | ${totals.skipped} |`);
  lines.push(`| Already generated | ${totals.alreadyMaterialized} |`);
  lines.push(`| Failed patterns | ${totals.failures} |`);
  lines.push('');

  const skipped = run.results.flatMap(r => r.skipped.map(s => ({ patternId: r.patternId, ...s })));
  if (skipped.length > 0) {
    lines.push('## Skipped Lessons');
    lines.push('');
    lines.push('| Pattern | Date | Reason |');
    lines.push('|---------|------|--------|');
    for (const s of skipped) {
      lines.push(`| ${s.patternId} | ${s.date} | ${s.reason} |`);
    }
    lines.push('');
  }

  if (run.failures.length > 0) {
    lines.push('## Failures');
    lines.push('');
    for (const f of run.failures) {
      lines.push(`- **Pattern ${f.patternId}**: ${f.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

function generateRunText(run: GenerationRun, options: ReportOptions): string {
  const lines: string[] = [];
  const c = palette(options.colorOutput);
  const totals = runTotals(run);

  lines.push(c.bold('═'.repeat(70)));
  lines.push(c.bold(`  ${(options.title ?? 'LESSON GENERATION REPORT').toUpperCase()}`));
  lines.push(c.bold('═'.repeat(70)));
  lines.push('');
  lines.push(`Generated: ${run.generatedAt}`);
  lines.push(`Horizon:   ${run.horizonEnd}`);
  lines.push('');

  lines.push(`  Patterns:           ${totals.patterns}`);
  lines.push(`  Lessons created:    ${c.green(String(totals.created))}`);
  lines.push(`  Skipped:            ${totals.skipped > 0 ? c.yellow(String(totals.skipped)) : '0'}`);
  lines.push(`  Already generated:  ${totals.alreadyMaterialized}`);
  lines.push(`  Failed patterns:    ${totals.failures > 0 ? c.red(String(totals.failures)) : '0'}`);
  lines.push('');

  for (const result of run.results) {
    if (result.skipped.length === 0) continue;
    lines.push(c.yellow(`  Pattern ${result.patternId}: skipped ${result.skipped.length}`));
    for (const s of result.skipped) {
      lines.push(c.yellow(`    • ${s.date} ${s.reason}`));
    }
  }

  for (const f of run.failures) {
    lines.push(c.red(`  Pattern ${f.patternId} failed: ${f.message}`));
  }

  lines.push(c.bold('═'.repeat(70)));
  return lines.join('\n');
}

// ============================================================================
// Schedules
// ============================================================================

export function generateScheduleReport(
  items: ScheduleItem[],
  options: ReportOptions,
  audit?: AuditResult
): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify({
        lessons: items,
        audit: audit ? { valid: audit.valid, score: audit.score, errors: audit.errors, warnings: audit.warnings } : undefined,
      }, null, 2);
    case 'markdown':
      return generateScheduleMarkdown(items, options, audit);
    case 'text':
    default:
      return generateScheduleText(items, options, audit);
  }
}

function formatStudents(ids: number[]): string {
  return ids.length > 0 ? ids.join(', ') : '-';
}

function generateScheduleMarkdown(items: ScheduleItem[], options: ReportOptions, audit?: AuditResult): string {
  const lines: string[] = [];

  lines.push(`# ${options.title ?? 'Lesson Schedule'}`);
  lines.push('');

  if (audit) {
    lines.push(`Status: ${audit.valid ? 'Valid' : 'Invalid'} (score ${audit.score}/100)`);
    lines.push('');
    for (const v of [...audit.errors, ...audit.warnings]) {
      lines.push(`- **${v.type}** (${v.severity}): ${v.description}`);
    }
    if (audit.errors.length + audit.warnings.length > 0) lines.push('');
  }

  if (items.length === 0) {
    lines.push('_No lessons._');
    return lines.join('\n');
  }

  for (const [date, lessons] of groupByDate(items)) {
    lines.push(`## ${dayName(date)} ${date}`);
    lines.push('');
    lines.push('| Time | Teacher | Room | Students | Status | Kind |');
    lines.push('|------|---------|------|----------|--------|------|');
    for (const l of lessons) {
      lines.push(
        `| ${l.startTime}-${l.endTime} | ${l.teacherId} | ${l.roomId ?? 'online'} | ${formatStudents(l.studentIds)} | ${l.status} | ${lessonKind(l)} |`
      );
    }
    lines.push('');
  }

  return lines.join('\n');
}

function generateScheduleText(items: ScheduleItem[], options: ReportOptions, audit?: AuditResult): string {
  const lines: string[] = [];
  const c = palette(options.colorOutput);

  lines.push(c.bold('═'.repeat(70)));
  lines.push(c.bold(`  ${(options.title ?? 'LESSON SCHEDULE').toUpperCase()}`));
  lines.push(c.bold('═'.repeat(70)));

  if (audit) {
    const statusColor = audit.valid ? c.green : c.red;
    lines.push(c.bold('STATUS: ') + statusColor(audit.valid ? 'VALID' : 'INVALID'));
    lines.push(c.bold('SCORE:  ') + `${audit.score}/100`);
    for (const v of audit.errors) lines.push(c.red(`  • ${v.description}`));
    for (const v of audit.warnings) lines.push(c.yellow(`  • ${v.description}`));
  }

  if (items.length === 0) {
    lines.push('');
    lines.push(c.gray('  No lessons.'));
  }

  for (const [date, lessons] of groupByDate(items)) {
    lines.push('');
    lines.push(c.cyan(`${dayName(date)} ${date}`));
    lines.push('  ' + '─'.repeat(66));

    for (const l of lessons) {
      const status = l.status === 'cancelled' ? c.red(l.status) : l.status;
      const room = l.roomId === null ? 'online' : `room ${l.roomId}`;
      lines.push(
        `  ${l.startTime}-${l.endTime}  teacher ${String(l.teacherId).padEnd(4)} ${room.padEnd(9)} ` +
        `students ${formatStudents(l.studentIds).padEnd(10)} ${status} ${c.gray(`(${lessonKind(l)})`)}`
      );
    }
  }

  lines.push('');
  lines.push(c.bold('═'.repeat(70)));
  return lines.join('\n');
}
