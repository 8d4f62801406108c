#!/usr/bin/env tsx
/**
 * Schedule Report CLI
 *
 * Print a studio, teacher or student schedule for a date range.
 *
 * Usage:
 *   npm run report -- --db ./local-data/lessons.sqlite --studio 1 --format markdown
 *   npm run report -- --db ./local-data/lessons.sqlite --teacher 7 --from 2025-01-06 --to 2025-01-12
 */

import 'dotenv/config';
import { Command, Option } from 'commander';
import { writeFile } from 'fs/promises';
import chalk from 'chalk';

import { getStudentSchedule, getStudioSchedule, getTeacherSchedule, resolveRange } from '../schedule';
import { generateScheduleReport, type ReportFormat } from '../reporter';
import { auditSchedule } from '../validator';
import type { ScheduleItem } from '../types';
import { openRuntime } from './runtime';

interface ReportOptions {
  db?: string;
  studio?: string;
  teacher?: string;
  student?: string;
  from?: string;
  to?: string;
  format: ReportFormat;
  output?: string;
  color?: boolean;
  audit?: boolean;
}

const program = new Command();

program
  .name('report')
  .description('Print a lesson schedule')
  .option('--db <file>', 'SQLite database file (default: DATABASE_PATH)')
  .option('--studio <id>', 'Schedule of a studio')
  .option('--teacher <id>', 'Schedule of a teacher')
  .option('--student <id>', 'Schedule of a student')
  .option('--from <date>', 'First day (default: today)')
  .option('--to <date>', 'Last day (default: a week after --from)')
  .addOption(new Option('-f, --format <type>', 'Output format').choices(['text', 'markdown', 'json']).default('text'))
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('--color', 'Enable color output (text format only)')
  .option('--audit', 'Include an audit of the studio schedule (with --studio)')
  .parse(process.argv);

const opts = program.opts<ReportOptions>();

async function main() {
  const { ctx, store } = await openRuntime({ database: opts.db, quiet: true });
  const range = resolveRange(ctx, { from: opts.from, to: opts.to });

  let items: ScheduleItem[];
  let title: string;

  if (opts.studio) {
    items = await getStudioSchedule(ctx, Number(opts.studio), range);
    title = `Studio ${opts.studio}: ${range.from} to ${range.to}`;
  } else if (opts.teacher) {
    items = await getTeacherSchedule(ctx, Number(opts.teacher), range);
    title = `Teacher ${opts.teacher}: ${range.from} to ${range.to}`;
  } else if (opts.student) {
    items = await getStudentSchedule(ctx, Number(opts.student), range);
    title = `Student ${opts.student}: ${range.from} to ${range.to}`;
  } else {
    console.error(chalk.red('Error: one of --studio, --teacher or --student is required'));
    process.exit(1);
  }

  let audit;
  if (opts.audit && opts.studio) {
    const studioId = Number(opts.studio);
    const lessons = await store.getOccurrencesInRange({
      studioId,
      dateFrom: range.from,
      dateTo: range.to,
      includeCancelled: true,
    });
    audit = auditSchedule(lessons, await store.listPatterns({ studioId }));
  }

  const report = generateScheduleReport(items, {
    format: opts.format,
    title,
    colorOutput: opts.color,
  }, audit);

  if (opts.output) {
    await writeFile(opts.output, report);
    console.log(chalk.green(`Report saved to: ${opts.output}`));
  } else {
    console.log(report);
  }
}

main().catch((err) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : err);
  process.exit(1);
});
