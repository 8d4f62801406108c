#!/usr/bin/env tsx
/**
 * Lesson Generation CLI
 *
 * Generate lessons for every active pattern (or one pattern) up to a horizon.
 *
 * Usage:
 *   npm run generate -- --db ./local-data/lessons.sqlite
 *   npm run generate -- --db ./local-data/lessons.sqlite --pattern 3 --horizon 2025-03-31
 */

import 'dotenv/config';
import { Command, Option } from 'commander';
import { resolve } from 'path';
import { mkdir, writeFile } from 'fs/promises';
import chalk from 'chalk';
import cliProgress from 'cli-progress';

import { generateAllPatterns, generateLessons, defaultHorizon } from '../scheduler';
import { generateRunReport, runTotals, type ReportFormat } from '../reporter';
import type { GenerationRun } from '../types';
import { openRuntime } from './runtime';

interface GenerateOptions {
  db?: string;
  horizon?: string;
  studio?: string;
  pattern?: string;
  from?: string;
  format: ReportFormat;
  output?: string;
  quiet?: boolean;
}

const program = new Command();

program
  .name('generate')
  .description('Generate lessons from recurring patterns')
  .option('--db <file>', 'SQLite database file (default: DATABASE_PATH)')
  .option('--horizon <date>', 'Generate up to this date (default: today + SCHEDULE_GENERATION_WEEKS)')
  .option('--studio <id>', 'Only patterns of this studio')
  .option('--pattern <id>', 'Only this pattern')
  .option('--from <date>', 'First date to consider (with --pattern)')
  .addOption(new Option('-f, --format <type>', 'Report format').choices(['text', 'markdown', 'json']).default('text'))
  .option('-o, --output <file>', 'Write the report to a file')
  .option('--quiet', 'Suppress progress output')
  .parse(process.argv);

const opts = program.opts<GenerateOptions>();

async function main() {
  let progressBar: cliProgress.SingleBar | null = null;

  if (!opts.quiet) {
    progressBar = new cliProgress.SingleBar({
      format: '  Progress |' + chalk.cyan('{bar}') + '| {percentage}% | {operation}',
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    });
    progressBar.start(100, 0, { operation: 'Starting...' });
  }

  const { ctx } = await openRuntime({
    database: opts.db,
    quiet: opts.quiet,
    onProgress: (progress) => {
      progressBar?.update(progress.percentComplete, { operation: progress.currentOperation });
    },
  });

  const horizonEnd = opts.horizon ?? defaultHorizon(ctx);
  const startTime = Date.now();
  let run: GenerationRun;

  try {
    if (opts.pattern) {
      const result = await generateLessons(ctx, Number(opts.pattern), horizonEnd, { from: opts.from });
      run = { horizonEnd, results: [result], failures: [], generatedAt: ctx.clock().toISOString() };
    } else {
      run = await generateAllPatterns(ctx, horizonEnd, {
        studioId: opts.studio ? Number(opts.studio) : undefined,
      });
    }
  } finally {
    progressBar?.stop();
  }

  const totals = runTotals(run);
  if (!opts.quiet) {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
    console.log(chalk.green(`  Generated ${totals.created} lesson(s) in ${elapsed}s`));
    if (totals.skipped > 0) console.log(chalk.yellow(`  Skipped ${totals.skipped} conflicting lesson(s)`));
  }

  const report = generateRunReport(run, { format: opts.format, colorOutput: !opts.output });
  if (opts.output) {
    const outputPath = resolve(opts.output);
    await mkdir(resolve(outputPath, '..'), { recursive: true });
    await writeFile(outputPath, report);
    if (!opts.quiet) console.log(chalk.gray(`  Saved: ${outputPath}`));
  } else {
    console.log(report);
  }

  process.exit(totals.failures > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : err);
  process.exit(1);
});
