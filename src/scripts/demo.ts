#!/usr/bin/env tsx
/**
 * Demo Script - Full Lesson Scheduling Pipeline
 *
 * Runs the scheduling process against an in-memory store seeded with demo data:
 * 1. Load seed patterns and lessons
 * 2. Generate lessons up to the horizon
 * 3. Audit the studio schedule
 * 4. Generate reports
 */

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { mkdir, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import chalk from 'chalk';
import cliProgress from 'cli-progress';

import { createContext, today } from '../context';
import { createLogger } from '../logger';
import { loadSeedFile } from '../parser/data-loader';
import { createPattern } from '../patterns';
import { createLesson } from '../lessons';
import { defaultHorizon, generateAllPatterns } from '../scheduler';
import { getStudioSchedule } from '../schedule';
import { auditSchedule } from '../validator';
import { generateRunReport, generateScheduleReport, runTotals } from '../reporter';
import { openPatternStore } from '../store';

const __dirname = dirname(fileURLToPath(import.meta.url));
const rootDir = resolve(__dirname, '../..');

const DEMO_STUDIO = 1;

async function main() {
  console.log(chalk.bold.cyan('\n═══════════════════════════════════════════════════════════════'));
  console.log(chalk.bold.cyan('           LESSON SCHEDULER - DEMO RUN'));
  console.log(chalk.bold.cyan('═══════════════════════════════════════════════════════════════\n'));

  const seedPath = resolve(rootDir, 'data/demo/patterns.json');
  const outputDir = resolve(rootDir, 'output');

  if (!existsSync(outputDir)) {
    await mkdir(outputDir, { recursive: true });
    console.log(chalk.gray(`Created output directory: ${outputDir}`));
  }

  const store = await openPatternStore(null);
  const ctx = createContext(store, { logger: createLogger({ level: 'warn' }) });

  // Step 1: Load data
  console.log(chalk.yellow('\n[1/4] Loading seed data...'));
  const seed = await loadSeedFile(seedPath, ctx.settings.defaultDurationMinutes);

  for (const input of seed.patterns) {
    await createPattern(ctx, input);
  }
  for (const input of seed.lessons) {
    await createLesson(ctx, input);
  }
  console.log(chalk.green(`  ✓ Created ${seed.patterns.length} patterns`));
  console.log(chalk.green(`  ✓ Booked ${seed.lessons.length} one-off lessons`));

  // Step 2: Generate with progress bar
  const horizonEnd = defaultHorizon(ctx);
  console.log(chalk.yellow(`\n[2/4] Generating lessons up to ${horizonEnd}...`));

  const progressBar = new cliProgress.SingleBar({
    format: '  Progress |' + chalk.cyan('{bar}') + '| {percentage}% | {phase} - {operation}',
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
  });

  progressBar.start(100, 0, { phase: 'initializing', operation: 'Starting...' });

  const startTime = Date.now();
  const run = await generateAllPatterns({
    ...ctx,
    onProgress: (progress) => {
      progressBar.update(progress.percentComplete, {
        phase: progress.phase,
        operation: progress.currentOperation,
      });
    },
  }, horizonEnd);

  progressBar.stop();
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  const totals = runTotals(run);
  console.log(chalk.green(`  ✓ Generation finished in ${elapsed}s`));
  console.log(chalk.green(`  ✓ ${totals.alreadyMaterialized} lessons already on the calendar, ${totals.created} new`));
  if (totals.skipped > 0) {
    console.log(chalk.yellow(`  ! ${totals.skipped} lessons skipped because of conflicts`));
  }

  // Step 3: Audit
  console.log(chalk.yellow('\n[3/4] Auditing studio schedule...'));
  const range = { from: today(ctx), to: horizonEnd };
  const lessons = await store.getOccurrencesInRange({
    studioId: DEMO_STUDIO,
    dateFrom: range.from,
    dateTo: range.to,
    includeCancelled: true,
  });
  const audit = auditSchedule(lessons, await store.listPatterns({ studioId: DEMO_STUDIO }));

  if (audit.valid) {
    console.log(chalk.green('  ✓ Schedule is VALID'));
  } else {
    console.log(chalk.red(`  ✗ Schedule has ${audit.errors.length} errors`));
  }
  console.log(chalk.cyan(`  Score: ${audit.score}/100`));

  // Step 4: Reports
  console.log(chalk.yellow('\n[4/4] Generating reports...'));

  const items = await getStudioSchedule(ctx, DEMO_STUDIO, range);
  const title = `Studio ${DEMO_STUDIO}: ${range.from} to ${range.to}`;

  console.log('\n' + generateScheduleReport(items, { format: 'text', title, colorOutput: true }, audit));

  const jsonPath = resolve(outputDir, 'schedule.json');
  await writeFile(jsonPath, generateScheduleReport(items, { format: 'json', title }, audit));
  console.log(chalk.green(`  ✓ JSON report saved to: ${jsonPath}`));

  const mdPath = resolve(outputDir, 'schedule.md');
  await writeFile(mdPath, generateScheduleReport(items, { format: 'markdown', title }, audit));
  console.log(chalk.green(`  ✓ Markdown report saved to: ${mdPath}`));

  const runPath = resolve(outputDir, 'generation.md');
  await writeFile(runPath, generateRunReport(run, { format: 'markdown' }));
  console.log(chalk.green(`  ✓ Generation report saved to: ${runPath}`));

  console.log(chalk.bold.cyan('\n═══════════════════════════════════════════════════════════════'));
  console.log(chalk.bold.cyan('                    DEMO COMPLETE'));
  console.log(chalk.bold.cyan('═══════════════════════════════════════════════════════════════\n'));
}

main().catch((err) => {
  console.error(chalk.red('Fatal error:'), err);
  process.exit(1);
});
