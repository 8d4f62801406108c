#!/usr/bin/env tsx
/**
 * Schedule Validation CLI
 *
 * Audit a studio's stored lessons for double bookings and drift from their
 * patterns.
 *
 * Usage:
 *   npm run validate -- --db ./local-data/lessons.sqlite --studio 1
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';

import { resolveRange } from '../schedule';
import { defaultHorizon } from '../scheduler';
import { auditSchedule } from '../validator';
import { openRuntime } from './runtime';

interface ValidateOptions {
  db?: string;
  studio: string;
  from?: string;
  to?: string;
  verbose?: boolean;
  json?: boolean;
}

const program = new Command();

program
  .name('validate')
  .description('Audit the stored lessons of a studio')
  .option('--db <file>', 'SQLite database file (default: DATABASE_PATH)')
  .requiredOption('--studio <id>', 'Studio to audit')
  .option('--from <date>', 'First day (default: today)')
  .option('--to <date>', 'Last day (default: the generation horizon)')
  .option('--verbose', 'Show detailed violation information')
  .option('--json', 'Output results as JSON')
  .parse(process.argv);

const opts = program.opts<ValidateOptions>();

async function main() {
  const { ctx, store } = await openRuntime({ database: opts.db, quiet: true });
  const studioId = Number(opts.studio);
  const range = resolveRange(ctx, { from: opts.from, to: opts.to ?? defaultHorizon(ctx) });

  const lessons = await store.getOccurrencesInRange({
    studioId,
    dateFrom: range.from,
    dateTo: range.to,
    includeCancelled: true,
  });
  const audit = auditSchedule(lessons, await store.listPatterns({ studioId }));

  if (opts.json) {
    console.log(JSON.stringify({
      studioId,
      from: range.from,
      to: range.to,
      valid: audit.valid,
      score: audit.score,
      errors: audit.errors,
      warnings: audit.warnings,
    }, null, 2));
  } else {
    console.log(chalk.bold(`\nStudio ${studioId}: ${range.from} to ${range.to}`));
    console.log('═'.repeat(50));

    if (audit.valid) {
      console.log(chalk.green.bold('Status: VALID'));
    } else {
      console.log(chalk.red.bold('Status: INVALID'));
    }

    console.log(`Score: ${audit.score}/100`);
    console.log(audit.summary);

    if (opts.verbose && audit.errors.length > 0) {
      console.log(chalk.red('\nErrors:'));
      for (const v of audit.errors) {
        console.log(chalk.red(`  • [${v.type}] ${v.date} ${v.description}`));
      }
    }

    if (opts.verbose && audit.warnings.length > 0) {
      console.log(chalk.yellow('\nWarnings:'));
      for (const v of audit.warnings) {
        console.log(chalk.yellow(`  • [${v.type}] ${v.date} ${v.description}`));
      }
    }

    console.log('');
  }

  process.exit(audit.valid ? 0 : 1);
}

main().catch((err) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : err);
  process.exit(1);
});
