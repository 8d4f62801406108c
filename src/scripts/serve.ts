#!/usr/bin/env tsx
/**
 * HTTP server entry point
 *
 * Usage:
 *   JWT_SECRET=... DATABASE_PATH=./local-data/lessons.sqlite npm run serve
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import chalk from 'chalk';

import { createApp } from '../../web/src/server';
import { openRuntime } from './runtime';

async function main() {
  const { config, logger, ctx } = await openRuntime({ requireJwtSecret: true });

  if (config.jwtSecret === null) {
    throw new Error('JWT_SECRET is required');
  }

  const app = createApp({
    ctx,
    jwtSecret: config.jwtSecret,
    environment: config.environment,
    corsOrigins: config.corsOrigins,
    logger,
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`Listening on http://localhost:${info.port}`, {
      environment: config.environment,
      database: config.databasePath ?? ':memory:',
    });
  });

  const shutdown = () => {
    logger.info('Shutting down');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : err);
  process.exit(1);
});
