/**
 * Lesson Scheduler - HTTP API
 *
 * API Routes:
 * - GET /api/health - Liveness check (no auth)
 *
 * - POST /api/patterns - Create a recurring pattern and generate its lessons
 * - GET /api/patterns - List patterns (?studioId=&teacherId=&active=true)
 * - GET /api/patterns/:id - Pattern details
 * - PATCH /api/patterns/:id - Update a pattern (?force=true keeps going past conflicts)
 * - POST /api/patterns/:id/deactivate - Stop generating
 * - DELETE /api/patterns/:id - Delete a pattern and its lessons
 * - POST /api/patterns/:id/generate - Generate lessons up to a horizon
 *
 * - POST /api/lessons - Book a one-off lesson
 * - GET /api/lessons/:id - Lesson details
 * - DELETE /api/lessons/:id - Remove a lesson
 * - POST /api/lessons/:id/exception - Move, retime or cancel one lesson
 * - DELETE /api/lessons/:id/exception - Revert an exception
 * - POST /api/lessons/:id/status - Change lesson status
 * - PUT /api/lessons/:id/attendance/:studentId - Record attendance
 *
 * - GET /api/schedule/studios/:studioId - Studio schedule (?from=&to=)
 * - GET /api/schedule/teachers/:teacherId - Teacher schedule
 * - GET /api/schedule/students/:studentId - Student schedule
 * - POST /api/schedule/generate - Generate all active patterns (admin)
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import { logger as requestLogger } from 'hono/logger';

import type { AppConfig } from '../../src/config';
import type { SchedulingContext } from '../../src/context';
import { isSchedulingError, type ErrorCode } from '../../src/errors';
import type { Logger } from '../../src/logger';
import type { JWTPayload } from './auth/jwt';
import { ForbiddenError, authMiddleware } from './api/middleware';
import { patternRoutes } from './api/patterns';
import { lessonRoutes } from './api/lessons';
import { scheduleRoutes } from './api/schedules';

export interface AppDeps {
  ctx: SchedulingContext;
  jwtSecret: string;
  environment: AppConfig['environment'];
  corsOrigins: string[];
  logger: Logger;
}

export interface AppEnv {
  Variables: {
    deps: AppDeps;
    user: JWTPayload;
  };
}

const ERROR_STATUS: Record<ErrorCode, 400 | 404 | 409 | 422> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  CONCURRENT_MODIFICATION: 409,
  HORIZON_TOO_LARGE: 422,
  INVALID_STATUS_TRANSITION: 422,
};

export function createApp(deps: AppDeps) {
  const app = new Hono<AppEnv>();
  const log = deps.logger.child('http');

  // ==========================================================================
  // Global Middleware
  // ==========================================================================

  app.use('*', secureHeaders());

  app.use('/api/*', cors({
    origin: deps.corsOrigins,
    allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
    maxAge: 86400,
  }));

  // Request logging (only in development)
  if (deps.environment === 'development') {
    app.use('*', requestLogger((message) => log.info(message)));
  }

  app.use('*', async (c, next) => {
    c.set('deps', deps);
    await next();
  });

  // ==========================================================================
  // Health Check (no auth required)
  // ==========================================================================

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: deps.ctx.clock().toISOString(),
      environment: deps.environment,
    });
  });

  // ==========================================================================
  // Protected Routes (auth required)
  // ==========================================================================

  app.use('/api/*', authMiddleware);

  app.route('/api/patterns', patternRoutes);
  app.route('/api/lessons', lessonRoutes);
  app.route('/api/schedule', scheduleRoutes);

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  app.onError((err, c) => {
    if (isSchedulingError(err)) {
      return c.json({
        success: false,
        error: {
          code: err.code,
          message: err.message,
          details: err.details,
        },
      }, ERROR_STATUS[err.code]);
    }

    if (err instanceof ForbiddenError) {
      return c.json({
        success: false,
        error: {
          code: 'FORBIDDEN',
          message: err.message,
        },
      }, 403);
    }

    log.error('Unhandled error', { method: c.req.method, path: c.req.path, error: err.message, stack: err.stack });

    // Don't expose internal errors in production
    const message = deps.environment === 'development'
      ? err.message
      : 'Internal server error';

    return c.json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message,
      },
    }, 500);
  });

  app.notFound((c) => {
    return c.json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
    }, 404);
  });

  return app;
}
