/**
 * Schedule API Routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { getStudentSchedule, getStudioSchedule, getTeacherSchedule } from '../../../src/schedule';
import { generateAllPatterns } from '../../../src/scheduler';
import { parseInput } from '../../../src/validation';
import type { AppEnv } from '../server';
import {
  ForbiddenError,
  assertStudioAccess,
  canAccessStudio,
  parseId,
  readJson,
  requireCapability,
} from './middleware';

export const scheduleRoutes = new Hono<AppEnv>();

const rangeSchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  studioId: z.coerce.number().int().positive().optional(),
});

const generateSchema = z.object({
  horizonEnd: z.string().optional(),
  studioId: z.number().int().positive().optional(),
});

scheduleRoutes.get('/studios/:studioId', requireCapability('schedule:read'), async (c) => {
  const { ctx } = c.get('deps');
  const studioId = parseId(c.req.param('studioId'), 'studioId');
  assertStudioAccess(c.get('user'), studioId);

  const range = parseInput(rangeSchema, c.req.query(), 'query');
  const items = await getStudioSchedule(ctx, studioId, { from: range.from, to: range.to });
  return c.json({ success: true, data: items });
});

scheduleRoutes.get('/teachers/:teacherId', requireCapability('schedule:read'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const teacherId = parseId(c.req.param('teacherId'), 'teacherId');

  const range = parseInput(rangeSchema, c.req.query(), 'query');
  if (range.studioId !== undefined) {
    assertStudioAccess(user, range.studioId);
  }

  const items = await getTeacherSchedule(ctx, teacherId, range);
  return c.json({ success: true, data: items.filter(i => canAccessStudio(user, i.studioId)) });
});

scheduleRoutes.get('/students/:studentId', requireCapability('schedule:read'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const studentId = parseId(c.req.param('studentId'), 'studentId');

  if (user.role === 'student' && user.studentId !== studentId) {
    throw new ForbiddenError('Students can only read their own schedule');
  }

  const range = parseInput(rangeSchema, c.req.query(), 'query');
  if (range.studioId !== undefined) {
    assertStudioAccess(user, range.studioId);
  }

  const items = await getStudentSchedule(ctx, studentId, range);
  return c.json({ success: true, data: items.filter(i => canAccessStudio(user, i.studioId)) });
});

scheduleRoutes.post('/generate', requireCapability('schedule:generate'), async (c) => {
  const { ctx } = c.get('deps');
  const body = parseInput(generateSchema, await readJson(c), 'request');

  const run = await generateAllPatterns(ctx, body.horizonEnd, { studioId: body.studioId });
  return c.json({ success: true, data: run });
});
