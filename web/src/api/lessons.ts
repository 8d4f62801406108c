/**
 * Lesson API Routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import {
  changeLessonStatus,
  createException,
  createLesson,
  deleteLesson,
  getLesson,
  markAttendance,
  revertException,
} from '../../../src/lessons';
import {
  attendanceStatusSchema,
  lessonStatusSchema,
  parseExceptionChanges,
  parseInput,
  parseLessonInput,
} from '../../../src/validation';
import type { AppEnv } from '../server';
import {
  assertActsAsTeacher,
  assertStudioAccess,
  parseId,
  readJson,
  requireCapability,
} from './middleware';

export const lessonRoutes = new Hono<AppEnv>();

const statusSchema = z.object({
  status: lessonStatusSchema,
  reason: z.string().max(1000).nullable().optional(),
});

const attendanceSchema = z.object({
  status: attendanceStatusSchema,
});

lessonRoutes.post('/', requireCapability('lessons:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');

  const input = parseLessonInput(await readJson(c), ctx.settings.defaultDurationMinutes);
  assertStudioAccess(user, input.studioId);
  assertActsAsTeacher(user, input.teacherId);

  const lesson = await createLesson(ctx, input);
  return c.json({ success: true, data: lesson }, 201);
});

lessonRoutes.get('/:id', requireCapability('lessons:read'), async (c) => {
  const { ctx } = c.get('deps');
  const lesson = await getLesson(ctx, parseId(c.req.param('id')));
  assertStudioAccess(c.get('user'), lesson.studioId);
  return c.json({ success: true, data: lesson });
});

lessonRoutes.delete('/:id', requireCapability('lessons:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const lesson = await getLesson(ctx, id);
  assertStudioAccess(user, lesson.studioId);
  assertActsAsTeacher(user, lesson.teacherId);

  await deleteLesson(ctx, id);
  return c.json({ success: true, data: { id } });
});

lessonRoutes.post('/:id/exception', requireCapability('lessons:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const changes = parseExceptionChanges(await readJson(c));
  const lesson = await getLesson(ctx, id);
  assertStudioAccess(user, lesson.studioId);
  assertActsAsTeacher(user, lesson.teacherId);

  const updated = await createException(ctx, id, changes);
  return c.json({ success: true, data: updated });
});

lessonRoutes.delete('/:id/exception', requireCapability('lessons:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const lesson = await getLesson(ctx, id);
  assertStudioAccess(user, lesson.studioId);
  assertActsAsTeacher(user, lesson.teacherId);

  const reverted = await revertException(ctx, id);
  return c.json({ success: true, data: reverted });
});

lessonRoutes.post('/:id/status', requireCapability('lessons:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const body = parseInput(statusSchema, await readJson(c), 'request');
  const lesson = await getLesson(ctx, id);
  assertStudioAccess(user, lesson.studioId);
  assertActsAsTeacher(user, lesson.teacherId);

  const updated = await changeLessonStatus(ctx, id, body.status, { reason: body.reason });
  return c.json({ success: true, data: updated });
});

lessonRoutes.put('/:id/attendance/:studentId', requireCapability('attendance:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));
  const studentId = parseId(c.req.param('studentId'), 'studentId');

  const body = parseInput(attendanceSchema, await readJson(c), 'request');
  const lesson = await getLesson(ctx, id);
  assertStudioAccess(user, lesson.studioId);
  assertActsAsTeacher(user, lesson.teacherId);

  const updated = await markAttendance(ctx, id, studentId, body.status);
  return c.json({ success: true, data: updated });
});
