/**
 * Recurring Pattern API Routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import {
  countGeneratedLessons,
  createPattern,
  deactivatePattern,
  deletePattern,
  getPattern,
  listPatterns,
  updatePattern,
} from '../../../src/patterns';
import { generateLessons } from '../../../src/scheduler';
import { parseInput, parsePatternDelta, parsePatternInput } from '../../../src/validation';
import type { AppEnv } from '../server';
import {
  assertActsAsTeacher,
  assertStudioAccess,
  canAccessStudio,
  parseId,
  readJson,
  requireCapability,
} from './middleware';

export const patternRoutes = new Hono<AppEnv>();

const listQuerySchema = z.object({
  studioId: z.coerce.number().int().positive().optional(),
  teacherId: z.coerce.number().int().positive().optional(),
  active: z.enum(['true', 'false']).optional(),
});

const generateSchema = z.object({
  horizonEnd: z.string(),
  from: z.string().optional(),
});

const deactivateSchema = z.object({
  expectedVersion: z.number().int().positive().optional(),
});

// ============================================================================
// POST /api/patterns
// ============================================================================

patternRoutes.post('/', requireCapability('patterns:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');

  const input = parsePatternInput(await readJson(c), ctx.settings.defaultDurationMinutes);
  assertStudioAccess(user, input.studioId);
  assertActsAsTeacher(user, input.teacherId);

  const result = await createPattern(ctx, input);
  return c.json({ success: true, data: result }, 201);
});

// ============================================================================
// GET /api/patterns
// ============================================================================

patternRoutes.get('/', requireCapability('patterns:read'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');

  const query = parseInput(listQuerySchema, c.req.query(), 'query');
  if (query.studioId !== undefined) {
    assertStudioAccess(user, query.studioId);
  }

  const patterns = await listPatterns(ctx, {
    studioId: query.studioId,
    teacherId: query.teacherId,
    activeOnly: query.active === 'true',
  });

  return c.json({
    success: true,
    data: patterns.filter(p => canAccessStudio(user, p.studioId)),
  });
});

// ============================================================================
// GET /api/patterns/:id
// ============================================================================

patternRoutes.get('/:id', requireCapability('patterns:read'), async (c) => {
  const { ctx } = c.get('deps');
  const id = parseId(c.req.param('id'));

  const pattern = await getPattern(ctx, id);
  assertStudioAccess(c.get('user'), pattern.studioId);

  const generatedLessons = await countGeneratedLessons(ctx, id);
  return c.json({ success: true, data: { ...pattern, generatedLessons } });
});

// ============================================================================
// PATCH /api/patterns/:id
// ============================================================================

patternRoutes.patch('/:id', requireCapability('patterns:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const delta = parsePatternDelta(await readJson(c));
  const current = await getPattern(ctx, id);
  assertStudioAccess(user, current.studioId);
  assertActsAsTeacher(user, current.teacherId);

  const result = await updatePattern(ctx, id, delta, { force: c.req.query('force') === 'true' });
  return c.json({ success: true, data: result });
});

// ============================================================================
// POST /api/patterns/:id/deactivate
// ============================================================================

patternRoutes.post('/:id/deactivate', requireCapability('patterns:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const { expectedVersion } = parseInput(deactivateSchema, await readJson(c), 'request');
  const current = await getPattern(ctx, id);
  assertStudioAccess(user, current.studioId);
  assertActsAsTeacher(user, current.teacherId);

  const result = await deactivatePattern(ctx, id, expectedVersion);
  return c.json({ success: true, data: result });
});

// ============================================================================
// DELETE /api/patterns/:id
// ============================================================================

patternRoutes.delete('/:id', requireCapability('patterns:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const current = await getPattern(ctx, id);
  assertStudioAccess(user, current.studioId);
  assertActsAsTeacher(user, current.teacherId);

  const result = await deletePattern(ctx, id);
  return c.json({ success: true, data: result });
});

// ============================================================================
// POST /api/patterns/:id/generate
// ============================================================================

patternRoutes.post('/:id/generate', requireCapability('patterns:write'), async (c) => {
  const { ctx } = c.get('deps');
  const user = c.get('user');
  const id = parseId(c.req.param('id'));

  const body = parseInput(generateSchema, await readJson(c), 'request');
  const current = await getPattern(ctx, id);
  assertStudioAccess(user, current.studioId);
  assertActsAsTeacher(user, current.teacherId);

  const result = await generateLessons(ctx, id, body.horizonEnd, { from: body.from });
  return c.json({ success: true, data: result });
});
