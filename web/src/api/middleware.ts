/**
 * API Middleware - Authentication & Authorization
 */

import type { Context, Next } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../../../src/errors';
import { parseInput } from '../../../src/validation';
import { extractBearerToken, verifyToken, type JWTPayload } from '../auth/jwt';
import { hasCapability, type Capability } from '../auth/roles';
import type { AppEnv } from '../server';

/**
 * Authenticated, but not allowed to touch this resource. Rendered as 403.
 */
export class ForbiddenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ForbiddenError';
  }
}

function unauthorized(c: Context<AppEnv>, message: string) {
  return c.json({
    success: false,
    error: {
      code: 'UNAUTHORIZED',
      message,
    },
  }, 401);
}

/**
 * Authentication middleware - verifies the bearer token and sets `user`
 */
export async function authMiddleware(c: Context<AppEnv>, next: Next) {
  const token = extractBearerToken(c.req.header('Authorization'));

  if (!token) {
    return unauthorized(c, 'Missing or invalid authorization header');
  }

  const payload = await verifyToken(token, c.get('deps').jwtSecret);

  if (!payload) {
    return unauthorized(c, 'Invalid or expired token');
  }

  c.set('user', payload);
  await next();
}

/**
 * Route guard - the caller's role must grant `capability`
 */
export function requireCapability(capability: Capability) {
  return async (c: Context<AppEnv>, next: Next) => {
    const user = c.get('user');

    if (!hasCapability(user.role, capability)) {
      return c.json({
        success: false,
        error: {
          code: 'FORBIDDEN',
          message: `Missing permission: ${capability}`,
        },
      }, 403);
    }

    await next();
  };
}

export function canAccessStudio(user: JWTPayload, studioId: number): boolean {
  return user.role === 'admin' || user.studioIds.includes(studioId);
}

export function assertStudioAccess(user: JWTPayload, studioId: number): void {
  if (!canAccessStudio(user, studioId)) {
    throw new ForbiddenError(`You do not have access to studio ${studioId}`);
  }
}

/**
 * Teachers may only manage their own lessons and patterns.
 */
export function assertActsAsTeacher(user: JWTPayload, teacherId: number): void {
  if (user.role === 'teacher' && user.teacherId !== teacherId) {
    throw new ForbiddenError('Teachers can only manage their own lessons');
  }
}

const idSchema = z.coerce.number().int().positive();

export function parseId(value: string | undefined, name = 'id'): number {
  return parseInput(idSchema, value, name);
}

/**
 * Request body as JSON. An empty body counts as `{}`.
 */
export async function readJson(c: Context<AppEnv>): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') return {};

  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}
