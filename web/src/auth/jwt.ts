/**
 * JWT access tokens
 * Uses jose for signing and verification.
 */

import * as jose from 'jose';
import { z } from 'zod';
import { ROLES, type Role } from './roles';

const ACCESS_TOKEN_EXPIRY = '15m';
const ISSUER = 'lesson-scheduler';
const AUDIENCE = 'lesson-scheduler-api';

export interface TokenClaims {
  sub: string;
  role: Role;
  /** Studios a non-admin may reach */
  studioIds: number[];
  /** Set for teachers: the teacher id the user acts as */
  teacherId?: number;
  /** Set for students: the student id the user acts as */
  studentId?: number;
}

export interface JWTPayload extends TokenClaims {
  type: 'access';
}

const payloadSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  studioIds: z.array(z.number().int().positive()).default([]),
  teacherId: z.number().int().positive().optional(),
  studentId: z.number().int().positive().optional(),
  type: z.literal('access'),
});

export async function generateAccessToken(
  claims: TokenClaims,
  secret: string,
  expiresIn: string = ACCESS_TOKEN_EXPIRY
): Promise<string> {
  const secretKey = new TextEncoder().encode(secret);
  const { sub, ...rest } = claims;

  return new jose.SignJWT({ ...rest, type: 'access' })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(sub)
    .setIssuedAt()
    .setExpirationTime(expiresIn)
    .setIssuer(ISSUER)
    .setAudience(AUDIENCE)
    .sign(secretKey);
}

/**
 * Verify and decode a token. Null for a bad signature, an expired token or
 * claims of the wrong shape.
 */
export async function verifyToken(token: string, secret: string): Promise<JWTPayload | null> {
  const secretKey = new TextEncoder().encode(secret);

  let payload: jose.JWTPayload;
  try {
    ({ payload } = await jose.jwtVerify(token, secretKey, {
      issuer: ISSUER,
      audience: AUDIENCE,
    }));
  } catch (err) {
    if (err instanceof jose.errors.JOSEError) return null;
    throw err;
  }

  const parsed = payloadSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) return null;

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    return null;
  }

  return parts[1];
}
