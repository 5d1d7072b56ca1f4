import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { ApiRole } from '../http/types.js';

const AccessTokenSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['learner', 'tutor', 'admin']),
  iat: z.number().optional(),
  exp: z.number().optional()
});

export type AccessTokenPayload = {
  sub: string;
  role: ApiRole;
  iat?: number;
  exp?: number;
};

function env(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}

function accessTtlSeconds(): number {
  const raw = Number(process.env.JWT_ACCESS_TTL_SECONDS ?? 900);
  return Number.isFinite(raw) && raw > 0 ? raw : 900;
}

export function signAccessToken(payload: Pick<AccessTokenPayload, 'sub' | 'role'>) {
  return jwt.sign({ sub: payload.sub, role: payload.role }, env('JWT_ACCESS_SECRET'), {
    expiresIn: accessTtlSeconds()
  });
}

export function verifyAccessToken(token: string): AccessTokenPayload {
  const decoded = jwt.verify(token, env('JWT_ACCESS_SECRET'));
  const parsed = AccessTokenSchema.safeParse(decoded);
  if (!parsed.success) throw new jwt.JsonWebTokenError('invalid token payload');
  return parsed.data;
}
