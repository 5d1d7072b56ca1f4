import type { Request } from 'express';
import type { ApiContext } from '../http/types.js';
import { verifyAccessToken } from './jwt.js';

export function getAccessToken(req: Request): string | null {
  const hdr = req.headers.authorization;
  const bearer = typeof hdr === 'string' && hdr.startsWith('Bearer ') ? hdr.slice(7) : null;
  const cookies: unknown = req.cookies;
  const cookieToken =
    cookies && typeof cookies === 'object' && 'access_token' in cookies && typeof cookies.access_token === 'string'
      ? cookies.access_token
      : null;
  return bearer ?? cookieToken;
}

// Invalid or expired tokens resolve to null; callers decide whether that is a 401.
export function tokenToContext(token: string): ApiContext | null {
  try {
    const payload = verifyAccessToken(token);
    return { learnerId: payload.sub, role: payload.role };
  } catch {
    return null;
  }
}
