import type { Handler } from '../lib/http/types.js';
import { getAccessToken, tokenToContext } from '../lib/auth/token.js';

export const attachContext: Handler = (req, _res, next) => {
  req.ctx = req.ctx ?? {};

  // Optional identification for public routes (no enforcement)
  const token = getAccessToken(req);
  const ctx = token ? tokenToContext(token) : null;
  if (ctx) {
    req.ctx = { ...req.ctx, ...ctx };
  }

  next();
};
