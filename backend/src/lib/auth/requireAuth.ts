import type { Handler } from '../http/types.js';
import type { AuthRule } from './rules.js';
import { getAccessToken, tokenToContext } from './token.js';

export function requireAuth(rule: AuthRule): Handler {
  return (req, res, next) => {
    if (rule.kind === 'public') return next();

    // attachContext may already have set it; still enforce for protected routes
    if (!req.ctx?.learnerId) {
      const token = getAccessToken(req);
      if (!token) {
        return res.status(401).json({ error: 'Authentication required' });
      }
      const ctx = tokenToContext(token);
      if (!ctx) {
        return res.status(401).json({ error: 'invalid token' });
      }
      req.ctx = { ...req.ctx, ...ctx };
    }

    if (req.ctx.role !== 'learner') {
      return res.status(403).json({ error: 'Learner access required' });
    }
    return next();
  };
}
