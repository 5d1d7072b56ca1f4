import type { Request, Response, NextFunction } from 'express';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
export type Handler = (req: Request, res: Response, next: NextFunction) => unknown;

export type ApiRole = 'learner' | 'tutor' | 'admin';

export type ApiContext = { learnerId?: string; role?: ApiRole };

declare global {
  namespace Express {
    interface Request {
      ctx: ApiContext;
    }
  }
}
