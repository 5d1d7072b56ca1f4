import express from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';

import { buildApiRouter } from '../registry/buildApiRouter.js';
import type { ApiDeps } from '../registry/types.js';

export type AppOptions = {
  corsOrigins?: string[];
};

const DEFAULT_CORS_ORIGIN = 'http://localhost:5173';

export function createApp(deps: ApiDeps, options: AppOptions = {}) {
  const app = express();
  const { logger } = deps;
  const corsOrigins = options.corsOrigins?.length ? options.corsOrigins : [DEFAULT_CORS_ORIGIN];

  // CORS must be first, before any request logging
  app.use(cors((req, cb) => {
    const origin = req.headers.origin;
    if (!origin) {
      return cb(null, { origin: true, credentials: true });
    }
    if (corsOrigins.includes(origin)) {
      return cb(null, { origin: true, credentials: true });
    }
    if (isSameHostOrigin(origin, req.headers.host)) {
      return cb(null, { origin: true, credentials: true });
    }
    return cb(new Error('Not allowed by CORS'));
  }));

  app.use(express.json({ limit: '100kb' }));
  app.use(cookieParser());

  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const durationMs = Date.now() - start;
      const context = { method: req.method, url: req.originalUrl, status: res.statusCode, durationMs };
      if (durationMs > 1000) {
        logger.warn('Slow request', context);
      } else {
        logger.info('Request', context);
      }
    });
    next();
  });

  // Health check - minimal, synchronous
  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.use('/api', buildApiRouter(deps));

  // Global error handler
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled request error', { method: req.method, url: req.originalUrl, error: err });
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return app;
}

function isSameHostOrigin(origin: string, hostHeader: string | undefined): boolean {
  if (!hostHeader) return false;
  try {
    const originUrl = new URL(origin);
    return originUrl.host === hostHeader;
  } catch {
    return false;
  }
}
