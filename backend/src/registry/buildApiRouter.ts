import { Router } from 'express';
import { attachContext } from '../middleware/attachContext.js';
import { requireAuth } from '../lib/auth/requireAuth.js';
import { createRegistry } from './registry.js';
import type { ApiDeps, RouteDef } from './types.js';

function applyRoute(router: Router, r: RouteDef) {
  const handlers = [requireAuth(r.auth), r.handler];
  switch (r.method) {
    case 'GET':
      router.get(r.path, ...handlers);
      break;
    case 'POST':
      router.post(r.path, ...handlers);
      break;
    case 'PUT':
      router.put(r.path, ...handlers);
      break;
    case 'PATCH':
      router.patch(r.path, ...handlers);
      break;
    case 'DELETE':
      router.delete(r.path, ...handlers);
      break;
  }
}

export function buildApiRouter(deps: ApiDeps) {
  const registry = createRegistry(deps);
  const router = Router();
  router.use(attachContext);

  router.get('/', (_req, res) => {
    res.json({
      ok: true,
      domains: registry.map(d => d.domain),
      routes: registry.flatMap(d => d.routes.map(r => ({ id: r.id, method: r.method, path: '/api' + r.path })))
    });
  });

  for (const domain of registry) {
    for (const r of domain.routes) applyRoute(router, r);
  }

  return router;
}
