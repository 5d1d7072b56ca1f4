import type { DomainRegistry } from '../../types.js';
import { Auth } from '../../../lib/auth/rules.js';

export const SERVICE_META = { name: 'tutor-match', version: '0.1.0' } as const;

export const systemDomain: DomainRegistry = {
  domain: 'system',
  routes: [
    {
      id: 'system.GET./meta',
      method: 'GET',
      path: '/meta',
      auth: Auth.public(),
      summary: 'API meta',
      tags: ['system'],
      handler: (_req, res) => res.json(SERVICE_META)
    }
  ]
};
