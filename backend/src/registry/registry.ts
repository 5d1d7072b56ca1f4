import type { ApiDeps, DomainRegistry } from './types.js';

import { systemDomain } from './domains/system/index.js';
import { createMatchingDomain } from './domains/matching/index.js';

export function createRegistry(deps: ApiDeps): DomainRegistry[] {
  return [
    systemDomain,
    createMatchingDomain(deps)
  ];
}
