import type { HttpMethod, Handler } from '../lib/http/types.js';
import type { AuthRule } from '../lib/auth/rules.js';
import type { MatchEngine } from '../services/matching/index.js';
import type { TutorDirectory } from '../services/directory/directory.js';
import type { Logger } from '../lib/logger/logger.js';

export type RouteSpec = {
  id: string;
  method: HttpMethod;
  path: string;
  auth: AuthRule;
  summary?: string;
  tags?: string[];
};

export type RouteDef = RouteSpec & { handler: Handler };

export type DomainRegistry = {
  domain: string;
  routes: RouteDef[];
};

export type ApiDeps = {
  engine: MatchEngine;
  directory: TutorDirectory;
  logger: Logger;
};
