import type { MatchStatusResponse } from '@tutor-match/shared';
import type { ApiDeps, DomainRegistry } from '../../types.js';
import { Auth } from '../../../lib/auth/rules.js';
import { json } from '../../../lib/http/json.js';
import { LearnerNotFoundError, MatchingError, RateLimitedError } from '../../../services/matching/index.js';
import { toErrorBody, toMatchTutorsResponse } from './presenter.js';

export function createMatchingDomain({ engine, directory, logger }: ApiDeps): DomainRegistry {
  return {
    domain: 'matching',
    routes: [
      {
        id: 'matching.GET./learner/match-tutors',
        method: 'GET',
        path: '/learner/match-tutors',
        auth: Auth.learner(),
        summary: 'Top tutor matches for the signed-in learner',
        tags: ['matching'],
        handler: async (req, res, next) => {
          const learnerId = req.ctx.learnerId;
          if (!learnerId) return json(res, { error: 'Authentication required' }, 401);

          try {
            const learner = directory.findLearner(learnerId);
            if (!learner) throw new LearnerNotFoundError();

            const outcome = await engine.findMatches({
              learner: { id: learner.id, subjects: learner.subjects },
              cognitiveProfile: directory.findAssessment(learner.id),
              tutorPool: directory.listQualifiedTutors()
            });
            if (outcome.fallbackReason) {
              logger.info('Served rule-based matches', { learnerId, reason: outcome.fallbackReason });
            }
            return json(res, toMatchTutorsResponse(outcome));
          } catch (err) {
            if (!(err instanceof MatchingError)) return next(err);
            if (err instanceof RateLimitedError) {
              res.setHeader('Retry-After', String(err.retryAfterSeconds));
            }
            return json(res, toErrorBody(err), err.status);
          }
        }
      },
      {
        id: 'matching.GET./learner/match-status',
        method: 'GET',
        path: '/learner/match-status',
        auth: Auth.learner(),
        summary: 'AI ranking availability and remaining matching quota',
        tags: ['matching'],
        handler: (req, res) => {
          const learnerId = req.ctx.learnerId;
          if (!learnerId) return json(res, { error: 'Authentication required' }, 401);

          const status = engine.status(learnerId);
          const body: MatchStatusResponse = {
            aiEnabled: status.ai.enabled,
            provider: status.ai.provider,
            model: status.ai.model,
            remainingRequests: status.remainingRequests,
            windowSeconds: status.windowSeconds
          };
          return json(res, body);
        }
      }
    ]
  };
}
