import { createHash } from 'node:crypto';
import type { CognitiveParameter, CognitiveProfile, LearnerContext, TutorCandidate } from '../types.js';
import { normalizeSubject } from '../scoring/subjects.js';
import { TRAIT_PAIRINGS } from '../scoring/traits.js';

const COGNITIVE_KEYS: readonly CognitiveParameter[] = [
  'confidence',
  'anxiety',
  'processingSpeed',
  'workingMemory',
  'precision',
  'errorCorrection',
  'exploration',
  'impulsivity',
  'logicalReasoning',
  'hypotheticalReasoning'
];

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

export function hashCognitiveProfile(profile: CognitiveProfile): string {
  return sha256(COGNITIVE_KEYS.map((key) => profile[key]).join('|'));
}

export function hashTutor(tutor: TutorCandidate): string {
  const pedagogy = TRAIT_PAIRINGS.map(({ trait }) => `${trait}:${tutor.pedagogy[trait]}`);
  return sha256(JSON.stringify([tutor.id, tutor.name, tutor.price, tutor.subjects, pedagogy]));
}

export function hashTutorPool(pool: readonly TutorCandidate[]): string {
  const entries = pool
    .map((tutor) => `${tutor.id}:${hashTutor(tutor)}`)
    .sort();
  return sha256(entries.join('|'));
}

/**
 * Cache key for one (learner, tutor pool, assessment) combination.
 * Any change to pool membership, tutor content or assessment yields a new key.
 */
export function computeFingerprint(
  learner: LearnerContext,
  pool: readonly TutorCandidate[],
  cognitive: CognitiveProfile
): string {
  const subjects = [...new Set(learner.subjects.map(normalizeSubject))].sort();
  return sha256(
    JSON.stringify({
      learner: learner.id,
      subjects,
      pool: hashTutorPool(pool),
      cognitive: hashCognitiveProfile(cognitive)
    })
  );
}
