import type { CognitiveProfile, LearnerContext, MatchResult, ScoredCandidate, TutorCandidate } from '../types.js';
import { scoreTraitCompatibility, TRAIT_COUNT } from './traits.js';
import { scoreSubjectOverlap } from './subjects.js';
import { clamp, roundTo } from './math.js';

export type ScoringOptions = {
  weights: { cognitive: number; subject: number };
  strongOverlapRatio: number;
};

export function blendCompatibility(
  cognitiveScore: number,
  subjectScore: number,
  weights: ScoringOptions['weights']
): number {
  const total = weights.cognitive + weights.subject;
  if (total <= 0) return 0;
  const blended = (cognitiveScore * weights.cognitive + subjectScore * weights.subject) / total;
  return roundTo(clamp(blended, 0, 100), 1);
}

export function scoreCandidate(
  learner: LearnerContext,
  cognitive: CognitiveProfile,
  candidate: TutorCandidate,
  options: ScoringOptions
): ScoredCandidate {
  const traits = scoreTraitCompatibility(cognitive, candidate.pedagogy);
  const subjects = scoreSubjectOverlap(learner.subjects, candidate.subjects, options.strongOverlapRatio);

  const cognitiveScore = (traits.matchCount / TRAIT_COUNT) * 100;
  const subjectScore = subjects.ratio * 100;

  return {
    candidate,
    cognitiveMatchCount: traits.matchCount,
    cognitiveScore,
    subjectOverlapRatio: subjects.ratio,
    subjectScore,
    compatibilityScore: blendCompatibility(cognitiveScore, subjectScore, options.weights),
    matchedSubjects: subjects.matched,
    reasoning: traits.reasoning,
    subjectExplanation: subjects.explanation
  };
}

/**
 * Score every tutor in the pool. The pool is read, never mutated.
 */
export function scoreCandidates(
  learner: LearnerContext,
  cognitive: CognitiveProfile,
  pool: readonly TutorCandidate[],
  options: ScoringOptions
): ScoredCandidate[] {
  return pool.map((candidate) => scoreCandidate(learner, cognitive, candidate, options));
}

/**
 * Rule-based total order: match count desc, overlap desc, price asc, id asc.
 */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.cognitiveMatchCount !== b.cognitiveMatchCount) {
    return b.cognitiveMatchCount - a.cognitiveMatchCount;
  }
  if (a.subjectOverlapRatio !== b.subjectOverlapRatio) {
    return b.subjectOverlapRatio - a.subjectOverlapRatio;
  }
  if (a.candidate.price !== b.candidate.price) {
    return a.candidate.price - b.candidate.price;
  }
  return a.candidate.id < b.candidate.id ? -1 : a.candidate.id > b.candidate.id ? 1 : 0;
}

export function rankCandidates(scored: readonly ScoredCandidate[]): ScoredCandidate[] {
  return [...scored].sort(compareScored);
}

export function toMatchResult(scored: ScoredCandidate): MatchResult {
  const { candidate } = scored;
  return {
    tutor: {
      id: candidate.id,
      name: candidate.name,
      price: candidate.price,
      subjects: [...candidate.subjects]
    },
    compatibilityScore: scored.compatibilityScore,
    cognitiveMatchCount: scored.cognitiveMatchCount,
    subjectOverlapRatio: scored.subjectOverlapRatio,
    reasoning: scored.reasoning,
    subjectExplanation: scored.subjectExplanation
  };
}

/**
 * Fallback ranking: the rule-based order truncated to the result size.
 */
export function fallbackResults(ranked: readonly ScoredCandidate[], size: number): MatchResult[] {
  return ranked.slice(0, size).map(toMatchResult);
}
