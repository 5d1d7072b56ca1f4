import type { MatchSource, SupportLevel } from '@tutor-match/shared';

export type { MatchSource, SupportLevel };

export type CognitiveParameter =
  | 'confidence'
  | 'anxiety'
  | 'processingSpeed'
  | 'workingMemory'
  | 'precision'
  | 'errorCorrection'
  | 'exploration'
  | 'impulsivity'
  | 'logicalReasoning'
  | 'hypotheticalReasoning';

// All values are on a 0-100 scale. Frozen once the assessment is finalized.
export type CognitiveProfile = Readonly<Record<CognitiveParameter, number>>;

export type PedagogyTrait = 'TCS' | 'TSPI' | 'TWMLS' | 'TPO' | 'TECP' | 'TET' | 'TICS' | 'TRD';

export type PedagogyProfile = Readonly<Record<PedagogyTrait, SupportLevel>>;

export type TutorCandidate = {
  id: string;
  name: string;
  price: number;
  subjects: string[];
  pedagogy: PedagogyProfile;
};

export type LearnerContext = {
  id: string;
  subjects: string[];
};

export type ScoredCandidate = {
  candidate: TutorCandidate;
  cognitiveMatchCount: number;  // 0..8
  cognitiveScore: number;       // 0..100
  subjectOverlapRatio: number;  // 0..1
  subjectScore: number;         // 0..100
  compatibilityScore: number;   // 0..100, one decimal
  matchedSubjects: string[];
  reasoning: string;
  subjectExplanation: string;
};

export type TutorSummary = {
  id: string;
  name: string;
  price: number;
  subjects: string[];
};

export type MatchResult = {
  tutor: TutorSummary;
  compatibilityScore: number;
  cognitiveMatchCount: number;
  subjectOverlapRatio: number;
  reasoning: string;
  subjectExplanation: string;
};

export type FallbackReason = 'provider_unavailable' | 'response_invalid' | 'timeout';

export type MatchOutcome = {
  matches: MatchResult[];
  processingTimeMs: number;
  cacheHit: boolean;
  source: MatchSource;
  fallbackReason?: FallbackReason;
};

export type FindMatchesInput = {
  learner: LearnerContext;
  cognitiveProfile: CognitiveProfile | null;
  tutorPool: TutorCandidate[];
};

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};
