import type { ScoredCandidate } from '../types.js';
import type { ChatMessage } from './llmClient.js';
import { TRAIT_COUNT } from '../scoring/traits.js';

export const SYSTEM_PROMPT = 'You are a tutor-student matching expert. Return only valid JSON responses.';

// Roughly four characters per token for English prompts.
const CHARS_PER_TOKEN = 4;

export type RankingContext = {
  requestedSubjects: string[];
  resultSize: number;
};

function tutorLine(scored: ScoredCandidate, index: number): string {
  const overlap = Math.round(scored.subjectOverlapRatio * 100);
  const subjects = scored.candidate.subjects.join(', ') || '-';
  return `${index + 1}. ${scored.candidate.id} | ${scored.cognitiveMatchCount}/${TRAIT_COUNT} | ${overlap}% | ${scored.candidate.price} | ${subjects}`;
}

/**
 * Compact ranking prompt. Carries tutor ids, scores, prices and subjects only;
 * nothing identifying the learner is included.
 */
export function buildRankingPrompt(shortlist: readonly ScoredCandidate[], context: RankingContext): string {
  const count = Math.min(context.resultSize, shortlist.length);
  return [
    'Rank tutors for one learner by: 1) cognitive trait fit 2) subject overlap 3) lower price on ties.',
    `Requested subjects: ${JSON.stringify(context.requestedSubjects)}`,
    'Subject rules: Maths=Mathematics; Science covers Physics/Chemistry/Biology.',
    `Tutors (id | traits matched/${TRAIT_COUNT} | subject overlap | price | subjects):`,
    ...shortlist.map(tutorLine),
    `Return the best ${count} as JSON, best first, each tutor_id taken from the list above:`,
    '{"matches":[{"tutor_id":"id","reasoning":"one or two sentences on trait fit","subject_explanation":"one sentence"}]}'
  ].join('\n');
}

export function buildRankingMessages(shortlist: readonly ScoredCandidate[], context: RankingContext): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: buildRankingPrompt(shortlist, context) }
  ];
}

export function estimateTokens(messages: readonly ChatMessage[]): number {
  const chars = messages.reduce((sum, message) => sum + message.content.length, 0);
  return Math.ceil(chars / CHARS_PER_TOKEN);
}
