import type { CognitiveParameter, CognitiveProfile, PedagogyProfile, PedagogyTrait, SupportLevel } from '../types.js';
import { formatValue } from './math.js';

export const LOW_SCORE_MAX = 40;
export const HIGH_SCORE_MIN = 70;

// 'reasoning' is the mean of the two reasoning parameters.
export type CognitiveSignal = Exclude<CognitiveParameter, 'logicalReasoning' | 'hypotheticalReasoning'> | 'reasoning';

// direct: a low score calls for HIGH support.
// inverse: a high score calls for HIGH support (tendency to counter, or strength to stretch).
export type NeedDirection = 'direct' | 'inverse';

export type ScoreBand = 'low' | 'medium' | 'high';

export type TraitPairing = {
  trait: PedagogyTrait;
  signal: CognitiveSignal;
  direction: NeedDirection;
  traitLabel: string;
  signalLabel: string;
  // A high moderator forces HIGH support; LOW support also needs it in the low band.
  moderator?: { parameter: CognitiveParameter; label: string };
};

export const TRAIT_PAIRINGS = [
  {
    trait: 'TCS',
    signal: 'confidence',
    direction: 'direct',
    traitLabel: 'confidence support',
    signalLabel: 'confidence',
    moderator: { parameter: 'anxiety', label: 'anxiety' }
  },
  { trait: 'TSPI', signal: 'processingSpeed', direction: 'direct', traitLabel: 'pacing support', signalLabel: 'processing speed' },
  { trait: 'TWMLS', signal: 'workingMemory', direction: 'direct', traitLabel: 'working-memory load support', signalLabel: 'working memory' },
  { trait: 'TPO', signal: 'precision', direction: 'direct', traitLabel: 'precision orientation', signalLabel: 'precision' },
  { trait: 'TECP', signal: 'errorCorrection', direction: 'direct', traitLabel: 'error-correction practice', signalLabel: 'error correction' },
  { trait: 'TET', signal: 'exploration', direction: 'direct', traitLabel: 'exploration guidance', signalLabel: 'exploration' },
  { trait: 'TICS', signal: 'impulsivity', direction: 'inverse', traitLabel: 'impulse-control structure', signalLabel: 'impulsivity' },
  { trait: 'TRD', signal: 'reasoning', direction: 'inverse', traitLabel: 'reasoning depth', signalLabel: 'reasoning' }
] as const satisfies readonly TraitPairing[];

export const TRAIT_COUNT = TRAIT_PAIRINGS.length;

const PAIRINGS: readonly TraitPairing[] = TRAIT_PAIRINGS;

export type TraitMatch = {
  trait: PedagogyTrait;
  need: SupportLevel;
  value: number;
  justification: string;
};

export type TraitCompatibility = {
  matchCount: number;
  matches: TraitMatch[];
  reasoning: string;
};

export function readSignal(profile: CognitiveProfile, signal: CognitiveSignal): number {
  switch (signal) {
    case 'reasoning':
      return (profile.logicalReasoning + profile.hypotheticalReasoning) / 2;
    default:
      return profile[signal];
  }
}

export function classifyBand(value: number): ScoreBand {
  if (value <= LOW_SCORE_MAX) return 'low';
  if (value >= HIGH_SCORE_MIN) return 'high';
  return 'medium';
}

/**
 * Support level a learner needs on one dimension.
 * The medium band always maps to HIGH support, whichever the direction.
 */
export function deriveSupportNeed(value: number, direction: NeedDirection = 'direct'): SupportLevel {
  const band = classifyBand(value);
  if (band === 'medium') return 'HIGH';
  if (direction === 'direct') {
    return band === 'low' ? 'HIGH' : 'LOW';
  }
  return band === 'high' ? 'HIGH' : 'LOW';
}

/**
 * Need for a signal moderated by a second parameter (confidence by anxiety).
 * Returns null for mixed bands, which no tutor level satisfies.
 */
export function deriveModeratedNeed(value: number, moderator: number): SupportLevel | null {
  const band = classifyBand(value);
  const moderatorBand = classifyBand(moderator);
  if (band === 'low' || moderatorBand === 'high') return 'HIGH';
  if (band === 'high' && moderatorBand === 'low') return 'LOW';
  if (band === 'medium' && moderatorBand === 'medium') return 'HIGH';
  return null;
}

function needFor(cognitive: CognitiveProfile, pairing: TraitPairing, value: number): SupportLevel | null {
  if (!pairing.moderator) return deriveSupportNeed(value, pairing.direction);
  return deriveModeratedNeed(value, cognitive[pairing.moderator.parameter]);
}

function justify(cognitive: CognitiveProfile, pairing: TraitPairing, need: SupportLevel, value: number): string {
  const level = need === 'HIGH' ? 'high' : 'low';
  const base = `${pairing.trait} ${level} ${pairing.traitLabel} suits ${classifyBand(value)} ${pairing.signalLabel} (${formatValue(value)})`;
  if (!pairing.moderator) return base;
  const moderated = cognitive[pairing.moderator.parameter];
  return `${base} with ${classifyBand(moderated)} ${pairing.moderator.label} (${formatValue(moderated)})`;
}

/**
 * Count the pedagogy traits whose strength equals the learner's derived need.
 * Justifications keep table order.
 */
export function scoreTraitCompatibility(
  cognitive: CognitiveProfile,
  pedagogy: PedagogyProfile
): TraitCompatibility {
  const matches: TraitMatch[] = [];

  for (const pairing of PAIRINGS) {
    const value = readSignal(cognitive, pairing.signal);
    const need = needFor(cognitive, pairing, value);
    if (need === null || pedagogy[pairing.trait] !== need) continue;
    matches.push({
      trait: pairing.trait,
      need,
      value,
      justification: justify(cognitive, pairing, need, value)
    });
  }

  const header = `Cognitive compatibility ${matches.length}/${TRAIT_COUNT}`;
  const reasoning = matches.length
    ? `${header}: ${matches.map((m) => m.justification).join('; ')}.`
    : `${header}: no teaching traits align with the learner's support needs.`;

  return { matchCount: matches.length, matches, reasoning };
}
