import { z } from 'zod';
import { AiResponseInvalidError } from './errors.js';

const RankedTutorSchema = z.object({
  tutor_id: z.coerce.string().min(1),
  reasoning: z.string().trim().min(1),
  subject_explanation: z.string().trim().optional(),
  // Accepted and ignored: scores always come from rule-based scoring.
  final_score: z.unknown().optional()
});

const RankingResponseSchema = z.object({
  matches: z.array(RankedTutorSchema).min(1)
});

export type RankedTutor = {
  tutorId: string;
  reasoning: string;
  subjectExplanation: string | null;
};

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(CODE_FENCE);
  return fenced?.[1] ?? trimmed;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(stripCodeFence(raw));
  } catch (error) {
    throw new AiResponseInvalidError('AI returned invalid response format', { cause: error });
  }
}

/**
 * Parse and validate a ranking response against the shortlist that was sent.
 * Requires exactly `expectedCount` distinct ids, all drawn from `allowedIds`.
 */
export function parseRankingResponse(
  raw: string,
  allowedIds: ReadonlySet<string>,
  expectedCount: number
): RankedTutor[] {
  const parsed = RankingResponseSchema.safeParse(parseJson(raw));
  if (!parsed.success) {
    throw new AiResponseInvalidError(`AI response has unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const seen = new Set<string>();
  const ranked: RankedTutor[] = [];
  for (const match of parsed.data.matches) {
    const tutorId = match.tutor_id.trim();
    if (!allowedIds.has(tutorId)) {
      throw new AiResponseInvalidError(`AI referenced unknown tutor id: ${tutorId}`);
    }
    if (seen.has(tutorId)) {
      throw new AiResponseInvalidError(`AI ranked tutor ${tutorId} more than once`);
    }
    seen.add(tutorId);
    ranked.push({
      tutorId,
      reasoning: match.reasoning,
      subjectExplanation: match.subject_explanation || null
    });
  }

  if (ranked.length !== expectedCount) {
    throw new AiResponseInvalidError(`AI returned ${ranked.length} matches, expected ${expectedCount}`);
  }

  return ranked;
}
