import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CognitiveProfile, PedagogyProfile, TutorCandidate } from '../matching/types.js';

const Score = z.number().min(0).max(100);
const Level = z.enum(['HIGH', 'LOW']);

const AssessmentSchema = z.object({
  confidence: Score,
  anxiety: Score,
  processingSpeed: Score,
  workingMemory: Score,
  precision: Score,
  errorCorrection: Score,
  exploration: Score,
  impulsivity: Score,
  logicalReasoning: Score,
  hypotheticalReasoning: Score
});

const PedagogySchema = z.object({
  TCS: Level.nullable().optional(),
  TSPI: Level.nullable().optional(),
  TWMLS: Level.nullable().optional(),
  TPO: Level.nullable().optional(),
  TECP: Level.nullable().optional(),
  TET: Level.nullable().optional(),
  TICS: Level.nullable().optional(),
  TRD: Level.nullable().optional()
});

const LearnerSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  subjects: z.array(z.string()).default([]),
  assessment: AssessmentSchema.nullable().default(null)
});

const TutorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  price: z.number().nonnegative(),
  subjects: z.array(z.string()).default([]),
  pedagogy: PedagogySchema.nullable().default(null)
});

export const DirectorySeedSchema = z.object({
  learners: z.array(LearnerSchema).default([]),
  tutors: z.array(TutorSchema).default([])
});

export type DirectorySeed = z.infer<typeof DirectorySeedSchema>;
export type DirectorySeedInput = z.input<typeof DirectorySeedSchema>;
type TutorRecord = z.infer<typeof TutorSchema>;
type PedagogyRecord = z.infer<typeof PedagogySchema>;

export type LearnerRecord = {
  id: string;
  name: string;
  subjects: string[];
};

/**
 * Read side of the learner/tutor records the matching engine consumes.
 */
export interface TutorDirectory {
  findLearner(learnerId: string): LearnerRecord | null;
  findAssessment(learnerId: string): CognitiveProfile | null;
  listQualifiedTutors(): TutorCandidate[];
}

function completePedagogy(pedagogy: PedagogyRecord | null): PedagogyProfile | null {
  if (!pedagogy) return null;
  const { TCS, TSPI, TWMLS, TPO, TECP, TET, TICS, TRD } = pedagogy;
  if (!TCS || !TSPI || !TWMLS || !TPO || !TECP || !TET || !TICS || !TRD) return null;
  return { TCS, TSPI, TWMLS, TPO, TECP, TET, TICS, TRD };
}

/**
 * A tutor qualifies only when every pedagogy trait is set.
 */
export function toQualifiedCandidate(tutor: TutorRecord): TutorCandidate | null {
  const pedagogy = completePedagogy(tutor.pedagogy);
  if (!pedagogy) return null;
  return {
    id: tutor.id,
    name: tutor.name,
    price: tutor.price,
    subjects: [...tutor.subjects],
    pedagogy
  };
}

export class MemoryTutorDirectory implements TutorDirectory {
  private seed: DirectorySeed;

  constructor(seed: DirectorySeedInput) {
    this.seed = DirectorySeedSchema.parse(seed);
  }

  findLearner(learnerId: string): LearnerRecord | null {
    const learner = this.seed.learners.find((row) => row.id === learnerId);
    if (!learner) return null;
    return { id: learner.id, name: learner.name, subjects: [...learner.subjects] };
  }

  findAssessment(learnerId: string): CognitiveProfile | null {
    const learner = this.seed.learners.find((row) => row.id === learnerId);
    return learner?.assessment ? { ...learner.assessment } : null;
  }

  listQualifiedTutors(): TutorCandidate[] {
    const pool: TutorCandidate[] = [];
    for (const tutor of this.seed.tutors) {
      const candidate = toQualifiedCandidate(tutor);
      if (candidate) pool.push(candidate);
    }
    return pool;
  }
}

export async function loadDirectorySeed(path: string | URL): Promise<DirectorySeed> {
  const raw = await readFile(path, 'utf8');
  return DirectorySeedSchema.parse(JSON.parse(raw));
}

export const DEFAULT_SEED_URL = new URL('../../../data/sample-directory.json', import.meta.url);
