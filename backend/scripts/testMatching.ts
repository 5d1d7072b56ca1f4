import { loadEnv } from '../src/config/env.js';
import { logger } from '../src/lib/logger/logger.js';
import { createMatchEngineFromEnv, matchingConfigFromEnv } from '../src/services/matching/index.js';
import { rankCandidates, scoreCandidates } from '../src/services/matching/scoring/candidates.js';
import { DEFAULT_SEED_URL, MemoryTutorDirectory, loadDirectorySeed } from '../src/services/directory/directory.js';

function parseLearnerIdArg() {
  const raw = process.argv.find((arg) => arg.startsWith('--learnerId='));
  const value = raw?.split('=')[1]?.trim();
  return value || 'learner-ava';
}

const verbose = process.argv.includes('--verbose');

async function main() {
  const env = loadEnv();
  const directory = new MemoryTutorDirectory(
    await loadDirectorySeed(env.DIRECTORY_SEED_PATH ?? DEFAULT_SEED_URL)
  );
  const engine = createMatchEngineFromEnv(env, logger);

  const learnerId = parseLearnerIdArg();
  const learner = directory.findLearner(learnerId);
  if (!learner) {
    console.error(`Learner not found: ${learnerId}`);
    process.exitCode = 1;
    return;
  }

  const cognitiveProfile = directory.findAssessment(learner.id);
  const tutorPool = directory.listQualifiedTutors();

  if (verbose && cognitiveProfile) {
    const config = matchingConfigFromEnv(env);
    const scored = rankCandidates(scoreCandidates(learner, cognitiveProfile, tutorPool, config.scoring));
    console.log(JSON.stringify(scored.map((row) => ({
      tutorId: row.candidate.id,
      name: row.candidate.name,
      price: row.candidate.price,
      cognitiveMatchCount: row.cognitiveMatchCount,
      subjectOverlapRatio: row.subjectOverlapRatio,
      compatibilityScore: row.compatibilityScore,
      reasoning: row.reasoning,
      subjectExplanation: row.subjectExplanation
    })), null, 2));
  }

  const outcome = await engine.findMatches({
    learner: { id: learner.id, subjects: learner.subjects },
    cognitiveProfile,
    tutorPool
  });

  console.log(JSON.stringify({
    learnerId: learner.id,
    source: outcome.source,
    fallbackReason: outcome.fallbackReason ?? null,
    processingTimeMs: outcome.processingTimeMs,
    matches: outcome.matches
  }, null, 2));
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
