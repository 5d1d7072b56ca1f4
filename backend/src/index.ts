import { createServer } from 'node:http';
import { createApp } from './app/createApp.js';
import { loadEnv } from './config/env.js';
import { logger } from './lib/logger/logger.js';
import { createMatchEngineFromEnv } from './services/matching/index.js';
import { DEFAULT_SEED_URL, MemoryTutorDirectory, loadDirectorySeed } from './services/directory/directory.js';

async function main() {
  const env = loadEnv();
  const seed = await loadDirectorySeed(env.DIRECTORY_SEED_PATH ?? DEFAULT_SEED_URL);
  const directory = new MemoryTutorDirectory(seed);
  const engine = createMatchEngineFromEnv(env, logger);

  const app = createApp(
    { engine, directory, logger },
    { corsOrigins: env.CORS_ORIGIN?.split(',').map(origin => origin.trim()).filter(Boolean) }
  );

  const server = createServer(app);
  server.listen(env.PORT, () => {
    logger.info('API listening', {
      url: `http://localhost:${env.PORT}`,
      aiEnabled: Boolean(env.OPENAI_API_KEY),
      model: env.OPENAI_MODEL,
      tutors: directory.listQualifiedTutors().length
    });
  });
}

main().catch((err) => {
  logger.error('Failed to start API', { error: err });
  process.exit(1);
});
