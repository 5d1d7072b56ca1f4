import { loadEnv } from '../src/config/env.js';
import { createLlmClientFromEnv, matchingConfigFromEnv } from '../src/services/matching/index.js';
import { AiRankerError } from '../src/services/matching/ai/errors.js';

async function main() {
  const env = loadEnv();
  const config = matchingConfigFromEnv(env);
  console.log(`GEN_AI: ${env.GEN_AI}`);
  if (env.GEN_AI === 'gemini') {
    console.log(`GEMINI_API_KEY: ${env.GEMINI_API_KEY ? 'set' : 'missing'}`);
    console.log(`GEMINI_MODEL: ${env.GEMINI_MODEL}`);
  } else {
    console.log(`OPENAI_API_KEY: ${env.OPENAI_API_KEY ? 'set' : 'missing'}`);
    console.log(`OPENAI_MODEL: ${env.OPENAI_MODEL}`);
  }
  console.log(`Timeout: ${config.ai.timeoutMs}ms`);

  const client = createLlmClientFromEnv(env);
  if (!client) {
    console.log('AI ranking disabled: every request will use rule-based ranking.');
    return;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.ai.timeoutMs);
  const started = Date.now();
  try {
    const raw = await client.complete(
      [
        { role: 'system', content: 'Return only valid JSON responses.' },
        { role: 'user', content: 'Reply with {"ok": true}.' }
      ],
      { signal: controller.signal, maxTokens: 20 }
    );
    console.log(`Provider ${client.provider} answered in ${Date.now() - started}ms: ${raw}`);
  } catch (err) {
    if (err instanceof AiRankerError) {
      console.error(`Provider check failed (${err.reason}): ${err.message}`);
    } else {
      console.error(`Provider check failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exitCode = 1;
  } finally {
    clearTimeout(timer);
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
