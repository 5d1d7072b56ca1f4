import type { MatchResult, ScoredCandidate } from '../types.js';
import type { ChatMessage, LlmClient } from './llmClient.js';
import type { RankingContext } from './prompt.js';
import type { Logger } from '../../../lib/logger/logger.js';
import { buildRankingMessages, estimateTokens } from './prompt.js';
import { parseRankingResponse } from './response.js';
import { AiProviderUnavailableError, AiRankerError, AiTimeoutError } from './errors.js';
import { toMatchResult } from '../scoring/candidates.js';
import { logger as defaultLogger } from '../../../lib/logger/logger.js';

export type AiRankerOptions = {
  timeoutMs: number;
  maxTokens: number;
  logger?: Logger;
};

export type AiRankerStatus = {
  enabled: boolean;
  provider: string | null;
  model: string | null;
};

/**
 * Refines the rule-based shortlist through an LLM.
 * Every failure surfaces as an AiRankerError; scores are never taken from the model.
 */
export class AiRanker {
  private client: LlmClient | null;
  private timeoutMs: number;
  private maxTokens: number;
  private logger: Logger;

  constructor(client: LlmClient | null, options: AiRankerOptions) {
    this.client = client;
    this.timeoutMs = options.timeoutMs;
    this.maxTokens = options.maxTokens;
    this.logger = options.logger ?? defaultLogger;
  }

  status(): AiRankerStatus {
    return {
      enabled: this.client !== null,
      provider: this.client?.provider ?? null,
      model: this.client?.model ?? null
    };
  }

  async refine(shortlist: readonly ScoredCandidate[], context: RankingContext): Promise<MatchResult[]> {
    if (!this.client) {
      throw new AiProviderUnavailableError('AI provider not configured');
    }
    if (!shortlist.length) return [];

    const messages = buildRankingMessages(shortlist, context);
    this.logger.debug('AI ranking prompt built', {
      provider: this.client.provider,
      candidates: shortlist.length,
      estimatedTokens: estimateTokens(messages)
    });

    const started = Date.now();
    const raw = await this.callWithTimeout(this.client, messages);
    this.logger.debug('AI ranking response received', {
      provider: this.client.provider,
      durationMs: Date.now() - started,
      length: raw.length
    });

    const byId = new Map(shortlist.map((scored) => [scored.candidate.id, scored]));
    const expected = Math.min(context.resultSize, shortlist.length);
    const ranked = parseRankingResponse(raw, new Set(byId.keys()), expected);

    const results: MatchResult[] = [];
    for (const entry of ranked) {
      const scored = byId.get(entry.tutorId);
      if (!scored) continue;
      results.push({
        ...toMatchResult(scored),
        reasoning: entry.reasoning,
        subjectExplanation: entry.subjectExplanation ?? scored.subjectExplanation
      });
    }
    return results;
  }

  private async callWithTimeout(client: LlmClient, messages: ChatMessage[]): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new AiTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        client.complete(messages, { signal: controller.signal, maxTokens: this.maxTokens }),
        timeout
      ]);
    } catch (error) {
      if (error instanceof AiRankerError) throw error;
      if (controller.signal.aborted) throw new AiTimeoutError(this.timeoutMs);
      const message = error instanceof Error ? error.message : String(error);
      throw new AiProviderUnavailableError(`AI provider call failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
