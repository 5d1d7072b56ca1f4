export type ChatMessage = {
  role: 'system' | 'user';
  content: string;
};

export type CompletionOptions = {
  signal: AbortSignal;
  maxTokens: number;
};

/**
 * Narrow seam around the LLM provider. Implementations return the raw text
 * of the first completion and throw on any provider failure.
 */
export interface LlmClient {
  readonly provider: string;
  readonly model: string;
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}
