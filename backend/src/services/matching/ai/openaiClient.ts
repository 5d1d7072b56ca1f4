import OpenAI, { APIError, APIUserAbortError } from 'openai';
import type { ChatMessage, CompletionOptions, LlmClient } from './llmClient.js';
import { AiProviderUnavailableError } from './errors.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_TEMPERATURE = 0.1;

export type OpenAiClientOptions = {
  apiKey: string;
  model?: string;
};

function describeApiError(error: APIError): string {
  if (error.status === 429 && error.code === 'insufficient_quota') {
    return 'OpenAI quota exhausted';
  }
  return `OpenAI API error${error.status ? ` (${error.status})` : ''}: ${error.message}`;
}

export class OpenAiClient implements LlmClient {
  readonly provider = 'openai';
  readonly model: string;
  private client: OpenAI;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: DEFAULT_TEMPERATURE,
          max_tokens: options.maxTokens,
          response_format: { type: 'json_object' }
        },
        { signal: options.signal, maxRetries: 0 }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new AiProviderUnavailableError('No response content from OpenAI');
      }
      return content.trim();
    } catch (error) {
      if (error instanceof APIUserAbortError) throw error;
      if (error instanceof APIError) {
        throw new AiProviderUnavailableError(describeApiError(error), { cause: error });
      }
      throw error;
    }
  }
}
