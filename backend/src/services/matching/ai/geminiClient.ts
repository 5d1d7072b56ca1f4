import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import type { GenerateContentRequest, SingleRequestOptions } from '@google/generative-ai';
import type { ChatMessage, CompletionOptions, LlmClient } from './llmClient.js';
import { AiProviderUnavailableError } from './errors.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
const DEFAULT_TEMPERATURE = 0.1;

// The slice of the SDK model this client calls.
export interface GeminiModel {
  generateContent(
    request: GenerateContentRequest,
    options: SingleRequestOptions
  ): Promise<{ response: { text(): string } }>;
}

export type GeminiClientOptions = {
  apiKey: string;
  model?: string;
  generativeModel?: GeminiModel;
};

function describeError(error: unknown): string {
  if (error instanceof GoogleGenerativeAIFetchError) {
    if (error.status === 429) return 'Gemini quota exhausted';
    return `Gemini API error${error.status ? ` (${error.status})` : ''}: ${error.message}`;
  }
  return `Gemini API error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Gemini has no separate system role in a single-turn call, so the
 * messages are sent as one prompt, system text first.
 */
export class GeminiClient implements LlmClient {
  readonly provider = 'gemini';
  readonly model: string;
  private generativeModel: GeminiModel;

  constructor(options: GeminiClientOptions) {
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.generativeModel =
      options.generativeModel ?? new GoogleGenerativeAI(options.apiKey).getGenerativeModel({ model: this.model });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const prompt = messages.map((message) => message.content).join('\n\n');
    let text: string;
    try {
      const result = await this.generativeModel.generateContent(
        {
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: DEFAULT_TEMPERATURE,
            maxOutputTokens: options.maxTokens,
            responseMimeType: 'application/json'
          }
        },
        { signal: options.signal }
      );
      text = result.response.text();
    } catch (error) {
      if (options.signal.aborted) throw error;
      throw new AiProviderUnavailableError(describeError(error), { cause: error });
    }

    const content = text.trim();
    if (!content) {
      throw new AiProviderUnavailableError('No response content from Gemini');
    }
    return content;
  }
}
