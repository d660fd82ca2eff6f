/**
 * Language model access for joke selection and topic extraction.
 * Talks to OpenRouter through its OpenAI-compatible chat completions API.
 */

import OpenAI from 'openai';
import { LlmError, errorMessage } from '../errors';

export interface LanguageModel {
  complete(prompt: string): Promise<string>;
}

export interface OpenRouterOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export class OpenRouterModel implements LanguageModel {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenRouterOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: 0
    });
  }

  async complete(prompt: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [{ role: 'user', content: prompt }]
        },
        { timeout: this.options.timeoutMs }
      );
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw new LlmError('request_failed', `Language model request failed: ${errorMessage(error)}`);
    }

    const text = content?.trim();
    if (!text) {
      throw new LlmError('empty_response', 'Empty response from language model');
    }
    return text;
  }
}

/**
 * Stand-in used when no API key is configured; every call fails so callers
 * take their fallback path.
 */
export class UnconfiguredModel implements LanguageModel {
  async complete(): Promise<string> {
    throw new LlmError('not_configured', 'Language model API key is not configured');
  }
}
