/**
 * LLM integration layer using the Vercel AI SDK.
 * Supports Anthropic and OpenAI models.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import type { LLMConfig } from '../config.js';
import { LLMError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Text completion: the only thing the agents need from a model.
 */
export interface CompletionProvider {
  complete(
    prompt: string,
    systemPrompt: string,
    temperature?: number,
    maxTokens?: number
  ): Promise<string>;
}

/**
 * Service for interacting with LLM APIs via AI SDK.
 */
export class LLMService implements CompletionProvider {
  private model: LanguageModel | null = null;
  private modelPromise: Promise<LanguageModel> | null = null;
  private readonly maxRetries: number;

  constructor(
    private readonly config: LLMConfig,
    options: { maxRetries?: number } = {}
  ) {
    this.maxRetries = options.maxRetries ?? 2;
  }

  /**
   * Lazy initialization of LLM model
   */
  private async initializeModel(): Promise<LanguageModel> {
    if (this.model) {
      return this.model;
    }

    if (this.modelPromise) {
      return this.modelPromise;
    }

    this.modelPromise = this.loadModel();
    return this.modelPromise;
  }

  /**
   * Load the model based on provider configuration.
   * Passes API keys directly instead of through process.env.
   */
  private async loadModel(): Promise<LanguageModel> {
    logger.info(`Initializing LLM: ${this.config.provider}/${this.config.model}`);

    switch (this.config.provider) {
      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        const model = createAnthropic({ apiKey: this.config.apiKey })(this.config.model);
        this.model = model;
        return model;
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        const model = createOpenAI({ apiKey: this.config.apiKey })(this.config.model);
        this.model = model;
        return model;
      }

      default: {
        throw new LLMError(`Unsupported provider: ${String(this.config.provider)}`);
      }
    }
  }

  /**
   * Call the model for a plain text reply, retrying with exponential backoff.
   *
   * @throws LLMError if all attempts fail
   */
  async complete(
    prompt: string,
    systemPrompt: string,
    temperature: number = 0.0,
    maxTokens: number = this.config.maxTokens
  ): Promise<string> {
    const model = await this.initializeModel();

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const result = await generateText({
          model,
          system: systemPrompt,
          prompt,
          temperature,
          maxOutputTokens: maxTokens,
        });

        logger.debug(
          `LLM API call successful - Input: ${result.usage.inputTokens}, ` +
            `Output: ${result.usage.outputTokens}`
        );

        return result.text;
      } catch (error) {
        const waitTime = Math.pow(2, attempt); // Exponential backoff: 1s, 2s, 4s
        logger.warn(
          `LLM API call failed (attempt ${attempt + 1}/${this.maxRetries}): ${errorMessage(error)}`
        );

        if (attempt < this.maxRetries - 1) {
          await new Promise((resolve) => setTimeout(resolve, waitTime * 1000));
        } else {
          throw new LLMError(
            `LLM API failed after ${this.maxRetries} attempts: ${errorMessage(error)}`
          );
        }
      }
    }

    throw new LLMError('Unexpected error in LLM completion');
  }
}

/**
 * Strip markdown code fences from a model reply.
 */
export function stripCodeFences(text: string): string {
  const fenced = /```(?:[a-zA-Z]+)?\s*([\s\S]*?)```/.exec(text);
  return (fenced?.[1] ?? text).trim();
}

/**
 * Extract the JSON object from a model reply (fences and surrounding prose
 * are ignored).
 *
 * @throws SyntaxError when no parseable object is present
 */
export function parseJsonReply(reply: string): unknown {
  const text = stripCodeFences(reply);
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end < start) {
    throw new SyntaxError('Reply contains no JSON object');
  }
  const value: unknown = JSON.parse(text.slice(start, end + 1));
  return value;
}
