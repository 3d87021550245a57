/**
 * Embedding service for vector retrieval over schema documents.
 */

import { embedMany } from 'ai';
import type { EmbeddingModel } from 'ai';
import type { EmbeddingConfig } from '../config.js';
import { LLMError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Turns texts into vectors, one per input, in order.
 */
export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * OpenAI embeddings through the AI SDK.
 */
export class OpenAIEmbedder implements Embedder {
  private model: EmbeddingModel<string> | null = null;
  private modelPromise: Promise<EmbeddingModel<string>> | null = null;

  constructor(private readonly config: EmbeddingConfig) {}

  /**
   * Lazy initialization of embedding model
   */
  private async initializeModel(): Promise<EmbeddingModel<string>> {
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
   * Passes the API key directly to avoid process.env races
   */
  private async loadModel(): Promise<EmbeddingModel<string>> {
    const { createOpenAI } = await import('@ai-sdk/openai');
    const openai = createOpenAI({ apiKey: this.config.apiKey });
    const model = openai.textEmbeddingModel(this.config.model);
    this.model = model;
    return model;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const model = await this.initializeModel();
    logger.debug(`Generating ${texts.length} embeddings with ${this.config.model}`);

    try {
      const { embeddings } = await embedMany({ model, values: texts });
      return embeddings;
    } catch (error) {
      throw new LLMError(`Failed to generate embeddings: ${errorMessage(error)}`);
    }
  }
}
