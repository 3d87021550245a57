/**
 * In-memory vector index over schema documents.
 *
 * Linear scan; schemas are small enough that an ANN index would not pay off.
 */

import { cosineSimilarity } from 'ai';
import type { Embedder } from '../embedding.js';
import type { SchemaRegistry, SchemaDocument } from '../schema.js';
import { buildSchemaDocuments } from '../schema.js';
import { LazySingleton } from '../../utils/single-flight.js';
import { logger } from '../../utils/logger.js';

export interface VectorMatch extends SchemaDocument {
  /** 1 - cosine similarity */
  distance: number;
}

export interface VectorSearch {
  search(query: string, k: number): Promise<VectorMatch[]>;
  refresh(): void;
}

interface IndexedDocument extends SchemaDocument {
  embedding: number[];
}

export class MemoryVectorStore implements VectorSearch {
  private readonly index: LazySingleton<IndexedDocument[]>;

  constructor(
    registry: SchemaRegistry,
    private readonly embedder: Embedder
  ) {
    this.index = new LazySingleton(async () => {
      const documents = buildSchemaDocuments(await registry.getSnapshot());
      const embeddings = await this.embedder.embed(documents.map((d) => d.document));
      logger.info(`Indexed ${documents.length} schema documents for vector search`);
      return documents.map((doc, i) => ({ ...doc, embedding: embeddings[i] ?? [] }));
    });
  }

  async search(query: string, k: number): Promise<VectorMatch[]> {
    const documents = await this.index.get();
    if (documents.length === 0) return [];

    const [queryEmbedding] = await this.embedder.embed([query]);
    if (!queryEmbedding) return [];

    return documents
      .map(({ embedding, ...doc }) => ({
        ...doc,
        distance: 1 - cosineSimilarity(queryEmbedding, embedding),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  refresh(): void {
    this.index.invalidate();
  }
}
