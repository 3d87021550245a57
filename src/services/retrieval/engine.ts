/**
 * Hybrid retrieval of schema context for SQL generation.
 *
 * Three sources run concurrently and fail independently:
 * - keyword: exact table/column names requested by the plan
 * - graph: tables one and two foreign-key hops away from the plan's tables
 * - vector: schema documents nearest to the question
 *
 * Results are merged in that order (exact matches first, structural
 * neighbours next, similarity last) and de-duplicated.
 */

import type { z } from 'zod';
import type { CacheProvider } from '../cache/types.js';
import type { RetrievalResult, RetrievalSource, SemanticQueryPlan } from '../../types/models.js';
import { errorMessage } from '../../types/errors.js';
import { LazySingleton } from '../../utils/single-flight.js';
import { logger } from '../../utils/logger.js';
import type { SchemaRegistry } from '../schema.js';
import {
  KeywordIndexSchema,
  SchemaGraphSchema,
  buildKeywordIndex,
  buildSchemaGraph,
  expandNeighbours,
} from './keyword-index.js';
import type { KeywordIndex, SchemaGraph } from './keyword-index.js';
import type { VectorSearch } from './vector-store.js';

export const KEYWORD_INDEX_KEY = 'rag:keyword_index';
export const SCHEMA_GRAPH_KEY = 'rag:schema_graph';

const DAY_SECONDS = 86400;

export interface RetrievalEngineOptions {
  cache?: CacheProvider;
  /** Lifetime of the keyword index and schema graph. */
  indexTtlSeconds?: number;
  defaultResults?: number;
}

export type RetrievalPlan = Pick<SemanticQueryPlan, 'tables' | 'columns'>;

/**
 * De-duplication key: `column:table:name` for columns, `type:name` otherwise.
 */
export function dedupKey(result: RetrievalResult): string {
  const { type, name, table } = result.metadata;
  const key = type === 'column' && table ? `${type}:${table}:${name}` : `${type}:${name}`;
  return key.toLowerCase();
}

/**
 * Merge result lists in priority order, keeping the first occurrence of each
 * key, truncated to nResults.
 */
export function combineResults(lists: RetrievalResult[][], nResults: number): RetrievalResult[] {
  const seen = new Set<string>();
  const combined: RetrievalResult[] = [];

  for (const list of lists) {
    for (const result of list) {
      const key = dedupKey(result);
      if (seen.has(key)) continue;
      seen.add(key);
      combined.push(result);
    }
  }

  return combined.slice(0, nResults);
}

/**
 * Render results for a prompt, grouped as tables, columns and the rest.
 */
export function formatContext(results: RetrievalResult[]): string {
  const groups: Array<[string, RetrievalResult[]]> = [
    ['Tables:', results.filter((r) => r.metadata.type === 'table')],
    ['Columns:', results.filter((r) => r.metadata.type === 'column')],
    ['Additional Context:', results.filter((r) => r.metadata.type === 'relationship')],
  ];

  return groups
    .filter(([, items]) => items.length > 0)
    .map(([heading, items]) =>
      [heading, ...items.map((r) => `- ${r.document.split('\n').join(' | ')}`)].join('\n')
    )
    .join('\n\n');
}

function tableResult(
  name: string,
  columns: string[],
  source: RetrievalSource
): RetrievalResult {
  return {
    id: `table:${name}`,
    document: `Table: ${name}\nColumns: ${columns.join(', ')}`,
    metadata: { type: 'table', name, columns },
    source,
  };
}

export class RetrievalEngine {
  private readonly keywordIndex: LazySingleton<KeywordIndex>;
  private readonly schemaGraph: LazySingleton<SchemaGraph>;
  private readonly cache: CacheProvider | undefined;
  private readonly ttlSeconds: number;
  private readonly defaultResults: number;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly vector: VectorSearch | null,
    options: RetrievalEngineOptions = {}
  ) {
    this.cache = options.cache;
    this.ttlSeconds = options.indexTtlSeconds ?? DAY_SECONDS;
    this.defaultResults = options.defaultResults ?? 10;

    this.keywordIndex = new LazySingleton(
      () =>
        this.loadCached(KEYWORD_INDEX_KEY, KeywordIndexSchema, async () =>
          buildKeywordIndex(await this.registry.getSnapshot())
        ),
      this.ttlSeconds * 1000
    );
    this.schemaGraph = new LazySingleton(
      () =>
        this.loadCached(SCHEMA_GRAPH_KEY, SchemaGraphSchema, async () =>
          buildSchemaGraph(await this.registry.getSnapshot())
        ),
      this.ttlSeconds * 1000
    );
  }

  /**
   * Hybrid search: keyword, graph and vector results merged and truncated.
   */
  async search(
    plan: RetrievalPlan,
    query: string,
    nResults: number = this.defaultResults
  ): Promise<RetrievalResult[]> {
    const [keyword, graph, vector] = await Promise.all([
      this.isolate('keyword', () => this.keywordSearch(plan)),
      this.isolate('graph', () => this.graphSearch(plan.tables)),
      this.isolate('vector', () => this.vectorSearch(query, nResults)),
    ]);

    const combined = combineResults([keyword, graph, vector], nResults);
    logger.debug(
      `Retrieval: ${keyword.length} keyword, ${graph.length} graph, ` +
        `${vector.length} vector -> ${combined.length} results`
    );
    return combined;
  }

  /**
   * Exact, case-insensitive lookups of the plan's table and column names.
   */
  async keywordSearch(plan: RetrievalPlan): Promise<RetrievalResult[]> {
    const index = await this.keywordIndex.get();
    const results: RetrievalResult[] = [];
    const planTables = plan.tables.map((t) => t.toLowerCase());

    for (const requested of plan.tables) {
      const entry = index.tables[requested.toLowerCase()];
      if (entry) {
        results.push(tableResult(entry.name, entry.columns, 'keyword'));
      }
    }

    for (const requested of plan.columns) {
      const dot = requested.indexOf('.');
      const qualifier = dot > 0 ? requested.slice(0, dot).toLowerCase() : null;
      const name = (dot > 0 ? requested.slice(dot + 1) : requested).toLowerCase();
      const owners = index.columns[name] ?? [];

      const owner =
        owners.find((o) => o.table.toLowerCase() === qualifier) ??
        owners.find((o) => planTables.includes(o.table.toLowerCase())) ??
        (qualifier === null ? owners[0] : undefined);
      if (!owner) continue;

      results.push({
        id: `column:${owner.table}.${owner.name}`,
        document: `Column: ${owner.table}.${owner.name} (${owner.dataType})`,
        metadata: { type: 'column', name: owner.name, table: owner.table },
        source: 'keyword',
      });
    }

    return results;
  }

  /**
   * Tables reachable from the seeds within two foreign-key hops.
   */
  async graphSearch(seeds: string[]): Promise<RetrievalResult[]> {
    if (seeds.length === 0) return [];

    const [graph, index] = await Promise.all([this.schemaGraph.get(), this.keywordIndex.get()]);
    const results: RetrievalResult[] = [];

    for (const { table } of expandNeighbours(graph, seeds, 2)) {
      const entry = index.tables[table];
      if (entry) {
        results.push(tableResult(entry.name, entry.columns, 'graph'));
      }
    }

    return results;
  }

  async vectorSearch(query: string, k: number): Promise<RetrievalResult[]> {
    if (!this.vector || query.trim().length === 0) return [];

    const matches = await this.vector.search(query, k);
    return matches.map((match): RetrievalResult => ({ ...match, source: 'vector' }));
  }

  /**
   * Drop the indexes so the next search rebuilds them from the registry.
   */
  async refresh(): Promise<void> {
    this.keywordIndex.invalidate();
    this.schemaGraph.invalidate();
    this.vector?.refresh();
    if (this.cache) {
      await Promise.all([this.cache.delete(KEYWORD_INDEX_KEY), this.cache.delete(SCHEMA_GRAPH_KEY)]);
    }
  }

  private async isolate(
    source: RetrievalSource,
    run: () => Promise<RetrievalResult[]>
  ): Promise<RetrievalResult[]> {
    try {
      return await run();
    } catch (error) {
      logger.warn(`Retrieval source ${source} failed: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Read a JSON structure from the shared cache, or build and store it.
   */
  private async loadCached<T extends KeywordIndex | SchemaGraph>(
    key: string,
    schema: z.ZodType<T>,
    build: () => Promise<T>
  ): Promise<T> {
    if (this.cache) {
      const cached = await this.cache.get(key);
      if (cached !== undefined) {
        const parsed = schema.safeParse(cached);
        if (parsed.success) return parsed.data;
        logger.warn(`Ignoring malformed cache entry ${key}`);
      }
    }

    const value = await build();
    if (this.cache) {
      await this.cache.set(key, value, this.ttlSeconds);
    }
    return value;
  }
}
