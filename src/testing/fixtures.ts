/**
 * In-process stand-ins shared by the unit tests.
 */

import type { CompletionProvider } from '../services/llm.js';
import type { SchemaCatalog } from '../services/schema.js';
import { SchemaRegistry } from '../services/schema.js';
import { SemanticQueryPlanSchema } from '../types/models.js';
import type { ColumnInfo, ForeignKeyInfo, SemanticQueryPlan } from '../types/models.js';

type PlanInput = Partial<SemanticQueryPlan>;

export function makePlan(overrides: PlanInput = {}): SemanticQueryPlan {
  return SemanticQueryPlanSchema.parse({ intent: 'test intent', ...overrides });
}

/**
 * Columns given as `name` or `name:type`; the type defaults to integer.
 */
export type TableColumns = Record<string, string[]>;

export class FakeCatalog implements SchemaCatalog {
  listTablesCalls = 0;
  failForeignKeys = false;

  constructor(
    private readonly tables: TableColumns,
    private readonly foreignKeys: ForeignKeyInfo[] = []
  ) {}

  async listTables(): Promise<string[]> {
    this.listTablesCalls++;
    return Object.keys(this.tables);
  }

  async listColumns(table: string): Promise<ColumnInfo[]> {
    return (this.tables[table] ?? []).map((entry) => {
      const [name = entry, dataType = 'integer'] = entry.split(':');
      return { name, dataType, nullable: true };
    });
  }

  async listForeignKeys(): Promise<ForeignKeyInfo[]> {
    if (this.failForeignKeys) {
      throw new Error('foreign keys not supported');
    }
    return this.foreignKeys;
  }
}

export function makeRegistry(tables: TableColumns, foreignKeys: ForeignKeyInfo[] = []): SchemaRegistry {
  return new SchemaRegistry(new FakeCatalog(tables, foreignKeys));
}

/**
 * Completion stand-in returning queued replies in order; the last reply
 * repeats once the queue is exhausted.
 */
export class ScriptedLLM implements CompletionProvider {
  readonly calls: Array<{ prompt: string; systemPrompt: string }> = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(prompt: string, systemPrompt: string): Promise<string> {
    this.calls.push({ prompt, systemPrompt });
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply === undefined) {
      throw new Error('ScriptedLLM has no replies');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export const CUSTOMERS_SCHEMA: TableColumns = {
  customers: ['id', 'name:text', 'city:text', 'created_at:timestamp'],
};
