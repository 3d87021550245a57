/**
 * Live schema access shared by grounding, validation and retrieval.
 */

import type {
  ColumnInfo,
  ForeignKeyInfo,
  RetrievalMetadata,
  SchemaSnapshot,
} from '../types/models.js';
import { errorMessage } from '../types/errors.js';
import { LazySingleton } from '../utils/single-flight.js';
import { logger } from '../utils/logger.js';

/**
 * Introspection of the target database. Engine-agnostic from the pipeline's
 * point of view; the database schema to inspect is fixed by the connection.
 */
export interface SchemaCatalog {
  listTables(): Promise<string[]>;
  listColumns(table: string): Promise<ColumnInfo[]>;
  listForeignKeys(): Promise<ForeignKeyInfo[]>;
}

export interface SchemaRegistryOptions {
  ttlSeconds?: number;
  now?: () => number;
}

/**
 * TTL-cached snapshot of the catalog, rebuilt wholesale on expiry.
 */
export class SchemaRegistry {
  private readonly snapshot: LazySingleton<SchemaSnapshot>;

  constructor(
    private readonly catalog: SchemaCatalog,
    options: SchemaRegistryOptions = {}
  ) {
    const now = options.now ?? Date.now;
    this.snapshot = new LazySingleton(
      () => this.load(now),
      (options.ttlSeconds ?? 3600) * 1000,
      now
    );
  }

  getSnapshot(): Promise<SchemaSnapshot> {
    return this.snapshot.get();
  }

  /**
   * Table name → column names, keyed with the database's casing.
   */
  async getTableColumns(): Promise<Map<string, string[]>> {
    const snapshot = await this.getSnapshot();
    const map = new Map<string, string[]>();
    for (const [table, columns] of snapshot.tables) {
      map.set(table, columns.map((c) => c.name));
    }
    return map;
  }

  invalidate(): void {
    this.snapshot.invalidate();
  }

  private async load(now: () => number): Promise<SchemaSnapshot> {
    const tableNames = await this.catalog.listTables();

    // Fetch all table schemas in parallel
    const columns = await Promise.all(
      tableNames.map(async (table) => [table, await this.catalog.listColumns(table)] as const)
    );

    let foreignKeys: ForeignKeyInfo[] = [];
    try {
      foreignKeys = await this.catalog.listForeignKeys();
    } catch (error) {
      // Foreign keys might not be supported in all databases
      logger.warn(`Could not fetch foreign keys: ${errorMessage(error)}`);
    }

    logger.info(
      `Cached schema for ${tableNames.length} tables (${foreignKeys.length} foreign keys)`
    );

    return {
      tables: new Map(columns),
      foreignKeys,
      loadedAt: now(),
    };
  }
}

/**
 * Formatted schema description for LLM prompts.
 */
export function describeSchema(snapshot: SchemaSnapshot): string {
  const lines: string[] = ['Available tables and their columns:'];

  for (const [table, columns] of snapshot.tables) {
    lines.push(`- ${table}: ${columns.map((c) => `${c.name} (${c.dataType})`).join(', ')}`);
  }

  if (snapshot.foreignKeys.length > 0) {
    lines.push('');
    lines.push('Table Relationships (Foreign Keys):');
    for (const fk of snapshot.foreignKeys) {
      lines.push(`- ${fk.table}.${fk.column} -> ${fk.refTable}.${fk.refColumn}`);
    }
  }

  lines.push('');
  lines.push('Use actual table and column names exactly as shown above.');

  return lines.join('\n');
}

/**
 * A schema element rendered as text for retrieval.
 */
export interface SchemaDocument {
  id: string;
  document: string;
  metadata: RetrievalMetadata;
}

export function tableDocument(table: string, columns: ColumnInfo[]): SchemaDocument {
  const names = columns.map((c) => c.name);
  return {
    id: `table:${table}`,
    document: `Table: ${table}\nColumns: ${names.join(', ')}`,
    metadata: { type: 'table', name: table, columns: names },
  };
}

/**
 * Render every table, column and relationship of a snapshot as a document.
 */
export function buildSchemaDocuments(snapshot: SchemaSnapshot): SchemaDocument[] {
  const documents: SchemaDocument[] = [];

  for (const [table, columns] of snapshot.tables) {
    documents.push(tableDocument(table, columns));
    for (const column of columns) {
      documents.push({
        id: `column:${table}.${column.name}`,
        document: `Column: ${table}.${column.name} (${column.dataType})`,
        metadata: { type: 'column', name: column.name, table },
      });
    }
  }

  for (const fk of snapshot.foreignKeys) {
    documents.push({
      id: `relationship:${fk.table}.${fk.column}`,
      document: `Relationship: ${fk.table}.${fk.column} -> ${fk.refTable}.${fk.refColumn}`,
      metadata: { type: 'relationship', name: `${fk.table}.${fk.column}`, table: fk.table },
    });
  }

  return documents;
}
