/**
 * Database service using Knex.js for multi-database support.
 * Supports PostgreSQL, MySQL and SQLite.
 */

import { knex } from 'knex';
import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import type { ColumnInfo, ForeignKeyInfo } from '../types/models.js';
import { logger } from '../utils/logger.js';
import type { SchemaCatalog } from './schema.js';

/**
 * Create a Knex instance and check the connection.
 */
export async function connectDatabase(config: Knex.Config): Promise<Knex> {
  const db = knex(config);

  try {
    await db.raw('SELECT 1');
  } catch (error) {
    logger.error({ err: error }, 'Failed to connect to database');
    await db.destroy();
    throw error;
  }

  logger.info(`Database initialized: ${String(config.client)}`);
  return db;
}

/**
 * SchemaCatalog backed by knex-schema-inspector.
 */
export class KnexSchemaCatalog implements SchemaCatalog {
  private inspector: ReturnType<typeof SchemaInspector>;

  constructor(db: Knex) {
    this.inspector = SchemaInspector(db);
  }

  async listTables(): Promise<string[]> {
    return this.inspector.tables();
  }

  async listColumns(table: string): Promise<ColumnInfo[]> {
    const columns = await this.inspector.columnInfo(table);
    return columns.map((col) => ({
      name: col.name,
      dataType: col.data_type,
      nullable: col.is_nullable,
    }));
  }

  async listForeignKeys(): Promise<ForeignKeyInfo[]> {
    const tables = await this.listTables();
    const foreignKeys: ForeignKeyInfo[] = [];

    for (const table of tables) {
      const fks = await this.inspector.foreignKeys(table);
      for (const fk of fks) {
        foreignKeys.push({
          table: fk.table,
          column: fk.column,
          refTable: fk.foreign_key_table,
          refColumn: fk.foreign_key_column,
        });
      }
    }

    return foreignKeys;
  }
}
