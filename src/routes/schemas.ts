/**
 * Database schema endpoints.
 */

import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from './query.js';

export async function schemaRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // GET /schema - Tables, columns and foreign keys as introspected
  fastify.get(
    '/schema',
    {
      schema: {
        description: 'List tables, columns and foreign keys of the connected database',
        tags: ['Schema'],
      },
    },
    async () => {
      const snapshot = await services.registry.getSnapshot();
      return {
        tables: [...snapshot.tables].map(([name, columns]) => ({
          name,
          columns: columns.map((c) => ({
            name: c.name,
            data_type: c.dataType,
            nullable: c.nullable,
          })),
        })),
        foreign_keys: snapshot.foreignKeys.map((fk) => ({
          table: fk.table,
          column: fk.column,
          ref_table: fk.refTable,
          ref_column: fk.refColumn,
        })),
        loaded_at: new Date(snapshot.loadedAt).toISOString(),
      };
    }
  );

  // POST /schema/refresh - Drop cached schema and retrieval indexes
  fastify.post(
    '/schema/refresh',
    {
      schema: {
        description: 'Re-read the schema on the next request',
        tags: ['Schema'],
      },
    },
    async () => {
      services.registry.invalidate();
      await services.retrieval.refresh();
      const snapshot = await services.registry.getSnapshot();
      return { refreshed: true, tables: snapshot.tables.size };
    }
  );
}
