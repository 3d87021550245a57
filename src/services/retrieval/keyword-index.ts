/**
 * Exact-name index and foreign-key graph built from a schema snapshot.
 * Both are plain JSON so they can be mirrored to the shared cache.
 */

import { z } from 'zod';
import type { SchemaSnapshot } from '../../types/models.js';

export const KeywordIndexSchema = z.object({
  tables: z.record(z.object({ name: z.string(), columns: z.array(z.string()) })),
  columns: z.record(
    z.array(z.object({ table: z.string(), name: z.string(), dataType: z.string() }))
  ),
});

/**
 * Lower-cased table name → table, lower-cased column name → owning columns.
 */
export type KeywordIndex = z.infer<typeof KeywordIndexSchema>;

export const SchemaGraphSchema = z.record(z.array(z.string()));

/**
 * Lower-cased table name → lower-cased neighbours. Edges are foreign keys,
 * stored in both directions.
 */
export type SchemaGraph = z.infer<typeof SchemaGraphSchema>;

export function buildKeywordIndex(snapshot: SchemaSnapshot): KeywordIndex {
  const index: KeywordIndex = { tables: {}, columns: {} };

  for (const [table, columns] of snapshot.tables) {
    index.tables[table.toLowerCase()] = {
      name: table,
      columns: columns.map((c) => c.name),
    };
    for (const column of columns) {
      const key = column.name.toLowerCase();
      const owners = index.columns[key] ?? [];
      owners.push({ table, name: column.name, dataType: column.dataType });
      index.columns[key] = owners;
    }
  }

  return index;
}

export function buildSchemaGraph(snapshot: SchemaSnapshot): SchemaGraph {
  const adjacency = new Map<string, Set<string>>();
  const link = (from: string, to: string) => {
    const neighbours = adjacency.get(from) ?? new Set<string>();
    neighbours.add(to);
    adjacency.set(from, neighbours);
  };

  for (const fk of snapshot.foreignKeys) {
    const table = fk.table.toLowerCase();
    const refTable = fk.refTable.toLowerCase();
    link(table, refTable);
    link(refTable, table);
  }

  const graph: SchemaGraph = {};
  for (const [table, neighbours] of adjacency) {
    graph[table] = [...neighbours];
  }
  return graph;
}

/**
 * Breadth-first expansion from the seed tables, hop by hop. Seeds and nodes
 * already reached are never returned again.
 */
export function expandNeighbours(
  graph: SchemaGraph,
  seeds: string[],
  maxHops = 2
): Array<{ table: string; hop: number }> {
  const visited = new Set(seeds.map((s) => s.toLowerCase()));
  const reached: Array<{ table: string; hop: number }> = [];
  let frontier = [...visited];

  for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
    const next: string[] = [];
    for (const node of frontier) {
      for (const neighbour of graph[node] ?? []) {
        if (visited.has(neighbour)) continue;
        visited.add(neighbour);
        reached.push({ table: neighbour, hop });
        next.push(neighbour);
      }
    }
    frontier = next;
  }

  return reached;
}
