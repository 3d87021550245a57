/**
 * Grounding: prune a semantic query plan to what the live schema confirms.
 *
 * Entries that do not match are removed, never replaced. When every requested
 * table is unknown the plan cannot be answered from this database and a
 * GroundingError is raised instead of guessing another table.
 */

import { GroundingError } from '../types/errors.js';
import type { PlanFilter, SemanticQueryPlan } from '../types/models.js';
import { logger } from '../utils/logger.js';
import type { SchemaRegistry } from './schema.js';

export interface PlanGrounder {
  ground(plan: SemanticQueryPlan): Promise<SemanticQueryPlan>;
}

function findIgnoreCase(candidates: Iterable<string>, name: string): string | undefined {
  const wanted = name.trim().toLowerCase();
  for (const candidate of candidates) {
    if (candidate.toLowerCase() === wanted) return candidate;
  }
  return undefined;
}

/**
 * Ground a plan against a table → columns map.
 *
 * Idempotent, and only ever removes entries; matched identifiers take the
 * schema's casing, filter values are left as they are.
 */
export function groundPlan(
  plan: SemanticQueryPlan,
  schema: Map<string, string[]>
): SemanticQueryPlan {
  if (plan.tables.length === 0) {
    return plan;
  }

  const tables: string[] = [];
  const rejected: string[] = [];

  for (const requested of plan.tables) {
    const canonical = findIgnoreCase(schema.keys(), requested);
    if (canonical === undefined) {
      rejected.push(requested);
      logger.warn(`Grounding dropped unknown table '${requested}'`);
    } else if (!tables.includes(canonical)) {
      tables.push(canonical);
    }
  }

  if (tables.length === 0) {
    throw new GroundingError(rejected, [...schema.keys()].sort());
  }

  const resolveColumn = (reference: string): string | undefined => {
    const trimmed = reference.trim();
    const dot = trimmed.indexOf('.');

    if (dot > 0) {
      const table = findIgnoreCase(tables, trimmed.slice(0, dot));
      if (table === undefined) return undefined;
      const column = findIgnoreCase(schema.get(table) ?? [], trimmed.slice(dot + 1));
      return column === undefined ? undefined : `${table}.${column}`;
    }

    for (const table of tables) {
      const column = findIgnoreCase(schema.get(table) ?? [], trimmed);
      if (column !== undefined) return column;
    }
    return undefined;
  };

  const groundList = (references: string[], field: string): string[] => {
    const kept: string[] = [];
    for (const reference of references) {
      const column = resolveColumn(reference);
      if (column === undefined) {
        logger.warn(`Grounding dropped unknown ${field} '${reference}'`);
      } else if (!kept.includes(column)) {
        kept.push(column);
      }
    }
    return kept;
  };

  const filters: PlanFilter[] = [];
  for (const filter of plan.filters) {
    const column = resolveColumn(filter.column);
    if (column === undefined) {
      logger.warn(`Grounding dropped filter on unknown column '${filter.column}'`);
    } else {
      filters.push({ ...filter, column });
    }
  }

  let orderBy = plan.order_by;
  if (orderBy !== null) {
    const column = resolveColumn(orderBy.column);
    if (column === undefined) {
      logger.warn(`Grounding dropped order by unknown column '${orderBy.column}'`);
      orderBy = null;
    } else {
      orderBy = { ...orderBy, column };
    }
  }

  return {
    ...plan,
    tables,
    columns: groundList(plan.columns, 'column'),
    filters,
    group_by: groundList(plan.group_by, 'group by column'),
    order_by: orderBy,
  };
}

/**
 * PlanGrounder reading the live schema from the registry.
 */
export class GroundingValidator implements PlanGrounder {
  constructor(private readonly registry: SchemaRegistry) {}

  async ground(plan: SemanticQueryPlan): Promise<SemanticQueryPlan> {
    const schema = await this.registry.getTableColumns();
    return groundPlan(plan, schema);
  }
}
