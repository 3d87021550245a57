/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';

// ============================================================================
// SEMANTIC QUERY PLAN
// ============================================================================

/**
 * Zod schema for filter values.
 * Supports primitives and arrays for IN clauses.
 */
const FilterValueSchema = z.union([
	z.string(),
	z.number(),
	z.boolean(),
	z.null(),
	z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])),
]);

export const FilterSchema = z.object({
	column: z.string(),
	operator: z.string().default('='),
	value: FilterValueSchema.default(null),
	type: z
		.enum(['string', 'number', 'date', 'boolean'])
		.default('string')
		.catch('string'),
});

export const OrderBySchema = z.object({
	column: z.string(),
	direction: z
		.preprocess(
			(value) => (typeof value === 'string' ? value.toUpperCase() : value),
			z.enum(['ASC', 'DESC'])
		)
		.default('ASC'),
});

/**
 * Structured reading of a question: which tables, columns, filters and
 * aggregations it needs. Produced by the understanding agent, pruned by
 * grounding.
 */
export const SemanticQueryPlanSchema = z.object({
	intent: z.string().default(''),
	tables: z.array(z.string()).default([]),
	columns: z.array(z.string()).default([]),
	filters: z.array(FilterSchema).default([]),
	aggregations: z.array(z.string()).default([]),
	group_by: z.array(z.string()).default([]),
	order_by: OrderBySchema.nullable().default(null),
	limit: z.number().int().positive().nullable().default(null).catch(null),
	ambiguities: z.array(z.string()).default([]),
	needs_clarification: z.boolean().default(false),
});

export type PlanFilter = z.infer<typeof FilterSchema>;
export type SemanticQueryPlan = z.infer<typeof SemanticQueryPlanSchema>;

// ============================================================================
// SCHEMA METADATA
// ============================================================================

export interface ColumnInfo {
	name: string;
	dataType: string;
	nullable: boolean;
}

export interface ForeignKeyInfo {
	table: string;
	column: string;
	refTable: string;
	refColumn: string;
}

/**
 * One introspected piece of the schema.
 */
export type SchemaElement =
	| { type: 'table'; name: string; columns: string[] }
	| { type: 'column'; table: string; name: string; dataType: string; nullable: boolean }
	| { type: 'relationship'; table: string; column: string; refTable: string; refColumn: string };

/**
 * Point-in-time copy of the live schema. Table keys keep the database's casing.
 */
export interface SchemaSnapshot {
	tables: Map<string, ColumnInfo[]>;
	foreignKeys: ForeignKeyInfo[];
	loadedAt: number;
}

// ============================================================================
// RETRIEVAL
// ============================================================================

export type RetrievalSource = 'vector' | 'keyword' | 'graph';

export interface RetrievalMetadata {
	type: SchemaElement['type'];
	name: string;
	table?: string;
	columns?: string[];
}

export interface RetrievalResult {
	id: string;
	document: string;
	metadata: RetrievalMetadata;
	source: RetrievalSource;
	/** Vector results only: 1 - cosine similarity. */
	distance?: number;
}

// ============================================================================
// ANALYSIS AND VISUALIZATION
// ============================================================================

export const AnalysisResultSchema = z.object({
	summary: z.string().default(''),
	insights: z.array(z.string()).default([]),
	trends: z.array(z.string()).default([]),
	anomalies: z.array(z.string()).default([]),
	recommendations: z.array(z.string()).default([]),
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

export const VisualizationConfigSchema = z.object({
	chart_type: z
		.enum(['bar', 'line', 'pie', 'area', 'scatter', 'table'])
		.default('bar')
		.catch('bar'),
	title: z.string().default(''),
	description: z.string().default(''),
	x_axis: z.string().nullable().default(null),
	y_axis: z.array(z.string()).default([]),
});

export type VisualizationConfig = z.infer<typeof VisualizationConfigSchema>;

// ============================================================================
// API
// ============================================================================

export interface QueryRequest {
	query: string;
}
