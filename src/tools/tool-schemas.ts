/**
 * Tool Schemas
 * Argument validation (zod) and the function declarations presented to the model
 */

import { z } from 'zod';
import type { FunctionToolSchema } from '../agent-types.js';

export const TOOL_NAMES = [
  'list_tables',
  'table_exists',
  'describe_relation',
  'explain',
  'benchmark',
  'row_count',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

// Numeric arguments are coerced: models sometimes send "3" for 3.
export const ListTablesArgsSchema = z.object({});

export const TableExistsArgsSchema = z.object({
  name: z.string().min(1).describe('Relation name, either "table" or "schema.table"'),
});

export const DescribeRelationArgsSchema = z.object({
  name: z.string().min(1),
  sample_cols: z.coerce.number().int().positive().optional(),
});

export const ExplainArgsSchema = z.object({
  sql: z.string().min(1),
});

export const BenchmarkArgsSchema = z.object({
  sql: z.string().min(1),
  runs: z.coerce.number().int().min(1).max(50).optional(),
  warmup: z.coerce.number().int().min(0).max(20).optional(),
  timeout_s: z.coerce.number().positive().optional(),
});

export const RowCountArgsSchema = z.object({
  name: z.string().min(1),
  timeout_s: z.coerce.number().positive().optional(),
});

// --- FUNCTION DECLARATIONS FOR THE MODEL ---
// Passed to the gateway verbatim alongside the transcript.
export const TOOLS_SPEC: FunctionToolSchema[] = [
  {
    type: 'function',
    name: 'list_tables',
    description: 'List tables/views in DuckDB (excluding system schemas).',
    parameters: { type: 'object', properties: {}, required: [] },
  },
  {
    type: 'function',
    name: 'table_exists',
    description: 'Check whether a relation exists in DuckDB catalog.',
    parameters: {
      type: 'object',
      properties: { name: { type: 'string' } },
      required: ['name'],
    },
  },
  {
    type: 'function',
    name: 'describe_relation',
    description: 'Get column names and types for a table/view from information_schema.',
    parameters: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        sample_cols: { type: 'integer', default: 200 },
      },
      required: ['name'],
    },
  },
  {
    type: 'function',
    name: 'explain',
    description: 'Run EXPLAIN <sql> and return the plan text.',
    parameters: {
      type: 'object',
      properties: { sql: { type: 'string' } },
      required: ['sql'],
    },
  },
  {
    type: 'function',
    name: 'benchmark',
    description:
      'Benchmark a SQL query using EXPLAIN ANALYZE. IMPORTANT: `sql` must be raw SQL only (no markdown, no backticks, no headings).',
    parameters: {
      type: 'object',
      properties: {
        sql: { type: 'string' },
        runs: { type: 'integer', default: 3 },
        warmup: { type: 'integer', default: 1 },
        timeout_s: { type: 'integer', default: 60 },
      },
      required: ['sql'],
    },
  },
  {
    type: 'function',
    name: 'row_count',
    description: 'Count rows of a table/view. Potentially expensive on large relations; use sparingly.',
    parameters: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        timeout_s: { type: 'integer', default: 30 },
      },
      required: ['name'],
    },
  },
];
