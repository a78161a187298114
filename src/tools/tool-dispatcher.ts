/**
 * Tool Dispatcher
 * Resolves a tool name from the model to a Tool Provider operation.
 * Arguments are validated here; nothing the model sends can make dispatch throw.
 */

import type { z } from 'zod';
import type { SqlTooling, ToolArgs, ToolFailure, ToolResult } from '../agent-types.js';
import {
  BenchmarkArgsSchema,
  DescribeRelationArgsSchema,
  ExplainArgsSchema,
  ListTablesArgsSchema,
  RowCountArgsSchema,
  TableExistsArgsSchema,
  isToolName,
  type ToolName,
} from './tool-schemas.js';

export type ToolDispatch = (name: string, args: ToolArgs) => Promise<ToolResult>;

type ToolHandler = (args: ToolArgs) => Promise<ToolResult>;

function invalidArguments(name: ToolName, error: z.ZodError, args: ToolArgs): ToolFailure {
  const issues = error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return { ok: false, error: `Invalid arguments for ${name}: ${issues}`, name, args };
}

/**
 * Wrap an operation with its argument schema.
 */
function withArgs<S extends z.ZodTypeAny>(
  name: ToolName,
  schema: S,
  run: (args: z.infer<S>) => Promise<ToolResult>
): ToolHandler {
  return async (args) => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      return invalidArguments(name, parsed.error, args);
    }
    return run(parsed.data);
  };
}

export function createToolDispatcher(tooling: SqlTooling): ToolDispatch {
  const handlers: Record<ToolName, ToolHandler> = {
    list_tables: withArgs('list_tables', ListTablesArgsSchema, () => tooling.listTables()),
    table_exists: withArgs('table_exists', TableExistsArgsSchema, (a) => tooling.tableExists(a.name)),
    describe_relation: withArgs('describe_relation', DescribeRelationArgsSchema, (a) =>
      tooling.describeRelation(a.name, a.sample_cols)
    ),
    explain: withArgs('explain', ExplainArgsSchema, (a) => tooling.explain(a.sql)),
    benchmark: withArgs('benchmark', BenchmarkArgsSchema, (a) =>
      tooling.benchmark(a.sql, a.runs, a.warmup, a.timeout_s)
    ),
    row_count: withArgs('row_count', RowCountArgsSchema, (a) => tooling.rowCount(a.name, a.timeout_s)),
  };

  return async (name, args) => {
    if (!isToolName(name)) {
      return { ok: false, error: `Unknown tool: ${name}`, name, args };
    }
    try {
      return await handlers[name](args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: `${name} failed: ${message}`, name };
    }
  };
}
