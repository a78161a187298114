/**
 * Shared contracts for the SQL optimizer agent:
 * transcript records, tool schema, tool results and dialogue events.
 */

// ----------------------------------------------------------------------
// TRANSCRIPT
// ----------------------------------------------------------------------

export interface InputMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OutputText {
  type: 'output_text';
  text: string;
}

/** Text returned by the model for one turn. */
export interface OutputMessageItem {
  type: 'message';
  role: 'assistant';
  content: OutputText[];
  thought_signature?: string;
}

/** A tool invocation requested by the model. `arguments` is serialized JSON. */
export interface FunctionCallItem {
  type: 'function_call';
  name: string;
  arguments: string;
  call_id: string;
  thought_signature?: string;
}

export type ResponseItem = OutputMessageItem | FunctionCallItem;

/** Result of exactly one dispatched tool invocation, keyed by its call id. */
export interface FunctionCallOutputItem {
  type: 'function_call_output';
  call_id: string;
  output: string;
}

export type TranscriptEntry = InputMessage | ResponseItem | FunctionCallOutputItem;

// ----------------------------------------------------------------------
// MODEL GATEWAY
// ----------------------------------------------------------------------

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description?: string;
  default?: string | number | boolean;
}

export interface FunctionToolSchema {
  type: 'function';
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface ModelResponse {
  output: ResponseItem[];
  usage?: TokenUsage;
}

export interface ModelGateway {
  readonly model: string;
  send(transcript: readonly TranscriptEntry[], tools: readonly FunctionToolSchema[]): Promise<ModelResponse>;
}

// ----------------------------------------------------------------------
// TOOL RESULTS
// ----------------------------------------------------------------------

export type ToolArgs = Record<string, unknown>;

export interface ToolFailure {
  ok: false;
  error: string;
  [context: string]: unknown;
}

export interface RelationInfo {
  schema: string;
  name: string;
  type: string;
}

export interface ColumnInfo {
  name: string;
  type: string;
}

export interface ListTablesResult {
  ok: true;
  tables: RelationInfo[];
}

export interface TableExistsResult {
  ok: true;
  name: string;
  exists: boolean;
}

export interface DescribeQualifiedResult {
  ok: true;
  relation: string;
  columns: ColumnInfo[];
  num_columns: number;
}

export interface DescribeUnqualifiedResult {
  ok: true;
  relation: string;
  schemas: Record<string, ColumnInfo[]>;
  num_columns: number;
}

export interface ExplainResult {
  ok: true;
  plan: string;
}

export interface ExplainAnalyzeResult {
  ok: true;
  elapsed_ms_client: number;
  total_time_s_explain: number | null;
  analyze: string;
}

export interface BenchmarkRecord {
  ok: true;
  runs: number;
  warmup: number;
  elapsed_ms: number[];
  median_ms: number;
  plan_sample: string | null;
  total_time_s_sample: number | null;
}

export interface RowCountResult {
  ok: true;
  value: number;
  elapsed_ms: number;
}

export type ToolResult =
  | ListTablesResult
  | TableExistsResult
  | DescribeQualifiedResult
  | DescribeUnqualifiedResult
  | ExplainResult
  | BenchmarkRecord
  | RowCountResult
  | ToolFailure;

/**
 * The Tool Provider contract. Every operation resolves to a result object;
 * `ok: false` is an expected outcome, not a fault.
 */
export interface SqlTooling {
  listTables(): Promise<ListTablesResult | ToolFailure>;
  tableExists(name: string): Promise<TableExistsResult | ToolFailure>;
  describeRelation(
    name: string,
    sampleCols?: number
  ): Promise<DescribeQualifiedResult | DescribeUnqualifiedResult | ToolFailure>;
  explain(sql: string): Promise<ExplainResult | ToolFailure>;
  benchmark(sql: string, runs?: number, warmup?: number, timeoutS?: number): Promise<BenchmarkRecord | ToolFailure>;
  rowCount(name: string, timeoutS?: number): Promise<RowCountResult | ToolFailure>;
}

// ----------------------------------------------------------------------
// DIALOGUE EVENTS
// ----------------------------------------------------------------------

export interface ToolCallEvent {
  kind: 'tool_call';
  name: string;
  call_id: string;
  args: ToolArgs;
  args_decode_error?: string;
}

export interface ToolResultEvent {
  kind: 'tool_result';
  name: string;
  call_id: string;
  result: ToolResult;
}

export type AgentEvent = ToolCallEvent | ToolResultEvent;

export function emptyUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export function addUsage(total: TokenUsage, usage: TokenUsage | undefined): TokenUsage {
  if (!usage) return total;
  return {
    promptTokens: total.promptTokens + usage.promptTokens,
    completionTokens: total.completionTokens + usage.completionTokens,
    totalTokens: total.totalTokens + usage.totalTokens,
  };
}
