/**
 * SQL Optimizer Agent: tool-calling dialogue loop
 * The model checks the catalog, explains and benchmarks through tools, then answers with a rewrite.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import {
  addUsage,
  emptyUsage,
  type AgentEvent,
  type FunctionCallItem,
  type FunctionToolSchema,
  type ModelGateway,
  type ResponseItem,
  type SqlTooling,
  type TokenUsage,
  type ToolArgs,
  type ToolResult,
  type TranscriptEntry,
} from './agent-types.js';
import { logger } from './logger.js';
import { extractTableRefs } from './sql-extract.js';
import { createToolDispatcher, type ToolDispatch } from './tools/tool-dispatcher.js';
import { TOOLS_SPEC } from './tools/tool-schemas.js';

// Configuration
const SYSTEM_PROMPT_PATH = join(__dirname, '../prompts/sql-optimizer.md');
const DEFAULT_MAX_TOOL_STEPS = 30;

/** Final text when the step budget runs out before a text-only turn. */
export const MAX_TOOL_STEPS_EXHAUSTED = 'Stopped: reached max_tool_steps.';

export function loadSystemPrompt(path: string = SYSTEM_PROMPT_PATH): string {
  return readFileSync(path, 'utf-8').trim();
}

// ----------------------------------------------------------------------
// RESPONSE HANDLING
// ----------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface DecodedArguments {
  args: ToolArgs;
  /** Set when the serialized arguments could not be used and `{}` was substituted. */
  error?: string;
}

/**
 * Lenient argument decoding: anything that is not a JSON object becomes `{}`.
 */
export function decodeToolArguments(raw: string): DecodedArguments {
  if (!raw.trim()) {
    return { args: {} };
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isPlainObject(parsed)) {
      return { args: parsed };
    }
    const kind = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
    return { args: {}, error: `expected a JSON object, got ${kind}` };
  } catch (error) {
    return { args: {}, error: error instanceof Error ? error.message : String(error) };
  }
}

export function partitionOutput(items: readonly ResponseItem[]): {
  toolCalls: FunctionCallItem[];
  textChunks: string[];
} {
  const toolCalls: FunctionCallItem[] = [];
  const textChunks: string[] = [];

  for (const item of items) {
    if (item.type === 'function_call') {
      toolCalls.push(item);
    } else {
      for (const part of item.content) {
        textChunks.push(part.text);
      }
    }
  }

  return { toolCalls, textChunks };
}

// ----------------------------------------------------------------------
// DIALOGUE LOOP
// ----------------------------------------------------------------------

export interface ToolLoopParams {
  gateway: ModelGateway;
  dispatch: ToolDispatch;
  /** Appended to in place. */
  transcript: TranscriptEntry[];
  tools?: readonly FunctionToolSchema[];
  maxSteps?: number;
  round?: number;
}

export interface ToolLoopResult {
  finalText: string | null;
  events: AgentEvent[];
  exhausted: boolean;
  steps: number;
  usage: TokenUsage;
}

/**
 * Executes model/tool turns until the model returns a turn without tool calls,
 * or until the step budget is used up.
 */
export async function runToolLoop(params: ToolLoopParams): Promise<ToolLoopResult> {
  const { gateway, dispatch, transcript, tools = TOOLS_SPEC, round } = params;
  const maxSteps = params.maxSteps ?? DEFAULT_MAX_TOOL_STEPS;
  const events: AgentEvent[] = [];
  let usage = emptyUsage();

  for (let step = 1; step <= maxSteps; step++) {
    const response = await gateway.send(transcript, tools);
    usage = addUsage(usage, response.usage);

    // Raw items go back unchanged: the next turn needs them to pair calls with results.
    transcript.push(...response.output);

    const { toolCalls, textChunks } = partitionOutput(response.output);

    if (toolCalls.length > 0) {
      for (const call of toolCalls) {
        const context = { round, step, tool: call.name, callId: call.call_id };
        const { args, error } = decodeToolArguments(call.arguments);

        if (error) {
          logger.warn(`Undecodable tool arguments replaced with {}: ${error}`, context);
          events.push({ kind: 'tool_call', name: call.name, call_id: call.call_id, args, args_decode_error: error });
        } else {
          events.push({ kind: 'tool_call', name: call.name, call_id: call.call_id, args });
        }
        logger.debug(`tool_call ${JSON.stringify(args)}`, context);

        const result: ToolResult = await dispatch(call.name, args);
        events.push({ kind: 'tool_result', name: call.name, call_id: call.call_id, result });
        if (!result.ok) {
          logger.debug(`tool_result error: ${result.error}`, context);
        }

        transcript.push({
          type: 'function_call_output',
          call_id: call.call_id,
          output: JSON.stringify(result),
        });
      }
      continue;
    }

    const finalText = textChunks.filter((t) => t.trim()).join('\n').trim() || null;
    if (finalText) {
      transcript.push({ role: 'assistant', content: finalText });
    }
    return { finalText, events, exhausted: false, steps: step, usage };
  }

  logger.warn(`Step budget of ${maxSteps} exhausted without a final answer`, { round });
  return { finalText: MAX_TOOL_STEPS_EXHAUSTED, events, exhausted: true, steps: maxSteps, usage };
}

// ----------------------------------------------------------------------
// AGENT
// ----------------------------------------------------------------------

export interface AgentConfig {
  maxToolSteps: number;
}

export interface OptimizeSettings {
  runs: number;
  warmup: number;
  timeoutS: number;
  allowSemanticChange: boolean;
  round?: number;
}

export interface OptimizeOnceResult extends ToolLoopResult {
  tableRefs: string[];
  transcript: TranscriptEntry[];
}

export class SQLOptimizerAgent {
  private readonly gateway: ModelGateway;
  private readonly config: AgentConfig;
  private readonly systemPrompt: string;
  readonly dispatch: ToolDispatch;

  constructor(
    gateway: ModelGateway,
    tooling: SqlTooling,
    config: AgentConfig = { maxToolSteps: DEFAULT_MAX_TOOL_STEPS },
    systemPrompt: string = loadSystemPrompt()
  ) {
    this.gateway = gateway;
    this.config = config;
    this.systemPrompt = systemPrompt;
    this.dispatch = createToolDispatcher(tooling);
  }

  get model(): string {
    return this.gateway.model;
  }

  /**
   * Fresh transcript for one optimization round: system prompt, the task, and
   * the instruction to verify and benchmark before and after rewriting.
   */
  buildTranscript(sql: string, settings: OptimizeSettings, tableRefs: string[]): TranscriptEntry[] {
    const relations = tableRefs.length > 0 ? tableRefs.join(', ') : '(none detected)';
    return [
      { role: 'system', content: this.systemPrompt },
      {
        role: 'user',
        content:
          'Task: optimize the following SQL for DuckDB.\n\n' +
          `Allow semantic changes: ${settings.allowSemanticChange}\n` +
          `Benchmark settings: runs=${settings.runs}, warmup=${settings.warmup}, timeout_s=${settings.timeoutS}\n` +
          `Referenced relations: ${relations}\n\n` +
          'SQL:\n' +
          '```sql\n' +
          `${sql}\n` +
          '```',
      },
      {
        role: 'user',
        content:
          'Before rewriting, verify referenced relations and gather schema using tools. ' +
          'Then benchmark the baseline. After rewriting, benchmark again.',
      },
    ];
  }

  /**
   * One optimize round: the model checks relations, benchmarks the baseline,
   * proposes a rewrite and benchmarks it.
   */
  async optimizeOnce(sql: string, settings: OptimizeSettings): Promise<OptimizeOnceResult> {
    const tableRefs = extractTableRefs(sql);
    const transcript = this.buildTranscript(sql, settings, tableRefs);

    const result = await runToolLoop({
      gateway: this.gateway,
      dispatch: this.dispatch,
      transcript,
      maxSteps: this.config.maxToolSteps,
      round: settings.round,
    });

    logger.info(
      `Dialogue finished after ${result.steps} step(s), ${result.events.length / 2} tool call(s)` +
        (result.exhausted ? ' (step budget exhausted)' : ''),
      { round: settings.round }
    );

    return { ...result, tableRefs, transcript };
  }
}
