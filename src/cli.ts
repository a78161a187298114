#!/usr/bin/env node
/**
 * qoptimize: optimize one SQL query against a DuckDB file from the terminal.
 */

import { existsSync, readFileSync } from 'fs';
import { parseArgs } from 'util';
import type { BenchmarkRecord } from './agent-types.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { BaselineBenchmarkError, optimizeQuery, type OptimizationEvent, type OptimizationResult } from './optimizer.js';
import { openRuntime } from './runtime.js';

export const USAGE = `Usage: qoptimize --db <path.duckdb> (--query <sql> | --query-file <file.sql>) [options]

Options:
  --db <path>               DuckDB database file (opened read-only)
  --query <sql>             SQL to optimize
  --query-file <file>       File containing the SQL to optimize
  --model <name>            Gemini model (default: GEMINI_MODEL or gemini-2.5-flash)
  --runs <n>                Timed benchmark runs (default: 3)
  --warmup <n>              Untimed warmup runs (default: 1)
  --timeout-s <s>           Per-run timeout in seconds (default: 60)
  --max-iters <n>           Optimization rounds (default: 2)
  --min-improve-pct <pct>   Stop once a round improves by at least this much (default: 10)
  --max-tool-steps <n>      Tool-call turns per round (default: MAX_TOOL_STEPS or 35)
  --allow-semantic-change   Let the model change query results
  --help                    Show this message`;

export interface CliOptions {
  db: string;
  sql: string;
  model?: string;
  runs: number;
  warmup: number;
  timeoutS: number;
  maxIters: number;
  minImprovePct: number;
  maxToolSteps?: number;
  allowSemanticChange: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function numberFlag(
  name: string,
  raw: string | undefined,
  fallback: number,
  integer: boolean,
  min: number,
  exclusiveMin: boolean = false
): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  const belowMin = exclusiveMin ? value <= min : value < min;
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || belowMin) {
    const bound = `${exclusiveMin ? '>' : '>='} ${min}`;
    throw new UsageError(`--${name} must be ${integer ? 'an integer' : 'a number'} ${bound}, got "${raw}"`);
  }
  return value;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        db: { type: 'string' },
        query: { type: 'string' },
        'query-file': { type: 'string' },
        model: { type: 'string' },
        runs: { type: 'string' },
        warmup: { type: 'string' },
        'timeout-s': { type: 'string' },
        'max-iters': { type: 'string' },
        'min-improve-pct': { type: 'string' },
        'max-tool-steps': { type: 'string' },
        'allow-semantic-change': { type: 'boolean', default: false },
        help: { type: 'boolean', default: false },
      },
      strict: true,
    }).values;
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Returns null when --help was requested.
 */
export function parseCliArgs(argv: string[]): CliOptions | null {
  const values = readFlags(argv);

  if (values.help) return null;

  if (!values.db) throw new UsageError('--db is required');
  if (!existsSync(values.db)) throw new UsageError(`Database file not found: ${values.db}`);

  let sql: string;
  if (values.query !== undefined && values['query-file'] !== undefined) {
    throw new UsageError('Use either --query or --query-file, not both');
  } else if (values.query !== undefined) {
    sql = values.query;
  } else if (values['query-file'] !== undefined) {
    if (!existsSync(values['query-file'])) throw new UsageError(`Query file not found: ${values['query-file']}`);
    sql = readFileSync(values['query-file'], 'utf-8');
  } else {
    throw new UsageError('Provide --query or --query-file');
  }
  sql = sql.trim();
  if (!sql) throw new UsageError('Query is empty');

  return {
    db: values.db,
    sql,
    model: values.model,
    runs: numberFlag('runs', values.runs, 3, true, 1),
    warmup: numberFlag('warmup', values.warmup, 1, true, 0),
    timeoutS: numberFlag('timeout-s', values['timeout-s'], 60, false, 0, true),
    maxIters: numberFlag('max-iters', values['max-iters'], 2, true, 1),
    minImprovePct: numberFlag('min-improve-pct', values['min-improve-pct'], 10, false, -Infinity),
    maxToolSteps:
      values['max-tool-steps'] === undefined
        ? undefined
        : numberFlag('max-tool-steps', values['max-tool-steps'], 0, true, 1),
    allowSemanticChange: values['allow-semantic-change'] ?? false,
  };
}

// ----------------------------------------------------------------------
// RENDERING
// ----------------------------------------------------------------------

function banner(title: string): string {
  return `\n${'='.repeat(80)}\n${title}\n${'='.repeat(80)}`;
}

function section(title: string): string {
  return `\n${'─'.repeat(80)}\n${title}\n${'─'.repeat(80)}`;
}

export function formatBenchmark(bench: BenchmarkRecord): string {
  return [
    `median_ms: ${bench.median_ms.toFixed(2)}`,
    `elapsed_ms: [${bench.elapsed_ms.map((ms) => ms.toFixed(2)).join(', ')}]`,
    `runs: ${bench.runs}, warmup: ${bench.warmup}`,
    `total_time_s (EXPLAIN ANALYZE): ${bench.total_time_s_sample ?? 'n/a'}`,
  ].join('\n');
}

/**
 * Console lines for one progress event.
 */
export function renderEvent(event: OptimizationEvent): string[] {
  switch (event.type) {
    case 'baseline':
      return [section('📏 Baseline benchmark'), formatBenchmark(event.benchmark)];
    case 'round_start':
      return [section(`🔄 Round ${event.round} (reference ${event.referenceMs.toFixed(2)} ms)`)];
    case 'model_output':
      return [
        `🤖 Model output${event.exhausted ? ' (step budget exhausted)' : ''}:`,
        event.text ?? '(no text)',
      ];
    case 'candidate':
      return ['📝 Candidate SQL:', event.sql];
    case 'candidate_failed':
      return [`❌ Candidate benchmark failed: ${event.error}`];
    case 'candidate_benchmark':
      return [
        `${event.improvePct > 0 ? '✅' : '⚠️'} Candidate benchmark (improve=${event.improvePct.toFixed(1)}%)`,
        formatBenchmark(event.benchmark),
      ];
    case 'improved':
      return [`📈 New best: ${event.referenceMs.toFixed(2)} ms`];
    case 'threshold_reached':
      return [
        `🎯 Reached improvement threshold: ${event.improvePct.toFixed(1)}% ≥ ${event.minImprovePct.toFixed(1)}%. Stopping.`,
      ];
    case 'no_candidate':
      return ['⚠️ No SQL found in model output. Stopping.'];
  }
}

export function renderSummary(result: OptimizationResult): string[] {
  const lines = [banner('🏁 BEST SQL'), result.bestSql];
  if (result.bestReport) {
    lines.push(
      section(`📊 Best report (improve=${result.bestReport.improve_pct.toFixed(1)}%)`),
      formatBenchmark(result.bestReport.benchmark)
    );
  } else {
    lines.push('\nNo round beat the baseline; the input query is still the best.');
  }
  lines.push(
    `\nStop reason: ${result.stopReason}`,
    `📊 Tokens: ${result.usage.totalTokens} total (${result.usage.promptTokens} prompt, ${result.usage.completionTokens} completion)`
  );
  return lines;
}

// ----------------------------------------------------------------------
// MAIN
// ----------------------------------------------------------------------

export async function runCli(argv: string[], config: AppConfig): Promise<number> {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }
  if (!options) {
    console.log(USAGE);
    return 0;
  }

  console.log(banner('🤖 SQL OPTIMIZER AGENT'));
  console.log(`Database: ${options.db}`);
  console.log(section('📥 Input SQL'));
  console.log(options.sql);

  const runtime = await openRuntime(config, {
    dbPath: options.db,
    model: options.model,
    maxToolSteps: options.maxToolSteps,
  });
  console.log(`Model: ${runtime.agent.model}`);

  try {
    const result = await optimizeQuery(
      {
        agent: runtime.agent,
        tooling: runtime.tooling,
        sql: options.sql,
        maxRounds: options.maxIters,
        minImprovePct: options.minImprovePct,
        runs: options.runs,
        warmup: options.warmup,
        timeoutS: options.timeoutS,
        allowSemanticChange: options.allowSemanticChange,
      },
      (event) => {
        for (const line of renderEvent(event)) console.log(line);
      }
    );
    for (const line of renderSummary(result)) console.log(line);
    return 0;
  } catch (error) {
    if (error instanceof BaselineBenchmarkError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await runtime.close();
  }
}

if (require.main === module) {
  (async () => {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    process.exitCode = await runCli(process.argv.slice(2), config);
  })().catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      logger.error(error instanceof Error ? error.stack ?? error.message : String(error));
    }
    process.exitCode = 1;
  });
}
