/**
 * Optimization Loop
 * Benchmarks the input, asks the agent for rewrites round by round and keeps
 * the fastest version seen so far. A candidate replaces the best only when its
 * median is strictly lower.
 */

import type { SQLOptimizerAgent } from './agent.js';
import { addUsage, emptyUsage, type BenchmarkRecord, type SqlTooling, type TokenUsage, type ToolFailure } from './agent-types.js';
import { logger } from './logger.js';
import { extractSqlFromModel } from './sql-extract.js';

export type StopReason = 'threshold_reached' | 'no_candidate' | 'max_rounds';

export interface BestReport {
  benchmark: BenchmarkRecord;
  model_text: string | null;
  improve_pct: number;
}

export interface RoundSummary {
  round: number;
  modelText: string | null;
  exhausted: boolean;
  toolCalls: number;
  candidateSql: string | null;
  benchmark: BenchmarkRecord | ToolFailure | null;
  improvePct: number | null;
  adopted: boolean;
}

export interface OptimizationResult {
  bestSql: string;
  bestReport: BestReport | null;
  baseline: BenchmarkRecord;
  referenceMs: number;
  rounds: RoundSummary[];
  stopReason: StopReason;
  usage: TokenUsage;
}

export type OptimizationEvent =
  | { type: 'baseline'; benchmark: BenchmarkRecord }
  | { type: 'round_start'; round: number; referenceMs: number }
  | { type: 'model_output'; round: number; text: string | null; exhausted: boolean }
  | { type: 'candidate'; round: number; sql: string }
  | { type: 'candidate_failed'; round: number; error: string }
  | { type: 'candidate_benchmark'; round: number; benchmark: BenchmarkRecord; improvePct: number }
  | { type: 'improved'; round: number; referenceMs: number; improvePct: number }
  | { type: 'threshold_reached'; round: number; improvePct: number; minImprovePct: number }
  | { type: 'no_candidate'; round: number };

export type EmitFn = (event: OptimizationEvent) => void;

export interface OptimizeQueryParams {
  agent: Pick<SQLOptimizerAgent, 'optimizeOnce'>;
  tooling: Pick<SqlTooling, 'benchmark'>;
  sql: string;
  maxRounds?: number;
  minImprovePct?: number;
  runs?: number;
  warmup?: number;
  timeoutS?: number;
  allowSemanticChange?: boolean;
}

/** The input query could not be benchmarked, so there is nothing to compare against. */
export class BaselineBenchmarkError extends Error {
  readonly result: ToolFailure;

  constructor(result: ToolFailure) {
    super(`Baseline benchmark failed: ${result.error}`);
    this.name = 'BaselineBenchmarkError';
    this.result = result;
  }
}

export function improvementPct(referenceMs: number, candidateMs: number): number {
  if (referenceMs <= 0) return 0;
  return ((referenceMs - candidateMs) / referenceMs) * 100;
}

export async function optimizeQuery(params: OptimizeQueryParams, emit?: EmitFn): Promise<OptimizationResult> {
  const {
    agent,
    tooling,
    sql,
    maxRounds = 2,
    minImprovePct = 10,
    runs = 3,
    warmup = 1,
    timeoutS = 60,
    allowSemanticChange = false,
  } = params;

  const baseline = await tooling.benchmark(sql, runs, warmup, timeoutS);
  if (!baseline.ok) {
    throw new BaselineBenchmarkError(baseline);
  }
  emit?.({ type: 'baseline', benchmark: baseline });
  logger.info(`Baseline median ${baseline.median_ms.toFixed(2)} ms`);

  let bestSql = sql;
  let referenceMs = baseline.median_ms;
  let bestReport: BestReport | null = null;
  let usage = emptyUsage();
  const rounds: RoundSummary[] = [];

  const finish = (stopReason: StopReason): OptimizationResult => {
    logger.info(`Optimization stopped (${stopReason}); reference ${referenceMs.toFixed(2)} ms`);
    return { bestSql, bestReport, baseline, referenceMs, rounds, stopReason, usage };
  };

  for (let round = 1; round <= maxRounds; round++) {
    emit?.({ type: 'round_start', round, referenceMs });

    const once = await agent.optimizeOnce(bestSql, { runs, warmup, timeoutS, allowSemanticChange, round });
    usage = addUsage(usage, once.usage);
    emit?.({ type: 'model_output', round, text: once.finalText, exhausted: once.exhausted });

    const summary: RoundSummary = {
      round,
      modelText: once.finalText,
      exhausted: once.exhausted,
      toolCalls: once.events.filter((e) => e.kind === 'tool_call').length,
      candidateSql: null,
      benchmark: null,
      improvePct: null,
      adopted: false,
    };
    rounds.push(summary);

    const candidate = extractSqlFromModel(once.finalText);
    if (!candidate) {
      logger.info('No SQL found in model output', { round });
      emit?.({ type: 'no_candidate', round });
      return finish('no_candidate');
    }
    summary.candidateSql = candidate;
    emit?.({ type: 'candidate', round, sql: candidate });

    const bench = await tooling.benchmark(candidate, runs, warmup, timeoutS);
    summary.benchmark = bench;
    if (!bench.ok) {
      logger.warn(`Candidate benchmark failed: ${bench.error}`, { round });
      emit?.({ type: 'candidate_failed', round, error: bench.error });
      continue;
    }

    const improvePct = improvementPct(referenceMs, bench.median_ms);
    summary.improvePct = improvePct;
    emit?.({ type: 'candidate_benchmark', round, benchmark: bench, improvePct });

    if (bench.median_ms < referenceMs) {
      bestSql = candidate;
      referenceMs = bench.median_ms;
      bestReport = { benchmark: bench, model_text: once.finalText, improve_pct: improvePct };
      summary.adopted = true;
      emit?.({ type: 'improved', round, referenceMs, improvePct });
    }

    if (improvePct >= minImprovePct) {
      emit?.({ type: 'threshold_reached', round, improvePct, minImprovePct });
      return finish('threshold_reached');
    }
  }

  return finish('max_rounds');
}
