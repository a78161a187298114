/**
 * API Server for the SQL Optimizer Agent
 * One optimization run at a time over a shared read-only connection.
 */

import express from 'express';
import cors from 'cors';
import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { SQLOptimizerAgent } from './agent.js';
import type { SqlTooling, TokenUsage } from './agent-types.js';
import { ConfigError, loadConfig } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { BaselineBenchmarkError, optimizeQuery } from './optimizer.js';
import { openRuntime } from './runtime.js';

export interface ApiDeps {
  agent: Pick<SQLOptimizerAgent, 'optimizeOnce' | 'model'>;
  tooling: Pick<SqlTooling, 'benchmark'>;
  /** Token-usage JSONL files go here; omitted means no token log. */
  logsDir?: string;
}

const OptimizeRequestSchema = z.object({
  sql: z.string().trim().min(1, 'sql is required'),
  runs: z.number().int().min(1).max(50).optional(),
  warmup: z.number().int().min(0).max(20).optional(),
  timeout_s: z.number().positive().optional(),
  max_iters: z.number().int().min(1).max(20).optional(),
  min_improve_pct: z.number().optional(),
  allow_semantic_change: z.boolean().optional(),
});

export interface TokenLogEntry {
  agentType: string;
  model: string;
  sql: string;
  stopReason: string;
  usage: TokenUsage;
}

export function tokenLogPath(logsDir: string, date: Date = new Date()): string {
  return join(logsDir, `token-usage-sql-optimizer-${date.toISOString().split('T')[0]}.jsonl`);
}

// Logging function for token usage
export function logTokenUsage(logsDir: string, entry: TokenLogEntry): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    agentType: entry.agentType,
    model: entry.model,
    sql: entry.sql.substring(0, 100),
    stopReason: entry.stopReason,
    ...entry.usage,
  };

  try {
    if (!existsSync(logsDir)) {
      mkdirSync(logsDir, { recursive: true });
    }
    appendFileSync(tokenLogPath(logsDir), JSON.stringify(logEntry) + '\n');
  } catch (error) {
    logger.error(`Failed to write token log: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function createApp(deps: ApiDeps): express.Express {
  const app = express();
  let busy = false;

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.post('/optimize', async (req, res) => {
    const parsed = OptimizeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
      });
      return;
    }

    if (busy) {
      res.status(409).json({ success: false, error: 'An optimization run is already in progress' });
      return;
    }

    const body = parsed.data;
    busy = true;
    try {
      logger.info(`[API] Optimizing query (${body.sql.length} chars)`);
      const result = await optimizeQuery({
        agent: deps.agent,
        tooling: deps.tooling,
        sql: body.sql,
        runs: body.runs,
        warmup: body.warmup,
        timeoutS: body.timeout_s,
        maxRounds: body.max_iters,
        minImprovePct: body.min_improve_pct,
        allowSemanticChange: body.allow_semantic_change,
      });

      if (deps.logsDir) {
        logTokenUsage(deps.logsDir, {
          agentType: 'sql-optimizer',
          model: deps.agent.model,
          sql: body.sql,
          stopReason: result.stopReason,
          usage: result.usage,
        });
      }

      res.json({
        success: true,
        best_sql: result.bestSql,
        best_report: result.bestReport,
        baseline: result.baseline,
        reference_ms: result.referenceMs,
        rounds: result.rounds,
        stop_reason: result.stopReason,
        token_usage: result.usage,
      });
    } catch (error) {
      if (error instanceof BaselineBenchmarkError) {
        res.status(422).json({ success: false, error: error.message, baseline: error.result });
        return;
      }
      logger.error(`[API] Optimization failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
      res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Internal server error',
      });
    } finally {
      busy = false;
    }
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', agent: 'sql-optimizer', model: deps.agent.model, busy });
  });

  return app;
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (!config.duckdbPath) {
    throw new ConfigError(['DUCKDB_PATH: required to start the API']);
  }
  if (!existsSync(config.duckdbPath)) {
    throw new ConfigError([`DUCKDB_PATH: file not found: ${config.duckdbPath}`]);
  }

  const runtime = await openRuntime(config, { dbPath: config.duckdbPath });
  const app = createApp({ agent: runtime.agent, tooling: runtime.tooling, logsDir: config.logsDir });

  // Start server
  app.listen(config.apiPort, () => {
    console.log(`🚀 SQL Optimizer API running on http://localhost:${config.apiPort}`);
    console.log(`📊 Using database: ${config.duckdbPath}`);
    console.log(`🤖 Using model: ${runtime.agent.model}`);
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
