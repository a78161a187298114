import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from './logger.js';

dotenv.config();

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1400),
  MAX_TOOL_STEPS: z.coerce.number().int().positive().default(35),
  MODEL_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  DUCKDB_PATH: z.string().optional(),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOGS_DIR: z.string().min(1).default('logs'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  geminiApiKey?: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  maxToolSteps: number;
  modelMaxRetries: number;
  duckdbPath?: string;
  apiPort: number;
  logsDir: string;
  logLevel: LogLevel;
}

/**
 * Reads the environment (after `.env` is loaded). Blank variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    geminiApiKey: vars.GEMINI_API_KEY,
    model: vars.GEMINI_MODEL,
    temperature: vars.TEMPERATURE,
    maxOutputTokens: vars.MAX_OUTPUT_TOKENS,
    maxToolSteps: vars.MAX_TOOL_STEPS,
    modelMaxRetries: vars.MODEL_MAX_RETRIES,
    duckdbPath: vars.DUCKDB_PATH,
    apiPort: vars.API_PORT,
    logsDir: vars.LOGS_DIR,
    logLevel: vars.LOG_LEVEL,
  };
}
