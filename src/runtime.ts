import { GoogleGenAI } from '@google/genai';
import { SQLOptimizerAgent } from './agent.js';
import type { AppConfig } from './config.js';
import { GeminiGateway } from './gemini-gateway.js';
import { DuckDBTooling } from './tools/duckdb-tooling.js';

export interface RuntimeOptions {
  dbPath: string;
  model?: string;
  maxToolSteps?: number;
}

export interface Runtime {
  agent: SQLOptimizerAgent;
  tooling: DuckDBTooling;
  close(): Promise<void>;
}

/**
 * Opens the database read-only and wires gateway, tools and agent together.
 */
export async function openRuntime(config: AppConfig, options: RuntimeOptions): Promise<Runtime> {
  const ai = new GoogleGenAI({ apiKey: config.geminiApiKey });
  const gateway = new GeminiGateway(ai.models, {
    model: options.model ?? config.model,
    temperature: config.temperature,
    maxOutputTokens: config.maxOutputTokens,
    maxRetries: config.modelMaxRetries,
  });

  const tooling = await DuckDBTooling.connect({ dbPath: options.dbPath, readOnly: true });
  const agent = new SQLOptimizerAgent(gateway, tooling, {
    maxToolSteps: options.maxToolSteps ?? config.maxToolSteps,
  });

  return {
    agent,
    tooling,
    close: () => tooling.close(),
  };
}
