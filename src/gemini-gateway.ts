/**
 * Gemini Model Gateway
 * Rebuilds a Gemini request from the transcript on every turn and maps the
 * candidate back into function-call and message items.
 */

import { randomUUID } from 'crypto';
import type {
  Content,
  FunctionDeclaration,
  GenerateContentParameters,
  GenerateContentResponse,
  Part,
} from '@google/genai';
import { decodeToolArguments } from './agent.js';
import type {
  FunctionToolSchema,
  ModelGateway,
  ModelResponse,
  OutputMessageItem,
  ResponseItem,
  TokenUsage,
  TranscriptEntry,
} from './agent-types.js';
import { logger } from './logger.js';

// Rate limit handling
const BASE_RETRY_DELAY_MS = 1000;
const MAX_RETRY_DELAY_MS = 60000;

/** The slice of `GoogleGenAI.models` the gateway uses. */
export interface GenerateContentClient {
  generateContent(
    params: GenerateContentParameters
  ): Promise<Pick<GenerateContentResponse, 'candidates' | 'usageMetadata'>>;
}

export interface GeminiGatewayConfig {
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface GeminiRequest {
  systemInstruction?: string;
  contents: Content[];
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function appendPart(contents: Content[], role: 'user' | 'model', part: Part): void {
  const last = contents[contents.length - 1];
  if (last && last.role === role) {
    (last.parts ??= []).push(part);
  } else {
    contents.push({ role, parts: [part] });
  }
}

/**
 * Transcript → Gemini contents. Consecutive records of the same role share one content.
 */
export function toGeminiRequest(transcript: readonly TranscriptEntry[]): GeminiRequest {
  const system: string[] = [];
  const contents: Content[] = [];
  const callNames = new Map<string, string>();

  for (const entry of transcript) {
    if (!('type' in entry)) {
      if (entry.role === 'system') {
        system.push(entry.content);
      } else {
        appendPart(contents, entry.role === 'user' ? 'user' : 'model', { text: entry.content });
      }
      continue;
    }

    switch (entry.type) {
      case 'message':
        entry.content.forEach((chunk, i) => {
          const part: Part = { text: chunk.text };
          if (i === 0 && entry.thought_signature) part.thoughtSignature = entry.thought_signature;
          appendPart(contents, 'model', part);
        });
        break;

      case 'function_call': {
        callNames.set(entry.call_id, entry.name);
        const part: Part = {
          functionCall: { id: entry.call_id, name: entry.name, args: decodeToolArguments(entry.arguments).args },
        };
        if (entry.thought_signature) part.thoughtSignature = entry.thought_signature;
        appendPart(contents, 'model', part);
        break;
      }

      case 'function_call_output':
        appendPart(contents, 'user', {
          functionResponse: {
            id: entry.call_id,
            name: callNames.get(entry.call_id) ?? 'unknown',
            response: { output: entry.output },
          },
        });
        break;
    }
  }

  return {
    systemInstruction: system.length > 0 ? system.join('\n\n') : undefined,
    contents,
  };
}

export function toFunctionDeclarations(tools: readonly FunctionToolSchema[]): FunctionDeclaration[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    parametersJsonSchema: tool.parameters,
  }));
}

/**
 * Candidate parts → response items. Contiguous text parts form one message item;
 * thought summaries are dropped.
 */
export function fromGeminiParts(parts: readonly Part[]): ResponseItem[] {
  const items: ResponseItem[] = [];
  let message: OutputMessageItem | null = null;

  for (const part of parts) {
    if (part.functionCall) {
      message = null;
      items.push({
        type: 'function_call',
        name: part.functionCall.name ?? '',
        arguments: JSON.stringify(part.functionCall.args ?? {}),
        call_id: part.functionCall.id || `call_${randomUUID()}`,
        ...(part.thoughtSignature ? { thought_signature: part.thoughtSignature } : {}),
      });
      continue;
    }
    if (part.thought || typeof part.text !== 'string') {
      continue;
    }
    if (!message) {
      message = { type: 'message', role: 'assistant', content: [] };
      items.push(message);
    }
    message.content.push({ type: 'output_text', text: part.text });
    if (part.thoughtSignature && !message.thought_signature) {
      message.thought_signature = part.thoughtSignature;
    }
  }

  return items;
}

export function isRetryableError(error: unknown): boolean {
  const errorString = String(error);
  return errorString.includes('429') || errorString.includes('503');
}

export class GeminiGateway implements ModelGateway {
  readonly model: string;
  private readonly client: GenerateContentClient;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly maxRetries: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(client: GenerateContentClient, config: GeminiGatewayConfig) {
    this.client = client;
    this.model = config.model;
    this.temperature = config.temperature ?? 0.3;
    this.maxOutputTokens = config.maxOutputTokens ?? 1400;
    this.maxRetries = config.maxRetries ?? 3;
    this.sleep = config.sleep ?? sleep;
    this.random = config.random ?? Math.random;
  }

  /** Base * 2^(attempt-1), capped, plus up to 20% jitter. */
  retryDelayMs(attempt: number): number {
    const delay = Math.min(BASE_RETRY_DELAY_MS * Math.pow(2, attempt - 1), MAX_RETRY_DELAY_MS);
    return delay + this.random() * delay * 0.2;
  }

  async send(transcript: readonly TranscriptEntry[], tools: readonly FunctionToolSchema[]): Promise<ModelResponse> {
    const { systemInstruction, contents } = toGeminiRequest(transcript);
    const params: GenerateContentParameters = {
      model: this.model,
      contents,
      config: {
        systemInstruction,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        tools: tools.length > 0 ? [{ functionDeclarations: toFunctionDeclarations(tools) }] : undefined,
      },
    };

    const response = await this.generateWithRetry(params);

    const candidate = response.candidates?.[0];
    if (!candidate) {
      throw new Error('Gemini returned no candidates');
    }

    return {
      output: fromGeminiParts(candidate.content?.parts ?? []),
      usage: toTokenUsage(response.usageMetadata),
    };
  }

  private async generateWithRetry(
    params: GenerateContentParameters
  ): Promise<Pick<GenerateContentResponse, 'candidates' | 'usageMetadata'>> {
    let failures = 0;
    for (;;) {
      try {
        return await this.client.generateContent(params);
      } catch (error) {
        if (!isRetryableError(error) || failures >= this.maxRetries) {
          throw error;
        }
        failures++;
        const delay = this.retryDelayMs(failures);
        logger.warn(
          `Rate limit/service unavailable (${String(error).split('\n')[0].trim()}); ` +
            `retry ${failures}/${this.maxRetries} in ${Math.round(delay / 1000)}s`
        );
        await this.sleep(delay);
      }
    }
  }
}

function toTokenUsage(metadata: GenerateContentResponse['usageMetadata']): TokenUsage {
  return {
    promptTokens: metadata?.promptTokenCount || 0,
    completionTokens: metadata?.candidatesTokenCount || 0,
    totalTokens: metadata?.totalTokenCount || 0,
  };
}
