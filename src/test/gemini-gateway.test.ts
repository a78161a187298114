import type { GenerateContentParameters, GenerateContentResponse } from '@google/genai';
import type { TranscriptEntry } from '../agent-types';
import {
  GeminiGateway,
  fromGeminiParts,
  isRetryableError,
  toFunctionDeclarations,
  toGeminiRequest,
} from '../gemini-gateway';
import { setLogLevel } from '../logger';
import { TOOLS_SPEC } from '../tools/tool-schemas';
import { call, text } from './fakes';

beforeAll(() => setLogLevel('error'));

type ClientResponse = Pick<GenerateContentResponse, 'candidates' | 'usageMetadata'>;

function fakeClient() {
  return { generateContent: jest.fn<Promise<ClientResponse>, [GenerateContentParameters]>() };
}

function textResponse(value: string): ClientResponse {
  return {
    candidates: [{ content: { role: 'model', parts: [{ text: value }] } }],
    usageMetadata: { promptTokenCount: 7, candidatesTokenCount: 3, totalTokenCount: 10 },
  };
}

const noSleep = () => jest.fn<Promise<void>, [number]>(async () => undefined);

// ─── Request mapping ─────────────────────────────────────────

describe('toGeminiRequest', () => {
  test('maps the transcript to contents and merges same-role neighbours', () => {
    const transcript: TranscriptEntry[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'task' },
      { role: 'user', content: 'verify first' },
      { ...call('list_tables', {}, 'c1'), thought_signature: 'sig-1' },
      call('table_exists', { name: 'orders' }, 'c2'),
      { type: 'function_call_output', call_id: 'c1', output: '{"ok":true,"tables":[]}' },
      { type: 'function_call_output', call_id: 'c2', output: '{"ok":true,"name":"orders","exists":true}' },
      text('done'),
      { role: 'assistant', content: 'done' },
    ];

    const request = toGeminiRequest(transcript);

    expect(request.systemInstruction).toBe('sys');
    expect(request.contents).toEqual([
      { role: 'user', parts: [{ text: 'task' }, { text: 'verify first' }] },
      {
        role: 'model',
        parts: [
          { functionCall: { id: 'c1', name: 'list_tables', args: {} }, thoughtSignature: 'sig-1' },
          { functionCall: { id: 'c2', name: 'table_exists', args: { name: 'orders' } } },
        ],
      },
      {
        role: 'user',
        parts: [
          { functionResponse: { id: 'c1', name: 'list_tables', response: { output: '{"ok":true,"tables":[]}' } } },
          {
            functionResponse: {
              id: 'c2',
              name: 'table_exists',
              response: { output: '{"ok":true,"name":"orders","exists":true}' },
            },
          },
        ],
      },
      { role: 'model', parts: [{ text: 'done' }, { text: 'done' }] },
    ]);
  });

  test('leaves the system instruction unset without a system record', () => {
    expect(toGeminiRequest([{ role: 'user', content: 'hi' }]).systemInstruction).toBeUndefined();
  });

  test('declares tool parameters verbatim', () => {
    expect(toFunctionDeclarations(TOOLS_SPEC.slice(0, 1))).toEqual([
      {
        name: 'list_tables',
        description: TOOLS_SPEC[0].description,
        parametersJsonSchema: TOOLS_SPEC[0].parameters,
      },
    ]);
  });
});

// ─── Response mapping ────────────────────────────────────────

describe('fromGeminiParts', () => {
  test('maps calls and groups contiguous text, dropping thoughts', () => {
    const items = fromGeminiParts([
      { text: 'planning', thought: true },
      { text: 'Let me check.' },
      { functionCall: { id: 'x1', name: 'explain', args: { sql: 'SELECT 1' } }, thoughtSignature: 'sig' },
      { text: 'a' },
      { text: 'b' },
    ]);

    expect(items).toEqual([
      text('Let me check.'),
      { type: 'function_call', name: 'explain', arguments: '{"sql":"SELECT 1"}', call_id: 'x1', thought_signature: 'sig' },
      text('a', 'b'),
    ]);
  });

  test('generates a call id when the model omits one', () => {
    const [item] = fromGeminiParts([{ functionCall: { name: 'list_tables' } }]);
    expect(item).toMatchObject({ type: 'function_call', name: 'list_tables', arguments: '{}' });
    if (item.type === 'function_call') {
      expect(item.call_id).toMatch(/^call_[0-9a-f-]{36}$/);
    }
  });
});

// ─── Gateway ─────────────────────────────────────────────────

describe('GeminiGateway', () => {
  const transcript: TranscriptEntry[] = [
    { role: 'system', content: 'sys' },
    { role: 'user', content: 'task' },
  ];

  test('sends the rebuilt request and maps usage', async () => {
    const client = fakeClient();
    client.generateContent.mockResolvedValueOnce(textResponse('ok'));
    const gateway = new GeminiGateway(client, { model: 'test-model' });

    const response = await gateway.send(transcript, TOOLS_SPEC);

    expect(response).toEqual({
      output: [text('ok')],
      usage: { promptTokens: 7, completionTokens: 3, totalTokens: 10 },
    });
    expect(client.generateContent).toHaveBeenCalledWith({
      model: 'test-model',
      contents: [{ role: 'user', parts: [{ text: 'task' }] }],
      config: {
        systemInstruction: 'sys',
        temperature: 0.3,
        maxOutputTokens: 1400,
        tools: [{ functionDeclarations: toFunctionDeclarations(TOOLS_SPEC) }],
      },
    });
  });

  test('fails on a response without candidates', async () => {
    const client = fakeClient();
    client.generateContent.mockResolvedValueOnce({ candidates: [] });
    const gateway = new GeminiGateway(client, { model: 'test-model' });

    await expect(gateway.send(transcript, TOOLS_SPEC)).rejects.toThrow('Gemini returned no candidates');
  });

  test('retries rate limits with exponential backoff', async () => {
    const client = fakeClient();
    client.generateContent
      .mockRejectedValueOnce(new Error('got status: 429 Too Many Requests'))
      .mockRejectedValueOnce(new Error('got status: 503 Service Unavailable'))
      .mockResolvedValueOnce(textResponse('ok'));
    const sleep = noSleep();
    const gateway = new GeminiGateway(client, { model: 'test-model', sleep, random: () => 0 });

    const response = await gateway.send(transcript, TOOLS_SPEC);

    expect(response.output).toEqual([text('ok')]);
    expect(client.generateContent).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  test('gives up after the configured retries', async () => {
    const client = fakeClient();
    client.generateContent.mockRejectedValue(new Error('got status: 503 Service Unavailable'));
    const sleep = noSleep();
    const gateway = new GeminiGateway(client, { model: 'test-model', maxRetries: 2, sleep, random: () => 0 });

    await expect(gateway.send(transcript, TOOLS_SPEC)).rejects.toThrow('503');
    expect(client.generateContent).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  test('propagates other failures immediately', async () => {
    const client = fakeClient();
    client.generateContent.mockRejectedValue(new Error('got status: 400 INVALID_ARGUMENT'));
    const sleep = noSleep();
    const gateway = new GeminiGateway(client, { model: 'test-model', sleep });

    await expect(gateway.send(transcript, TOOLS_SPEC)).rejects.toThrow('400 INVALID_ARGUMENT');
    expect(sleep).not.toHaveBeenCalled();
  });

  test('caps the backoff delay and adds up to 20% jitter', () => {
    const capped = new GeminiGateway(fakeClient(), { model: 'test-model', random: () => 0 });
    expect(capped.retryDelayMs(10)).toBe(60000);

    const jittered = new GeminiGateway(fakeClient(), { model: 'test-model', random: () => 0.5 });
    expect(jittered.retryDelayMs(1)).toBe(1100);
  });

  test('classifies retryable errors by status', () => {
    expect(isRetryableError(new Error('429 RESOURCE_EXHAUSTED'))).toBe(true);
    expect(isRetryableError(new Error('404 NOT_FOUND'))).toBe(false);
  });
});
