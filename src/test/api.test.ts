import type { Server } from 'http';
import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { OptimizeOnceResult } from '../agent';
import { createApp, type ApiDeps } from '../api';
import { setLogLevel } from '../logger';
import { FakeTooling, bench, scriptedAgent } from './fakes';

beforeAll(() => setLogLevel('error'));

const BASE_SQL = 'SELECT * FROM orders WHERE total > 100';
const FAST_SQL = 'SELECT id, total FROM orders WHERE total > 100';

let server: Server | undefined;
let logsDir: string;

beforeEach(() => {
  logsDir = mkdtempSync(join(tmpdir(), 'qoptimize-api-'));
});

afterEach(async () => {
  if (server) {
    const running = server;
    server = undefined;
    running.closeAllConnections();
    await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
  }
  rmSync(logsDir, { recursive: true, force: true });
});

async function start(deps: ApiDeps): Promise<string> {
  const app = createApp(deps);
  return new Promise((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => {
      const address = listening.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      resolve(`http://127.0.0.1:${port}`);
    });
    server = listening;
  });
}

function post(baseUrl: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/optimize`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function fastTooling(): FakeTooling {
  const tooling = new FakeTooling();
  tooling.benchmarks.set(BASE_SQL, bench(120));
  tooling.benchmarks.set(FAST_SQL, bench(90));
  return tooling;
}

describe('GET /health', () => {
  test('reports the agent and model', async () => {
    const baseUrl = await start({
      agent: { ...scriptedAgent([]), model: 'test-model' },
      tooling: new FakeTooling(),
    });

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', agent: 'sql-optimizer', model: 'test-model', busy: false });
  });
});

describe('POST /optimize', () => {
  test('returns the optimization result and logs token usage', async () => {
    const baseUrl = await start({
      agent: { ...scriptedAgent([`\`\`\`sql\n${FAST_SQL}\n\`\`\``]), model: 'test-model' },
      tooling: fastTooling(),
      logsDir,
    });

    const res = await post(baseUrl, { sql: BASE_SQL, max_iters: 2, min_improve_pct: 20 });

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({
      success: true,
      best_sql: FAST_SQL,
      reference_ms: 90,
      stop_reason: 'threshold_reached',
      baseline: { median_ms: 120 },
      best_report: { improve_pct: 25 },
      token_usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });

    const files = readdirSync(logsDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^token-usage-sql-optimizer-\d{4}-\d{2}-\d{2}\.jsonl$/);
    const lines = readFileSync(join(logsDir, files[0]), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      agentType: 'sql-optimizer',
      model: 'test-model',
      sql: BASE_SQL,
      stopReason: 'threshold_reached',
      totalTokens: 15,
    });
  });

  test('rejects a missing query', async () => {
    const baseUrl = await start({ agent: { ...scriptedAgent([]), model: 'test-model' }, tooling: new FakeTooling() });

    const res = await post(baseUrl, { sql: '   ' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'sql: sql is required' });
  });

  test('rejects mistyped options', async () => {
    const baseUrl = await start({ agent: { ...scriptedAgent([]), model: 'test-model' }, tooling: new FakeTooling() });

    const res = await post(baseUrl, { sql: BASE_SQL, runs: '3' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'runs: Expected number, received string' });
  });

  test('answers 422 when the baseline fails', async () => {
    const agent = { ...scriptedAgent([]), model: 'test-model' };
    const baseUrl = await start({ agent, tooling: new FakeTooling() });

    const res = await post(baseUrl, { sql: 'SELECT 1' });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Baseline benchmark failed: No benchmark scripted for: SELECT 1',
      baseline: { ok: false, error: 'No benchmark scripted for: SELECT 1' },
    });
    expect(agent.calls).toHaveLength(0);
  });

  test('answers 500 when the model fails', async () => {
    const tooling = fastTooling();
    const baseUrl = await start({
      agent: {
        model: 'test-model',
        optimizeOnce: async (): Promise<OptimizeOnceResult> => {
          throw new Error('Gemini returned no candidates');
        },
      },
      tooling,
    });

    const res = await post(baseUrl, { sql: BASE_SQL });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, error: 'Gemini returned no candidates' });
  });

  test('refuses a second run while one is in progress', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let entered: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      entered = resolve;
    });

    const baseUrl = await start({
      agent: {
        model: 'test-model',
        optimizeOnce: async (): Promise<OptimizeOnceResult> => {
          entered();
          await gate;
          return {
            finalText: 'No faster rewrite found.',
            events: [],
            exhausted: false,
            steps: 1,
            usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
            tableRefs: ['orders'],
            transcript: [],
          };
        },
      },
      tooling: fastTooling(),
    });

    const first = post(baseUrl, { sql: BASE_SQL });
    await started;

    const second = await post(baseUrl, { sql: BASE_SQL });
    expect(second.status).toBe(409);
    const health = await (await fetch(`${baseUrl}/health`)).json();
    expect(health).toMatchObject({ busy: true });

    release();
    const firstRes = await first;
    expect(firstRes.status).toBe(200);
    expect(await firstRes.json()).toMatchObject({ success: true, stop_reason: 'no_candidate', best_sql: BASE_SQL });
  });
});
