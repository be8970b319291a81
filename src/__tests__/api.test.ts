import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from '../app.js';
import { loadConfig } from '../config.js';
import type { BuildingSummaryRow, ReadingRow, RunStore } from '../publish.js';

class MemoryRunStore implements RunStore {
  readings: ReadingRow[] = [];
  summary: BuildingSummaryRow[] = [];
  async insertReadings(rows: ReadingRow[]) {
    this.readings.push(...rows);
    return rows.length;
  }
  async upsertBuildingSummary(rows: BuildingSummaryRow[]) {
    this.summary.push(...rows);
    return rows.length;
  }
}

const store = new MemoryRunStore();
let server: Server;
let base: string;

beforeAll(async () => {
  const app = createApp({ config: loadConfig({ API_KEYS: 'test-key' }), store });
  await new Promise<void>(resolve => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('server has no port');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
});

function post(path: string, body: unknown, token: string | null = 'test-key') {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (token) headers.authorization = `Bearer ${token}`;
  return fetch(`${base}${path}`, { method: 'POST', headers, body: JSON.stringify(body) });
}

describe('HTTP API', () => {
  it('answers health checks', async () => {
    const res = await fetch(`${base}/v1/healthz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true });
  });

  it('rejects a missing or unknown key', async () => {
    expect((await post('/v1/runs', { sources: [] }, null)).status).toBe(401);
    const res = await post('/v1/runs', { sources: [] }, 'wrong');
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } });
  });

  it('rejects a malformed body', async () => {
    const res = await post('/v1/runs', { sources: [{ rows: [] }] });
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('runs the pipeline over rows and csv sources', async () => {
    const res = await post('/v1/runs', {
      sources: [
        { origin: 'Library.csv', rows: [{ Date: '2023-01-02', KWH: 100 }, { Date: '2023-01-03', KWH: null }] },
        { origin: 'Gym.csv', csv: 'Date,KWH\n2023-01-02,300\n' },
      ],
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      rows: 2,
      daily_totals: [{ period_start: '2023-01-02T00:00:00.000Z', kwh: 400 }],
      summary: {
        status: 'ok',
        total_campus_consumption: 400,
        highest_consuming_building: 'Gym',
        peak_load_timestamp: '2023-01-02T00:00:00.000Z',
      },
      ledger_reports: [
        { name: 'Library', total: 100, average: 100 },
        { name: 'Gym', total: 300, average: 300 },
      ],
      diagnostics: [
        { kind: 'VALIDATION_FAILURE', origin: 'Library.csv', row: 2, reason: 'MISSING_KWH', message: 'KWH is missing' },
      ],
    });
  });

  it('reports insufficient data as a normal response', async () => {
    const res = await post('/v1/runs', { sources: [] });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'insufficient_data',
      reason: 'no valid readings after merging all sources',
      diagnostics: [],
      text: 'Campus Energy Usage Summary\n===========================\n'
        + 'Insufficient data: no valid readings after merging all sources\n',
    });
  });

  it('publishes when asked', async () => {
    const res = await post('/v1/runs', {
      publish: true,
      sources: [{ origin: 'Library.csv', rows: [{ Date: '2023-01-02', KWH: 7 }] }],
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ published: { readings: 1, buildings: 1 } });
    expect(store.readings.at(-1)).toMatchObject({ building: 'Library', kwh: 7 });
  });

  it('runs the demo simulator repeatably with a seed', async () => {
    const body = { buildings: ['North', 'South'], days: 14, from: '2023-05-01', seed: 42 };
    const a: unknown = await (await post('/simulate/run', body, null)).json();
    const b: unknown = await (await post('/simulate/run', body, null)).json();
    expect(a).toMatchObject({ status: 'ok', rows: 28, buildings: ['North', 'South'] });
    expect(b).toEqual(a);
  });
});
