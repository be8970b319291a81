// src/publish.ts
import type { SupabaseClient } from '@supabase/supabase-js';
import type { CompletedRun } from './pipeline.js';

export type ReadingRow = {
  run_id: string;
  ts: string;
  building: string;
  kwh: number;
  month: number;
};

export type BuildingSummaryRow = {
  run_id: string;
  building: string;
  mean: number;
  min: number;
  max: number;
  sum: number;
  count: number;
};

/** Where a finished run goes. Supabase in production, in-memory in tests. */
export interface RunStore {
  insertReadings(rows: ReadingRow[]): Promise<number>;
  upsertBuildingSummary(rows: BuildingSummaryRow[]): Promise<number>;
}

export const CHUNK_SIZE = 1000;

export class SupabaseRunStore implements RunStore {
  constructor(private readonly supa: SupabaseClient) {}

  async insertReadings(rows: ReadingRow[]): Promise<number> {
    if (!rows.length) return 0;
    const { data, error } = await this.supa.from('energy_readings').insert(rows).select('run_id');
    if (error) throw error;
    return data?.length ?? 0;
  }

  async upsertBuildingSummary(rows: BuildingSummaryRow[]): Promise<number> {
    if (!rows.length) return 0;
    const { data, error } = await this.supa
      .from('energy_building_summary')
      .upsert(rows, { onConflict: 'run_id,building', ignoreDuplicates: false })
      .select('building');
    if (error) throw error;
    return data?.length ?? 0;
  }
}

export type PublishResult = { runId: string; readings: number; buildings: number };

/** Canonical rows go out in chunks; summary rows are keyed by (run_id, building). */
export async function publishRun(store: RunStore, runId: string, run: CompletedRun): Promise<PublishResult> {
  const rows: ReadingRow[] = run.dataset.records.map(r => ({
    run_id: runId,
    ts: r.timestamp.toISOString(),
    building: r.building,
    kwh: r.kwh,
    month: r.month,
  }));

  let readings = 0;
  for (let i = 0; i < rows.length; i += CHUNK_SIZE) {
    readings += await store.insertReadings(rows.slice(i, i + CHUNK_SIZE));
  }

  const summary: BuildingSummaryRow[] = [];
  for (const [building, s] of run.buildingSummary) {
    summary.push({ run_id: runId, building, ...s });
  }
  const buildings = await store.upsertBuildingSummary(summary);

  return { runId, readings, buildings };
}
