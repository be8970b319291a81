// src/ingest.ts
import { z } from 'zod';
import { CanonicalDataset } from './dataset.js';
import { parseTimestamp, utcMonth } from './time.js';
import type {
  CanonicalRecord,
  Diagnostic,
  IngestEvent,
  RawRecord,
  RowSource,
} from './types.js';

export type IngestOptions = {
  onEvent?: (e: IngestEvent) => void;
};

export type IngestResult = {
  dataset: CanonicalDataset;
  diagnostics: Diagnostic[];
};

/** --- row schemas --- */
const RawRecordSchema = z
  .object({
    Date: z.unknown(),
    KWH: z.unknown(),
    Building: z.unknown(),
  })
  .passthrough();

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

const KwhSchema = z
  .union([z.number(), z.string().trim().regex(NUMERIC).transform(Number)])
  .pipe(z.number().finite().nonnegative());

const BuildingSchema = z
  .union([z.string(), z.number().transform(String)])
  .pipe(z.string().trim().min(1));

/** `data/Library.csv` -> `Library` */
export function inferBuildingName(origin: string): string {
  const base = origin.split(/[\\/]/).pop() ?? origin;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

function isMissing(v: unknown): boolean {
  if (v === null || v === undefined) return true;
  if (typeof v === 'number') return Number.isNaN(v);
  if (typeof v === 'string') return v.trim() === '';
  return false;
}

type Staged = { origin: string; row: number; raw: RawRecord; building: string };

/**
 * Merges every source into one canonical dataset.
 *
 * Stage 1 reads each source and shapes its rows (building inference, bad rows
 * out). Stage 2 validates the merged rows: no timestamp or no kWh means the
 * row is dropped. Nothing here throws on bad input; everything skipped ends up
 * in `diagnostics`.
 */
export function ingestSources(sources: readonly RowSource[], opts: IngestOptions = {}): IngestResult {
  const diagnostics: Diagnostic[] = [];
  const report = (d: Diagnostic) => {
    diagnostics.push(d);
    opts.onEvent?.({ type: 'DIAGNOSTIC', diagnostic: d });
  };

  const merged: Staged[] = [];
  for (const source of sources) {
    const staged = stageSource(source, report);
    if (!staged) continue;
    merged.push(...staged.rows);
    opts.onEvent?.({
      type: 'SOURCE_LOADED',
      origin: source.origin,
      rows: staged.total,
      accepted: staged.rows.length,
    });
  }

  const records: CanonicalRecord[] = [];
  for (const item of merged) {
    const rec = validate(item, report);
    if (rec) records.push(rec);
  }

  return { dataset: new CanonicalDataset(records), diagnostics };
}

function stageSource(
  source: RowSource,
  report: (d: Diagnostic) => void,
): { rows: Staged[]; total: number } | null {
  let rows: readonly unknown[];
  try {
    rows = source.read();
  } catch (e) {
    report({
      kind: 'SOURCE_UNAVAILABLE',
      origin: source.origin,
      reason: 'READ_FAILED',
      message: e instanceof Error ? e.message : String(e),
    });
    return null;
  }
  if (!Array.isArray(rows)) {
    report({
      kind: 'SOURCE_UNAVAILABLE',
      origin: source.origin,
      reason: 'NOT_A_TABLE',
      message: 'source did not return a list of rows',
    });
    return null;
  }

  const rejected = new Map<number, string>();
  for (const r of source.rejected?.() ?? []) {
    if (!rejected.has(r.row)) rejected.set(r.row, r.reason);
  }

  const inferred = inferBuildingName(source.origin);
  const out: Staged[] = [];

  rows.forEach((value, i) => {
    const row = i + 1;
    const parseError = rejected.get(row);
    if (parseError !== undefined) {
      report({ kind: 'RECORD_MALFORMED', origin: source.origin, row, reason: 'PARSE_ERROR', message: parseError });
      return;
    }
    const parsed = RawRecordSchema.safeParse(value);
    if (!parsed.success) {
      report({
        kind: 'RECORD_MALFORMED',
        origin: source.origin,
        row,
        reason: 'NOT_AN_OBJECT',
        message: 'row is not a record',
      });
      return;
    }
    const raw = parsed.data;
    const explicit = BuildingSchema.safeParse(raw.Building);
    out.push({
      origin: source.origin,
      row,
      raw,
      building: explicit.success ? explicit.data : inferred,
    });
  });

  // rows the parser lost entirely (swallowed by a broken quote) only exist here
  const lost = [...rejected].filter(([row]) => row > rows.length).sort(([a], [b]) => a - b);
  for (const [row, message] of lost) {
    report({ kind: 'RECORD_MALFORMED', origin: source.origin, row, reason: 'PARSE_ERROR', message });
  }

  return { rows: out, total: rows.length + lost.length };
}

function validate(item: Staged, report: (d: Diagnostic) => void): CanonicalRecord | null {
  const { origin, row, raw } = item;

  const timestamp = parseTimestamp(raw.Date);
  if (!timestamp) {
    report({
      kind: 'VALIDATION_FAILURE',
      origin,
      row,
      reason: 'INVALID_DATE',
      message: isMissing(raw.Date) ? 'Date is missing' : `Date is not parseable: ${String(raw.Date)}`,
    });
    return null;
  }

  if (isMissing(raw.KWH)) {
    report({ kind: 'VALIDATION_FAILURE', origin, row, reason: 'MISSING_KWH', message: 'KWH is missing' });
    return null;
  }
  const kwh = KwhSchema.safeParse(raw.KWH);
  if (!kwh.success) {
    report({
      kind: 'RECORD_MALFORMED',
      origin,
      row,
      reason: 'INVALID_KWH',
      message: `KWH must be a non-negative number: ${String(raw.KWH)}`,
    });
    return null;
  }

  // Month follows the timestamp; an input Month column is ignored
  return { timestamp, building: item.building, kwh: kwh.data, month: utcMonth(timestamp) };
}
