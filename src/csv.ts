// src/csv.ts
import { mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import Papa from 'papaparse';
import type { CanonicalDataset } from './dataset.js';
import { generateSampleSet } from './generator.js';
import type { PipelineResult } from './pipeline.js';
import { serializeViews } from './serialize.js';
import { formatSummary } from './summary.js';
import type { BuildingSummaryTable, RejectedRow, RowSource } from './types.js';

type Parsed = { rows: Record<string, string>[]; rejected: RejectedRow[] };

function hasBrokenQuote(row: Record<string, unknown>): boolean {
  return Object.values(row).some(v => {
    const cells = Array.isArray(v) ? v : [v];
    return cells.some(c => typeof c === 'string' && /["\r\n]/.test(c));
  });
}

/**
 * Short rows are kept (their missing cells fail validation later); any other
 * parser complaint tied to a row rejects that row.
 *
 * A quote error means row boundaries are gone from that row on: the parser
 * folds every following line into one field. That row is rejected, and each
 * non-blank line it swallowed is reported as a lost row numbered as if the
 * file had parsed one row per line.
 */
function parseCsv(text: string): Parsed {
  const { data, errors } = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  const rejected: RejectedRow[] = [];

  const quoteErrors = errors.filter(e => e.type === 'Quotes');
  let rows = data;
  const first = quoteErrors[0];
  if (first) {
    const found = data.findIndex(hasBrokenQuote);
    // error rows count the header
    const broken = found >= 0 ? found : Math.min(Math.max((first.row ?? 1) - 1, 0), data.length - 1);
    if (broken >= 0) {
      rows = data.slice(0, broken + 1);
      rejected.push({ row: broken + 1, reason: `${first.code}: ${first.message}` });
      const dataLines = text.split(/\r\n|\n|\r/).filter(l => l !== '').length - 1;
      for (let row = broken + 2; row <= dataLines; row++) {
        rejected.push({ row, reason: `line lost to the unterminated quote in row ${broken + 1}` });
      }
    }
  }

  for (const err of errors) {
    if (err.type === 'Quotes' || err.row === undefined || err.code === 'TooFewFields') continue;
    if (err.row + 1 > rows.length) continue;
    rejected.push({ row: err.row + 1, reason: `${err.code}: ${err.message}` });
  }
  return { rows, rejected };
}

/** In-memory CSV text; parsed once, on first read. */
export function csvTextSource(origin: string, text: string | (() => string)): RowSource {
  let parsed: Parsed | null = null;
  const load = () => {
    if (!parsed) parsed = parseCsv(typeof text === 'string' ? text : text());
    return parsed;
  };
  return {
    origin,
    read: () => load().rows,
    rejected: () => (parsed ? parsed.rejected : []),
  };
}

/** File is not touched until the source is read. */
export function csvSource(path: string): RowSource {
  return csvTextSource(path, () => readFileSync(path, 'utf8'));
}

export function discoverCsvSources(dir: string): RowSource[] {
  return readdirSync(dir)
    .filter(f => f.toLowerCase().endsWith('.csv'))
    .sort()
    .map(f => csvSource(join(dir, f)));
}

/** --- exports --- */
export function toCleanedCsv(dataset: CanonicalDataset): string {
  return Papa.unparse(
    {
      fields: ['Date', 'Building', 'KWH', 'Month'],
      data: dataset.records.map(r => [r.timestamp.toISOString(), r.building, r.kwh, r.month]),
    },
    { newline: '\n' },
  );
}

export function toBuildingSummaryCsv(table: BuildingSummaryTable): string {
  const data: (string | number)[][] = [];
  for (const [name, s] of table) data.push([name, s.mean, s.min, s.max, s.sum, s.count]);
  return Papa.unparse(
    { fields: ['Building', 'mean', 'min', 'max', 'sum', 'count'], data },
    { newline: '\n' },
  );
}

export const OUTPUT_FILES = {
  cleaned: 'cleaned_energy_data.csv',
  summaryTable: 'building_summary.csv',
  summaryText: 'summary.txt',
  dashboard: 'dashboard.json',
} as const;

/** Returns the paths written. An empty run only gets its summary text. */
export function writeRunOutputs(dir: string, result: PipelineResult): string[] {
  mkdirSync(dir, { recursive: true });
  const written: string[] = [];
  const put = (name: string, body: string) => {
    const p = join(dir, name);
    writeFileSync(p, body, 'utf8');
    written.push(p);
  };

  if (result.status !== 'ok') {
    put(OUTPUT_FILES.summaryText, formatSummary(result));
    return written;
  }

  put(OUTPUT_FILES.cleaned, toCleanedCsv(result.dataset) + '\n');
  put(OUTPUT_FILES.summaryTable, toBuildingSummaryCsv(result.buildingSummary) + '\n');
  put(OUTPUT_FILES.summaryText, formatSummary(result.summary));
  put(OUTPUT_FILES.dashboard, JSON.stringify(serializeViews(result.views), null, 2) + '\n');
  return written;
}

/** Library/Dormitory/Cafeteria for 2023, one row per day. */
export function writeSampleData(dir: string, rng?: () => number): string[] {
  mkdirSync(dir, { recursive: true });
  const written: string[] = [];
  for (const [building, rows] of generateSampleSet({ rng })) {
    const p = join(dir, `${building}.csv`);
    writeFileSync(p, Papa.unparse(rows, { newline: '\n' }) + '\n', 'utf8');
    written.push(p);
  }
  return written;
}
