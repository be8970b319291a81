// src/pipeline.ts
import { buildingSummary, dailyTotals, weeklyTotals } from './aggregate.js';
import type { CanonicalDataset } from './dataset.js';
import { LedgerReconciliationError } from './errors.js';
import { ingestSources, type IngestOptions } from './ingest.js';
import { LedgerRegistry, reconcileLedgers, type LedgerReport } from './ledger.js';
import { buildSummaryReport, NO_VALID_READINGS } from './summary.js';
import type {
  AggregateSeries,
  BuildingSummaryTable,
  Diagnostic,
  RowSource,
  SummaryResult,
} from './types.js';
import { buildDashboardViews, type DashboardViews } from './views.js';

export type PipelineOptions = IngestOptions & { bins?: number };

export type CompletedRun = {
  status: 'ok';
  dataset: CanonicalDataset;
  dailyTotals: AggregateSeries;
  weeklyTotals: AggregateSeries;
  buildingSummary: BuildingSummaryTable;
  registry: LedgerRegistry;
  ledgerReports: LedgerReport[];
  summary: SummaryResult;
  views: DashboardViews;
  diagnostics: Diagnostic[];
};

export type EmptyRun = {
  status: 'insufficient_data';
  reason: string;
  diagnostics: Diagnostic[];
};

export type PipelineResult = CompletedRun | EmptyRun;

/**
 * One batch run. Ingestion finishes completely before anything is aggregated;
 * with no valid rows left the run ends as `insufficient_data`.
 */
export function runPipeline(sources: readonly RowSource[], opts: PipelineOptions = {}): PipelineResult {
  const { dataset, diagnostics } = ingestSources(sources, opts);
  if (dataset.isEmpty()) {
    return { status: 'insufficient_data', reason: NO_VALID_READINGS, diagnostics };
  }

  const daily = dailyTotals(dataset);
  const weekly = weeklyTotals(dataset);
  const table = buildingSummary(dataset);

  const registry = LedgerRegistry.fromDataset(dataset);
  const mismatches = reconcileLedgers(registry, table);
  if (mismatches.length) throw new LedgerReconciliationError(mismatches);

  return {
    status: 'ok',
    dataset,
    dailyTotals: daily,
    weeklyTotals: weekly,
    buildingSummary: table,
    registry,
    ledgerReports: [...registry.allReports()],
    summary: buildSummaryReport(dataset, table, weekly),
    views: buildDashboardViews(dataset, { bins: opts.bins }),
    diagnostics,
  };
}
