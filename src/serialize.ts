// src/serialize.ts
// JSON shapes for the HTTP API and dashboard.json: Maps become arrays, Dates ISO strings.
import type { LedgerReport } from './ledger.js';
import type { PipelineResult } from './pipeline.js';
import type {
  AggregateSeries,
  BuildingStats,
  BuildingSummaryTable,
  Diagnostic,
  SummaryResult,
  TrendStats,
} from './types.js';
import type { DashboardViews, HistogramBin } from './views.js';

export type SeriesJson = { period_start: string; kwh: number }[];

export type ViewsJson = {
  daily_trend: SeriesJson;
  weekly_by_building: { building: string; average_weekly_kwh: number; weeks: SeriesJson }[];
  day_of_week: { day_of_week: number; kwh: number }[];
  distribution: { values: number[]; histogram: HistogramBin[] };
};

export type SummaryJson =
  | {
      status: 'ok';
      total_campus_consumption: number;
      highest_consuming_building: string;
      peak_load_timestamp: string;
      peak_load_kwh: number;
      weekly_trend_stats: TrendStats;
    }
  | { status: 'insufficient_data'; reason: string };

export type RunJson =
  | {
      status: 'ok';
      rows: number;
      buildings: string[];
      daily_totals: SeriesJson;
      weekly_totals: SeriesJson;
      building_summary: ({ building: string } & BuildingStats)[];
      ledger_reports: LedgerReport[];
      summary: SummaryJson;
      views: ViewsJson;
      diagnostics: Diagnostic[];
    }
  | { status: 'insufficient_data'; reason: string; diagnostics: Diagnostic[] };

export function serializeSeries(series: AggregateSeries): SeriesJson {
  return series.map(p => ({ period_start: p.periodStart.toISOString(), kwh: p.kwh }));
}

export function serializeTable(table: BuildingSummaryTable): ({ building: string } & BuildingStats)[] {
  return Array.from(table, ([building, s]) => ({ building, ...s }));
}

export function serializeSummary(result: SummaryResult): SummaryJson {
  if (result.status !== 'ok') return result;
  const r = result.report;
  return {
    status: 'ok',
    total_campus_consumption: r.totalCampusConsumption,
    highest_consuming_building: r.highestConsumingBuilding,
    peak_load_timestamp: r.peakLoadTimestamp.toISOString(),
    peak_load_kwh: r.peakLoadKwh,
    weekly_trend_stats: r.weeklyTrendStats,
  };
}

export function serializeViews(v: DashboardViews): ViewsJson {
  return {
    daily_trend: serializeSeries(v.dailyTrend),
    weekly_by_building: v.weeklyByBuilding.map(b => ({
      building: b.building,
      average_weekly_kwh: b.averageWeeklyKwh,
      weeks: serializeSeries(b.weeks),
    })),
    day_of_week: v.dayOfWeek.map(p => ({ day_of_week: p.dayOfWeek, kwh: p.kwh })),
    distribution: v.distribution,
  };
}

export function serializeRun(result: PipelineResult): RunJson {
  if (result.status !== 'ok') {
    return { status: result.status, reason: result.reason, diagnostics: result.diagnostics };
  }
  return {
    status: 'ok',
    rows: result.dataset.size,
    buildings: [...result.dataset.buildings()],
    daily_totals: serializeSeries(result.dailyTotals),
    weekly_totals: serializeSeries(result.weeklyTotals),
    building_summary: serializeTable(result.buildingSummary),
    ledger_reports: result.ledgerReports,
    summary: serializeSummary(result.summary),
    views: serializeViews(result.views),
    diagnostics: result.diagnostics,
  };
}
