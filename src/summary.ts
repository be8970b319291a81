// src/summary.ts
import { trendStats } from './aggregate.js';
import type { CanonicalDataset } from './dataset.js';
import { sumOf } from './sum.js';
import type {
  AggregateSeries,
  BuildingSummaryTable,
  CanonicalRecord,
  SummaryResult,
} from './types.js';

export const NO_VALID_READINGS = 'no valid readings after merging all sources';

/** First-max scan: ties keep the building seen first. */
export function highestConsumingBuilding(table: BuildingSummaryTable): string | null {
  let best: string | null = null;
  let bestSum = -Infinity;
  for (const [name, row] of table) {
    if (row.sum > bestSum) {
      best = name;
      bestSum = row.sum;
    }
  }
  return best;
}

/** Largest single reading; ties go to the earliest timestamp. */
export function peakRecord(dataset: CanonicalDataset): CanonicalRecord | null {
  let peak: CanonicalRecord | null = null;
  for (const rec of dataset.byTime) {
    if (!peak || rec.kwh > peak.kwh) peak = rec;
  }
  return peak;
}

export function buildSummaryReport(
  dataset: CanonicalDataset,
  table: BuildingSummaryTable,
  weekly: AggregateSeries,
): SummaryResult {
  if (dataset.isEmpty()) return { status: 'insufficient_data', reason: NO_VALID_READINGS };

  const peak = peakRecord(dataset);
  const highest = highestConsumingBuilding(table);
  const trend = trendStats(weekly.map(p => p.kwh));
  // a non-empty dataset always yields a table row and at least one week;
  // anything else means the inputs were built from different datasets
  if (!peak || highest === null || !trend) {
    return { status: 'insufficient_data', reason: 'aggregates do not match the dataset' };
  }

  const total = sumOf(dataset.records.map(r => r.kwh));

  return {
    status: 'ok',
    report: {
      totalCampusConsumption: total,
      highestConsumingBuilding: highest,
      peakLoadTimestamp: peak.timestamp,
      peakLoadKwh: peak.kwh,
      weeklyTrendStats: trend,
    },
  };
}

const TITLE = ['Campus Energy Usage Summary', '==========================='];

export function formatSummary(result: SummaryResult): string {
  if (result.status !== 'ok') {
    return [...TITLE, `Insufficient data: ${result.reason}`, ''].join('\n');
  }
  const r = result.report;
  return [
    ...TITLE,
    `Total Campus Consumption: ${r.totalCampusConsumption} KWH`,
    `Highest-Consuming Building: ${r.highestConsumingBuilding}`,
    `Peak Load Time: ${r.peakLoadTimestamp.toISOString()} (${r.peakLoadKwh} KWH)`,
    `Weekly Trends (Mean: ${r.weeklyTrendStats.mean.toFixed(2)}, Max: ${r.weeklyTrendStats.max.toFixed(2)})`,
    'Daily Trends: See dashboard for visualizations.',
    '',
  ].join('\n');
}
