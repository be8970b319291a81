// src/aggregate.ts
import type { CanonicalDataset } from './dataset.js';
import { KwhSum, sumOf } from './sum.js';
import type { AggregateSeries, BuildingStats, BuildingSummaryTable, TrendStats } from './types.js';

export function dailyTotals(dataset: CanonicalDataset): AggregateSeries {
  return dataset.resample('day');
}

/** ISO weeks, Monday 00:00 UTC, labelled by their Monday */
export function weeklyTotals(dataset: CanonicalDataset): AggregateSeries {
  return dataset.resample('week');
}

/** Each building's own weekly series, in first-appearance order. */
export function weeklyTotalsByBuilding(dataset: CanonicalDataset): Map<string, AggregateSeries> {
  const out = new Map<string, AggregateSeries>();
  for (const name of dataset.buildings()) {
    out.set(name, dataset.filter(r => r.building === name).resample('week'));
  }
  return out;
}

export function buildingSummary(dataset: CanonicalDataset): BuildingSummaryTable {
  const table = new Map<string, BuildingStats>();
  const sums = new Map<string, KwhSum>();
  for (const rec of dataset.records) {
    const row = table.get(rec.building);
    if (!row) {
      table.set(rec.building, { mean: rec.kwh, min: rec.kwh, max: rec.kwh, sum: rec.kwh, count: 1 });
      sums.set(rec.building, new KwhSum().add(rec.kwh));
      continue;
    }
    sums.get(rec.building)?.add(rec.kwh);
    row.count += 1;
    if (rec.kwh < row.min) row.min = rec.kwh;
    if (rec.kwh > row.max) row.max = rec.kwh;
  }
  // rows only exist once a record was seen, so count >= 1
  for (const [name, row] of table) {
    row.sum = sums.get(name)?.value ?? row.sum;
    row.mean = row.sum / row.count;
  }
  return table;
}

export function seriesTotal(series: AggregateSeries): number {
  return sumOf(series.map(p => p.kwh));
}

function quantile(sorted: readonly number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (b - a) * (pos - lo);
}

/**
 * count/mean/std/min/quartiles/max. Quantiles interpolate linearly; std is the
 * sample deviation and null below two values; null for an empty list.
 */
export function trendStats(values: readonly number[]): TrendStats | null {
  const n = values.length;
  if (!n) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const mean = sumOf(values) / n;

  let std: number | null = null;
  if (n > 1) {
    let sq = 0;
    for (const v of values) sq += (v - mean) ** 2;
    std = Math.sqrt(sq / (n - 1));
  }

  return {
    count: n,
    mean,
    std,
    min: sorted[0] ?? 0,
    p25: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    p75: quantile(sorted, 0.75),
    max: sorted[n - 1] ?? 0,
  };
}
