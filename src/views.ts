// src/views.ts
// Chart inputs only; rendering happens elsewhere.
import { dailyTotals, seriesTotal, weeklyTotalsByBuilding } from './aggregate.js';
import type { CanonicalDataset } from './dataset.js';
import { isoDayOfWeek } from './time.js';
import type { AggregateSeries } from './types.js';

export type WeeklyBuildingView = {
  building: string;
  weeks: AggregateSeries;
  averageWeeklyKwh: number;
};

export type HistogramBin = { from: number; to: number; count: number };

export type DashboardViews = {
  dailyTrend: AggregateSeries;
  weeklyByBuilding: WeeklyBuildingView[];
  dayOfWeek: { dayOfWeek: number; kwh: number }[];
  distribution: { values: number[]; histogram: HistogramBin[] };
};

/**
 * Equal-width bins between min and max, the last one closed on both ends.
 * With min === max every value lands in a single bin of width 1.
 */
export function histogram(values: readonly number[], bins = 20): HistogramBin[] {
  if (!values.length || bins < 1) return [];
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (min === max) {
    min -= 0.5;
    max += 0.5;
  }

  const width = (max - min) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    from: min + i * width,
    to: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const idx = Math.min(bins - 1, Math.floor((v - min) / width));
    const bin = out[idx];
    if (bin) bin.count += 1;
  }
  return out;
}

export function buildDashboardViews(dataset: CanonicalDataset, opts: { bins?: number } = {}): DashboardViews {
  const weeklyByBuilding: WeeklyBuildingView[] = [];
  for (const [building, weeks] of weeklyTotalsByBuilding(dataset)) {
    weeklyByBuilding.push({
      building,
      weeks,
      averageWeeklyKwh: weeks.length ? seriesTotal(weeks) / weeks.length : 0,
    });
  }

  const values = dataset.byTime.map(r => r.kwh);
  return {
    dailyTrend: dailyTotals(dataset),
    weeklyByBuilding,
    dayOfWeek: dataset.byTime.map(r => ({ dayOfWeek: isoDayOfWeek(r.timestamp), kwh: r.kwh })),
    distribution: { values, histogram: histogram(values, opts.bins ?? 20) },
  };
}
