import { describe, expect, it } from 'vitest';
import { CanonicalDataset } from '../dataset.js';
import type { CanonicalRecord } from '../types.js';
import { buildDashboardViews, histogram } from '../views.js';

const rec = (iso: string, building: string, kwh: number): CanonicalRecord => ({
  timestamp: new Date(iso),
  building,
  kwh,
  month: 1,
});

describe('histogram', () => {
  it('uses equal-width bins with a closed last bin', () => {
    expect(histogram([0, 1, 2, 3, 4], 4)).toEqual([
      { from: 0, to: 1, count: 1 },
      { from: 1, to: 2, count: 1 },
      { from: 2, to: 3, count: 1 },
      { from: 3, to: 4, count: 2 },
    ]);
  });

  it('puts identical values into one bin', () => {
    const bins = histogram([5, 5, 5], 2);
    expect(bins).toEqual([
      { from: 4.5, to: 5, count: 0 },
      { from: 5, to: 5.5, count: 3 },
    ]);
  });

  it('is empty without values', () => {
    expect(histogram([], 20)).toEqual([]);
  });
});

describe('buildDashboardViews', () => {
  const ds = new CanonicalDataset([
    rec('2023-01-03T00:00:00Z', 'Library', 30), // Tuesday
    rec('2023-01-02T00:00:00Z', 'Library', 10), // Monday
    rec('2023-01-09T00:00:00Z', 'Library', 20),
    rec('2023-01-08T00:00:00Z', 'Gym', 5), // Sunday
  ]);
  const views = buildDashboardViews(ds, { bins: 5 });

  it('lists day-of-week pairs in time order', () => {
    expect(views.dayOfWeek).toEqual([
      { dayOfWeek: 0, kwh: 10 },
      { dayOfWeek: 1, kwh: 30 },
      { dayOfWeek: 6, kwh: 5 },
      { dayOfWeek: 0, kwh: 20 },
    ]);
  });

  it('averages weekly totals per building', () => {
    expect(views.weeklyByBuilding.map(b => [b.building, b.weeks.length, b.averageWeeklyKwh])).toEqual([
      ['Library', 2, 30],
      ['Gym', 1, 5],
    ]);
  });

  it('carries the daily trend and the raw distribution', () => {
    expect(views.dailyTrend).toHaveLength(8);
    expect(views.distribution.values).toEqual([10, 30, 5, 20]);
    expect(views.distribution.histogram.map(b => b.count)).toEqual([1, 1, 0, 1, 1]);
  });
});
