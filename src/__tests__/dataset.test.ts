import { describe, expect, it } from 'vitest';
import { CanonicalDataset } from '../dataset.js';
import type { CanonicalRecord } from '../types.js';

const rec = (iso: string, building: string, kwh: number): CanonicalRecord => {
  const timestamp = new Date(iso);
  return { timestamp, building, kwh, month: timestamp.getUTCMonth() + 1 };
};

const t = (iso: string) => new Date(iso);

const ds = new CanonicalDataset([
  rec('2023-01-03T00:00:00Z', 'Gym', 3),
  rec('2023-01-01T00:00:00Z', 'Library', 1),
  rec('2023-01-02T00:00:00Z', 'Gym', 2),
  rec('2023-01-02T00:00:00Z', 'Library', 20),
  rec('2023-01-04T12:00:00Z', 'Annex', 4),
]);

describe('CanonicalDataset', () => {
  it('keeps merge order and a stable time index', () => {
    expect(ds.records.map(r => r.kwh)).toEqual([3, 1, 2, 20, 4]);
    expect(ds.byTime.map(r => r.kwh)).toEqual([1, 2, 20, 3, 4]);
    expect(ds.buildings()).toEqual(['Gym', 'Library', 'Annex']);
    expect(ds.size).toBe(5);
    expect(ds.isEmpty()).toBe(false);
  });

  it('reports the first and last instants', () => {
    expect(ds.first()?.toISOString()).toBe('2023-01-01T00:00:00.000Z');
    expect(ds.last()?.toISOString()).toBe('2023-01-04T12:00:00.000Z');
  });

  it('has no first or last when empty', () => {
    const empty = CanonicalDataset.empty();
    expect(empty.first()).toBeUndefined();
    expect(empty.last()).toBeUndefined();
    expect(empty.isEmpty()).toBe(true);
    expect(empty.between(t('2023-01-01T00:00:00Z'), t('2024-01-01T00:00:00Z'))).toEqual([]);
    expect(empty.resample('day')).toEqual([]);
  });

  describe('between', () => {
    it('includes from and excludes to', () => {
      const got = ds.between(t('2023-01-02T00:00:00Z'), t('2023-01-03T00:00:00Z'));
      expect(got.map(r => [r.building, r.kwh])).toEqual([
        ['Gym', 2],
        ['Library', 20],
      ]);
    });

    it('returns every record sharing a timestamp, in merge order', () => {
      const got = ds.between(t('2023-01-02T00:00:00Z'), t('2023-01-02T00:00:00.001Z'));
      expect(got.map(r => r.kwh)).toEqual([2, 20]);
    });

    it('is empty when to is not after from', () => {
      expect(ds.between(t('2023-01-02T00:00:00Z'), t('2023-01-02T00:00:00Z'))).toEqual([]);
      expect(ds.between(t('2023-01-04T00:00:00Z'), t('2023-01-01T00:00:00Z'))).toEqual([]);
    });

    it('covers everything for a range wider than the data', () => {
      const got = ds.between(t('2022-01-01T00:00:00Z'), t('2024-01-01T00:00:00Z'));
      expect(got.map(r => r.kwh)).toEqual([1, 2, 20, 3, 4]);
    });
  });

  it('filters into a new dataset', () => {
    const gym = ds.filter(r => r.building === 'Gym');
    expect(gym.records.map(r => r.kwh)).toEqual([3, 2]);
    expect(gym.first()?.toISOString()).toBe('2023-01-02T00:00:00.000Z');
    expect(ds.size).toBe(5);
  });
});
