// src/dataset.ts
import { KwhSum } from './sum.js';
import { nextPeriod, periodStart } from './time.js';
import type { AggregatePoint, AggregateSeries, CanonicalRecord, Granularity } from './types.js';

/**
 * Validated, merged record set.
 *
 * `records` keeps merge order (source by source, row by row); `byTime` is a
 * stable chronological index over the same records. Every resample and range
 * query goes through the index, so only validated rows ever reach it.
 */
export class CanonicalDataset {
  readonly records: readonly CanonicalRecord[];
  readonly byTime: readonly CanonicalRecord[];
  private readonly buildingOrder: readonly string[];

  constructor(records: readonly CanonicalRecord[]) {
    this.records = Object.freeze([...records]);
    // Array#sort is stable: equal timestamps keep merge order
    this.byTime = Object.freeze(
      [...records].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime()),
    );
    this.buildingOrder = Object.freeze(Array.from(new Set(records.map(r => r.building))));
  }

  static empty(): CanonicalDataset {
    return new CanonicalDataset([]);
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  /** first appearance in merge order */
  buildings(): readonly string[] {
    return this.buildingOrder;
  }

  first(): Date | undefined {
    return this.byTime[0]?.timestamp;
  }

  last(): Date | undefined {
    return this.byTime[this.byTime.length - 1]?.timestamp;
  }

  /** Records with from <= timestamp < to, in time order. */
  between(from: Date, to: Date): CanonicalRecord[] {
    const lo = this.lowerBound(from.getTime());
    const hi = this.lowerBound(to.getTime());
    return this.byTime.slice(lo, Math.max(lo, hi));
  }

  filter(pred: (r: CanonicalRecord) => boolean): CanonicalDataset {
    return new CanonicalDataset(this.records.filter(pred));
  }

  /**
   * Sums kWh per calendar period. Periods are contiguous from the first to the
   * last populated one; a period without records gets 0.
   */
  resample(g: Granularity): AggregateSeries {
    const first = this.byTime[0];
    if (!first) return [];

    const out: AggregatePoint[] = [];
    let start = periodStart(first.timestamp, g);
    let end = nextPeriod(start, g);
    let acc = new KwhSum();

    for (const rec of this.byTime) {
      while (rec.timestamp.getTime() >= end.getTime()) {
        out.push({ periodStart: start, kwh: acc.value });
        start = end;
        end = nextPeriod(start, g);
        acc = new KwhSum();
      }
      acc.add(rec.kwh);
    }
    out.push({ periodStart: start, kwh: acc.value });
    return out;
  }

  private lowerBound(ms: number): number {
    let lo = 0;
    let hi = this.byTime.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const rec = this.byTime[mid];
      if (rec && rec.timestamp.getTime() < ms) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
