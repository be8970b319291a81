// src/sum.ts

/**
 * Neumaier-compensated running sum. Every kWh total goes through this, so the
 * daily, weekly and campus totals agree however the readings are ordered.
 */
export class KwhSum {
  private s = 0;
  private c = 0;

  add(v: number): this {
    const t = this.s + v;
    if (Math.abs(this.s) >= Math.abs(v)) this.c += this.s - t + v;
    else this.c += v - t + this.s;
    this.s = t;
    return this;
  }

  get value(): number {
    return this.s + this.c;
  }
}

export function sumOf(values: Iterable<number>): number {
  const acc = new KwhSum();
  for (const v of values) acc.add(v);
  return acc.value;
}
