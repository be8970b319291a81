import { addHours } from 'date-fns';

export const SAMPLE_BUILDINGS = ['Library', 'Dormitory', 'Cafeteria'] as const;

export type SampleRow = { Date: string; Building: string; KWH: number };

/** Small seedable PRNG (mulberry32), so demo runs can be repeated */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer kWh in [min, max) */
function randomKwh(rng: () => number, min = 100, max = 500) {
  return min + Math.floor(rng() * (max - min));
}

/** One row per day starting at `from` (UTC midnight expected). */
export function generateSampleRows(
  building: string,
  from: Date,
  days: number,
  rng: () => number = Math.random,
): SampleRow[] {
  const out: SampleRow[] = [];
  let t = new Date(from);
  for (let i = 0; i < days; i++) {
    out.push({ Date: t.toISOString().slice(0, 10), Building: building, KWH: randomKwh(rng) });
    t = addHours(t, 24);
  }
  return out;
}

export function generateSampleSet(
  opts: { buildings?: readonly string[]; from?: Date; days?: number; rng?: () => number } = {},
): Map<string, SampleRow[]> {
  const from = opts.from ?? new Date('2023-01-01T00:00:00Z');
  const days = opts.days ?? 365;
  const rng = opts.rng ?? Math.random;
  const out = new Map<string, SampleRow[]>();
  for (const b of opts.buildings ?? SAMPLE_BUILDINGS) {
    out.set(b, generateSampleRows(b, from, days, rng));
  }
  return out;
}
