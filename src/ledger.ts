// src/ledger.ts
import type { CanonicalDataset } from './dataset.js';
import type { LedgerMismatch } from './errors.js';
import { sumOf } from './sum.js';
import type { BuildingSummaryTable } from './types.js';

/** One timestamped kWh observation. Frozen on construction. */
export class Reading {
  readonly timestamp: Date;
  readonly kwh: number;

  constructor(timestamp: Date, kwh: number) {
    this.timestamp = new Date(timestamp.getTime());
    this.kwh = kwh;
    Object.freeze(this);
  }
}

export type LedgerReport = {
  name: string;
  total: number;
  average: number;
};

export class BuildingLedger {
  private readonly items: Reading[] = [];

  constructor(readonly name: string) {}

  addReading(timestamp: Date, kwh: number): Reading {
    const r = new Reading(timestamp, kwh);
    this.items.push(r);
    return r;
  }

  /** insertion order, not chronological */
  get readings(): readonly Reading[] {
    return this.items;
  }

  get count(): number {
    return this.items.length;
  }

  total(): number {
    return sumOf(this.items.map(r => r.kwh));
  }

  /** 0 for an empty ledger */
  average(): number {
    return this.items.length ? this.total() / this.items.length : 0;
  }

  report(): LedgerReport {
    return { name: this.name, total: this.total(), average: this.average() };
  }
}

export function formatReport(r: LedgerReport): string {
  return `Building: ${r.name}, Total KWH: ${r.total}, Average KWH: ${r.average.toFixed(2)}`;
}

export class LedgerRegistry {
  // Map keeps insertion order: first reading of a building fixes its position
  private readonly ledgers = new Map<string, BuildingLedger>();

  static fromDataset(dataset: CanonicalDataset): LedgerRegistry {
    const registry = new LedgerRegistry();
    for (const rec of dataset.records) {
      registry.recordReading(rec.building, rec.timestamp, rec.kwh);
    }
    return registry;
  }

  addBuilding(name: string): BuildingLedger {
    const existing = this.ledgers.get(name);
    if (existing) return existing;
    const ledger = new BuildingLedger(name);
    this.ledgers.set(name, ledger);
    return ledger;
  }

  recordReading(buildingName: string, timestamp: Date, kwh: number): Reading {
    return this.addBuilding(buildingName).addReading(timestamp, kwh);
  }

  get(name: string): BuildingLedger | undefined {
    return this.ledgers.get(name);
  }

  has(name: string): boolean {
    return this.ledgers.has(name);
  }

  get size(): number {
    return this.ledgers.size;
  }

  names(): string[] {
    return [...this.ledgers.keys()];
  }

  *allReports(): Generator<LedgerReport> {
    for (const ledger of this.ledgers.values()) yield ledger.report();
  }
}

const EPS = 1e-9;

function close(a: number, b: number): boolean {
  return Math.abs(a - b) <= EPS * Math.max(1, Math.abs(a), Math.abs(b));
}

/** Every building where the two computation paths disagree (empty = consistent). */
export function reconcileLedgers(registry: LedgerRegistry, table: BuildingSummaryTable): LedgerMismatch[] {
  const out: LedgerMismatch[] = [];
  const names = new Set([...registry.names(), ...table.keys()]);
  for (const building of names) {
    const ledger = registry.get(building);
    const row = table.get(building);
    const ledgerCount = ledger?.count ?? 0;
    const summaryCount = row?.count ?? 0;
    const ledgerTotal = ledger ? ledger.total() : null;
    const summarySum = row ? row.sum : null;
    const agree = ledgerTotal !== null && summarySum !== null
      && ledgerCount === summaryCount && close(ledgerTotal, summarySum);
    if (!agree) out.push({ building, ledgerTotal, ledgerCount, summarySum, summaryCount });
  }
  return out;
}
