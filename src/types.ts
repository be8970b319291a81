// src/types.ts

/** Row as it comes out of a source, before any validation. */
export interface RawRecord {
  Date?: unknown;
  KWH?: unknown;
  Building?: unknown;
  Month?: unknown;
}

/** Anything that can hand over a batch of raw rows; `read` may throw. */
export interface RowSource {
  origin: string;
  read(): readonly unknown[];
  /** Row numbers the parser already rejected (bad CSV lines etc.); may run past `read()` for lines it lost */
  rejected?(): readonly RejectedRow[];
}

export type RejectedRow = { row: number; reason: string };

export interface CanonicalRecord {
  timestamp: Date;
  building: string;
  kwh: number;
  month: number; // 1..12
}

export type Granularity = 'day' | 'week';

export type AggregatePoint = { periodStart: Date; kwh: number };
export type AggregateSeries = readonly AggregatePoint[];

export type BuildingStats = {
  mean: number;
  min: number;
  max: number;
  sum: number;
  count: number;
};

/** Iteration order = first appearance of the building in the merged input. */
export type BuildingSummaryTable = ReadonlyMap<string, BuildingStats>;

export type DiagnosticKind = 'SOURCE_UNAVAILABLE' | 'RECORD_MALFORMED' | 'VALIDATION_FAILURE';

export type DiagnosticReason =
  | 'READ_FAILED'
  | 'NOT_A_TABLE'
  | 'NOT_AN_OBJECT'
  | 'PARSE_ERROR'
  | 'INVALID_KWH'
  | 'MISSING_KWH'
  | 'INVALID_DATE';

export interface Diagnostic {
  kind: DiagnosticKind;
  origin: string;
  row?: number; // 1-based within the source
  reason: DiagnosticReason;
  message: string;
}

export type IngestEvent =
  | { type: 'SOURCE_LOADED'; origin: string; rows: number; accepted: number }
  | { type: 'DIAGNOSTIC'; diagnostic: Diagnostic };

export type TrendStats = {
  count: number;
  mean: number;
  std: number | null;
  min: number;
  p25: number;
  median: number;
  p75: number;
  max: number;
};

export interface SummaryReport {
  totalCampusConsumption: number;
  highestConsumingBuilding: string;
  peakLoadTimestamp: Date;
  peakLoadKwh: number;
  weeklyTrendStats: TrendStats;
}

export type InsufficientData = { status: 'insufficient_data'; reason: string };

export type SummaryResult = { status: 'ok'; report: SummaryReport } | InsufficientData;
