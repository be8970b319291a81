// src/errors.ts

export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'VALIDATION_ERROR'
  | 'PUBLISH_UNAVAILABLE'
  | 'DB_ERROR'
  | 'INTERNAL';

export function errorBody(code: ErrorCode, message: string, details?: unknown) {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}

/** Error instances and PostgREST-style `{ message }` objects alike */
export function messageOf(e: unknown, fallback: string): string {
  if (e instanceof Error) return e.message || fallback;
  if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') return e.message;
  return fallback;
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type LedgerMismatch = {
  building: string;
  ledgerTotal: number | null;
  ledgerCount: number;
  summarySum: number | null;
  summaryCount: number;
};

/** Ledger registry and building summary table disagree: a bug, not bad data. */
export class LedgerReconciliationError extends Error {
  constructor(readonly mismatches: LedgerMismatch[]) {
    super(`ledger totals disagree with building summary for: ${mismatches.map(m => m.building).join(', ')}`);
    this.name = 'LedgerReconciliationError';
  }
}
