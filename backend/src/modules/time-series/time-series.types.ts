/**
 * TIME SERIES TYPES
 * =================
 *
 * Canonical monthly series: one point per calendar month, keyed by the
 * first day of the month as `YYYY-MM-01`, strictly ascending.
 */

export interface TimeSeriesPoint {
  readonly period: string;          // YYYY-MM-01
  readonly value: number | null;    // null only for a blank cell in a precomputed aggregate
}

export type SeriesSource = 'precomputed' | 'derived';

export interface MonthlySeries {
  source: SeriesSource;
  points: readonly TimeSeriesPoint[];

  // Columns the series was read from (audit)
  periodColumn: string;
  valueColumn: string;
  droppedRows: number;              // rows whose date could not be parsed
}

export type GroupDimension = 'category' | 'region';

export interface GroupTotal {
  readonly key: string;
  readonly total: number | null;
}

export interface GroupTotals {
  source: SeriesSource;
  dimension: GroupDimension;
  keyColumn: string;
  valueColumn: string;
  rows: readonly GroupTotal[];
}

/** Inclusive date range; either end may be open. */
export interface DateRange {
  from?: string;
  to?: string;
}
