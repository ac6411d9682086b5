/**
 * INSIGHTS TYPES
 * ==============
 *
 * View models handed to the reporting surface. Every optional piece is an
 * Outcome so the renderer can show "no data" with the reason.
 */

import type { Outcome } from '../../common/outcome.js';
import type { DataRow } from '../artifacts/dataset.js';
import type { ForecastReconciliation } from '../forecast/forecast.types.js';
import type { FilterPredicate, NumericBounds } from '../record-filter/record-filter.types.js';
import type { GroupTotals, SeriesSource, TimeSeriesPoint } from '../time-series/time-series.types.js';

export interface SegmentShare {
  segment: string;
  customers: number;
}

export interface OverviewSummary {
  customers: number | null;
  totalSales: number | null;
  totalOrders: number | null;
  segmentShare: Outcome<SegmentShare[]>;
}

export interface CustomerView {
  columns: readonly string[];
  rows: readonly DataRow[];
  total: number;                    // rows before filtering
  matched: number;
  filters: FilterPredicate[];
  options: {
    segments: string[];
    recency: NumericBounds | null;
    sales: NumericBounds | null;
  };
}

export interface BreakdownView extends GroupTotals {
  options: string[];                // every key, before `pick` narrows rows
}

export interface MonthlyView {
  source: SeriesSource;
  points: readonly TimeSeriesPoint[];
  bounds: { first: string; last: string };   // full series span (date picker limits)
}

export interface ForecastView {
  horizon: number;
  actuals: Outcome<readonly TimeSeriesPoint[]>;
  forecast: ForecastReconciliation;
}
