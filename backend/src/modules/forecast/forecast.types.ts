/**
 * FORECAST TYPES
 * ==============
 *
 * Forecast points carry a symmetric or asymmetric band.
 * Invariant: lowerBound <= pointEstimate <= upperBound.
 */

import type { Absence } from '../../common/outcome.js';

export interface ForecastPoint {
  readonly period: string;          // YYYY-MM-DD
  readonly pointEstimate: number;
  readonly lowerBound: number;
  readonly upperBound: number;
}

/** Exact column names an external forecast file must carry. */
export const EXTERNAL_FORECAST_COLUMNS = {
  period: 'ds',
  pointEstimate: 'yhat',
  lowerBound: 'yhat_lower',
  upperBound: 'yhat_upper',
} as const;

export type InsufficientData = Extract<Absence, { kind: 'INSUFFICIENT_DATA' }>;

export interface FallbackOptions {
  window?: number;                  // trailing months averaged (default 6)
  band?: number;                    // relative half-width (default 0.05)
}

export interface FallbackForecast {
  baseline: number;
  window: number;                   // values actually averaged
  points: readonly ForecastPoint[];
}

export type ForecastReconciliation =
  | { source: 'external'; points: readonly ForecastPoint[] }
  | {
      source: 'fallback';
      baseline: number;
      points: readonly ForecastPoint[];
      externalAbsence: Absence;
    }
  | { source: 'none'; reasons: Absence[] };
