/**
 * FALLBACK FORECAST
 * =================
 *
 * Flat extrapolation of the trailing mean with a fixed ±5% band.
 * Only used when no external forecast is usable.
 *
 * baseline = mean(last 6 non-null actuals)
 * points   = `horizon` months after the latest actual, all at baseline
 */

import { absent, present, type Outcome } from '../../common/outcome.js';
import { monthRange, nextPeriod, normalizeDay } from '../time-series/period.utils.js';
import type { TimeSeriesPoint } from '../time-series/time-series.types.js';
import type { FallbackForecast, FallbackOptions, ForecastPoint, InsufficientData } from './forecast.types.js';

export const FALLBACK_WINDOW = 6;
export const FALLBACK_BAND = 0.05;

function mean(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/**
 * @throws RangeError when `horizon` is not a positive integer
 */
export function fallbackForecast(
  series: readonly TimeSeriesPoint[],
  horizon: number,
  options: FallbackOptions = {}
): Outcome<FallbackForecast, InsufficientData> {
  if (!Number.isInteger(horizon) || horizon < 1) {
    throw new RangeError(`horizon must be a positive integer, got ${horizon}`);
  }
  const windowSize = options.window ?? FALLBACK_WINDOW;
  const band = options.band ?? FALLBACK_BAND;

  if (series.length === 0) {
    return absent({ kind: 'INSUFFICIENT_DATA', detail: 'Cannot forecast from an empty series' });
  }

  const numeric = series
    .map((p) => p.value)
    .filter((v): v is number => v !== null && Number.isFinite(v));
  const window = numeric.slice(-windowSize);

  if (window.length === 0) {
    return absent({ kind: 'INSUFFICIENT_DATA', detail: 'Series has no numeric values to average' });
  }

  const periods = series
    .map((p) => normalizeDay(p.period))
    .filter((p): p is string => p !== null);
  if (periods.length === 0) {
    return absent({ kind: 'INSUFFICIENT_DATA', detail: 'Series has no valid periods' });
  }
  const last = periods.reduce((max, p) => (p > max ? p : max));

  const baseline = mean(window);
  const low = baseline * (1 - band);
  const high = baseline * (1 + band);

  // A negative baseline flips the products; keep lower <= point <= upper
  const lowerBound = Math.min(low, high);
  const upperBound = Math.max(low, high);

  const points: ForecastPoint[] = monthRange(nextPeriod(last), horizon).map((period) => ({
    period,
    pointEstimate: baseline,
    lowerBound,
    upperBound,
  }));

  return present({ baseline, window: window.length, points });
}
