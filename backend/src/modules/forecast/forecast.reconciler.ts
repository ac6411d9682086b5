/**
 * FORECAST RECONCILER
 *
 * external forecast (validated) → fallback on actuals → nothing.
 * The renderer gets the reasons when both paths come up empty.
 */

import type { Absence } from '../../common/outcome.js';
import { getRootLogger, type Logger } from '../../common/logger.js';
import type { TabularDataset } from '../artifacts/dataset.js';
import type { TimeSeriesPoint } from '../time-series/time-series.types.js';
import { fallbackForecast } from './forecast.fallback.js';
import { validateExternalForecast } from './forecast.validator.js';
import type { FallbackOptions, ForecastPoint, ForecastReconciliation } from './forecast.types.js';

export interface ReconcileInput {
  external: TabularDataset | null;
  actuals: readonly TimeSeriesPoint[] | null;
  horizon: number;
  fallback?: FallbackOptions;
  logger?: Logger;
}

export function reconcileForecast(input: ReconcileInput): ForecastReconciliation {
  const logger = input.logger ?? getRootLogger();

  const external = validateExternalForecast(input.external, { logger });
  if (external.ok) {
    return { source: 'external', points: external.value };
  }

  if (!input.actuals) {
    const noActuals: Absence = { kind: 'NO_SOURCE', detail: 'No monthly actuals to extrapolate' };
    logger.info({ reasons: [external.absence.kind, noActuals.kind] }, '[ForecastReconciler] no forecast available');
    return { source: 'none', reasons: [external.absence, noActuals] };
  }

  const fallback = fallbackForecast(input.actuals, input.horizon, input.fallback);
  if (!fallback.ok) {
    logger.warn({ absence: fallback.absence }, '[ForecastReconciler] fallback forecast failed');
    return { source: 'none', reasons: [external.absence, fallback.absence] };
  }

  logger.info(
    { externalAbsence: external.absence.kind, baseline: fallback.value.baseline, horizon: input.horizon },
    '[ForecastReconciler] using fallback forecast'
  );
  return {
    source: 'fallback',
    baseline: fallback.value.baseline,
    points: fallback.value.points,
    externalAbsence: external.absence,
  };
}

/** Option form: forecast points from whichever source won, or null. */
export function reconcileForecastPoints(input: ReconcileInput): ForecastPoint[] | null {
  const result = reconcileForecast(input);
  return result.source === 'none' ? null : [...result.points];
}
