/**
 * EXTERNAL FORECAST VALIDATOR
 *
 * Accepts a forecast file only with the exact ds / yhat / yhat_lower /
 * yhat_upper columns. Anything less is an absence so the caller can fall back.
 */

import { absent, present, type Outcome } from '../../common/outcome.js';
import { getRootLogger, type Logger } from '../../common/logger.js';
import { toNumber, type TabularDataset } from '../artifacts/dataset.js';
import { formatDay, parseDateValue } from '../time-series/period.utils.js';
import { EXTERNAL_FORECAST_COLUMNS, type ForecastPoint } from './forecast.types.js';

const REQUIRED = Object.values(EXTERNAL_FORECAST_COLUMNS);

export function validateExternalForecast(
  dataset: TabularDataset | null,
  options: { logger?: Logger } = {}
): Outcome<ForecastPoint[]> {
  const logger = options.logger ?? getRootLogger();

  if (!dataset) {
    return absent({ kind: 'NO_SOURCE', detail: 'No external forecast supplied' });
  }

  const missing = REQUIRED.filter((c) => !dataset.columns.includes(c));
  if (missing.length > 0) {
    logger.warn({ missing }, '[ForecastValidator] external forecast rejected: columns missing');
    return absent({ kind: 'SCHEMA_MISMATCH', missing, available: [...dataset.columns] });
  }

  const { period, pointEstimate, lowerBound, upperBound } = EXTERNAL_FORECAST_COLUMNS;
  const points: ForecastPoint[] = [];
  let undated = 0;
  let invalid = 0;

  for (const row of dataset.rows) {
    const date = parseDateValue(row[period]);
    if (!date) {
      undated++;
      continue;
    }

    const yhat = toNumber(row[pointEstimate]);
    const lo = toNumber(row[lowerBound]);
    const hi = toNumber(row[upperBound]);
    if (yhat === null || lo === null || hi === null || !(lo <= yhat && yhat <= hi)) {
      invalid++;
      continue;
    }

    points.push({ period: formatDay(date), pointEstimate: yhat, lowerBound: lo, upperBound: hi });
  }

  if (undated > 0 || invalid > 0) {
    logger.info({ undated, invalid, kept: points.length }, '[ForecastValidator] external forecast rows dropped');
  }

  if (points.length === 0) {
    return absent({ kind: 'EMPTY_RESULT', detail: 'External forecast has no usable rows' });
  }

  // Array.prototype.sort is stable: equal periods keep file order
  points.sort((a, b) => (a.period < b.period ? -1 : a.period > b.period ? 1 : 0));
  return present(points);
}
