/**
 * MONTHLY AGGREGATOR
 * ==================
 *
 * Canonical monthly (period, value) series.
 *
 * Precedence:
 *   1. precomputed monthly aggregate (ds/y, else its two leading columns)
 *   2. derived from raw transactional rows (date + amount concepts)
 *
 * Both paths floor to the month and group, so an already-monthly input comes
 * back unchanged. Inability to build a series is an absence, never a throw.
 */

import { absent, present, type Outcome } from '../../common/outcome.js';
import { getRootLogger, type Logger } from '../../common/logger.js';
import { toNumber, type DataRow, type TabularDataset } from '../artifacts/dataset.js';
import { requireColumns } from '../schema/schema.resolver.js';
import { DEFAULT_ALIAS_TABLE, type AliasTable } from '../schema/schema.aliases.js';
import { floorToMonth, normalizeDay, parseDateValue } from './period.utils.js';
import type { DateRange, MonthlySeries, SeriesSource, TimeSeriesPoint } from './time-series.types.js';

export interface AggregatorOptions {
  aliasTable?: AliasTable;
  logger?: Logger;
}

interface Bucket {
  sum: number;
  numeric: boolean;
}

// ═══════════════════════════════════════════════════════════════
// BUCKETING
// ═══════════════════════════════════════════════════════════════

/**
 * Sum `valueColumn` per calendar month. A month with no numeric amount sums
 * to 0, unless `blankMonth` is null (a precomputed aggregate whose value
 * cell is blank keeps that blank).
 */
export function bucketByMonth(
  rows: readonly DataRow[],
  periodColumn: string,
  valueColumn: string,
  blankMonth: 0 | null = 0
): { points: TimeSeriesPoint[]; droppedRows: number } {
  const buckets = new Map<string, Bucket>();
  let droppedRows = 0;

  for (const row of rows) {
    const date = parseDateValue(row[periodColumn]);
    if (!date) {
      droppedRows++;
      continue;
    }

    const period = floorToMonth(date);
    const bucket = buckets.get(period) ?? { sum: 0, numeric: false };
    const amount = toNumber(row[valueColumn]);
    if (amount !== null) {
      bucket.sum += amount;
      bucket.numeric = true;
    }
    buckets.set(period, bucket);
  }

  // YYYY-MM-DD sorts chronologically as text
  const points = [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([period, bucket]) => ({ period, value: bucket.numeric ? bucket.sum : blankMonth }));

  return { points, droppedRows };
}

/** Columns of a precomputed aggregate: ds/y when both exist, else the first two. */
export function precomputedColumns(dataset: TabularDataset): [string, string] | null {
  if (dataset.columns.includes('ds') && dataset.columns.includes('y')) {
    return ['ds', 'y'];
  }
  const [period, value] = dataset.columns;
  if (period === undefined || value === undefined) return null;
  return [period, value];
}

// ═══════════════════════════════════════════════════════════════
// SERIES
// ═══════════════════════════════════════════════════════════════

export function buildMonthlySeries(
  precomputed: TabularDataset | null,
  raw: TabularDataset | null,
  options: AggregatorOptions = {}
): Outcome<MonthlySeries> {
  const logger = options.logger ?? getRootLogger();
  const table = options.aliasTable ?? DEFAULT_ALIAS_TABLE;

  let source: SeriesSource;
  let rows: readonly DataRow[];
  let periodColumn: string;
  let valueColumn: string;

  if (precomputed) {
    const columns = precomputedColumns(precomputed);
    if (!columns) {
      logger.warn({ columns: precomputed.columns }, '[MonthlySeries] precomputed aggregate has fewer than two columns');
      return absent({ kind: 'SCHEMA_MISMATCH', missing: ['period', 'value'], available: [...precomputed.columns] });
    }
    source = 'precomputed';
    rows = precomputed.rows;
    [periodColumn, valueColumn] = columns;
  } else if (raw) {
    const resolved = requireColumns(raw, ['date', 'amount'], table);
    if (!resolved.ok) {
      logger.warn({ missing: resolved.absence.missing }, '[MonthlySeries] raw records lack date/amount columns');
      return resolved;
    }
    source = 'derived';
    rows = raw.rows;
    [periodColumn, valueColumn] = resolved.value;
  } else {
    return absent({ kind: 'NO_SOURCE', detail: 'No monthly aggregate or raw records available' });
  }

  const { points, droppedRows } = bucketByMonth(
    rows,
    periodColumn,
    valueColumn,
    source === 'precomputed' ? null : 0
  );

  if (droppedRows > 0) {
    logger.info({ source, droppedRows }, '[MonthlySeries] rows with unparsable dates dropped');
  }

  if (points.length === 0) {
    return absent({ kind: 'EMPTY_RESULT', detail: `No dated rows in ${source} data` });
  }

  return present({ source, points, periodColumn, valueColumn, droppedRows });
}

/** Option form: the points, or null for any absence. */
export function monthlySeries(
  precomputed: TabularDataset | null,
  raw: TabularDataset | null,
  options?: AggregatorOptions
): readonly TimeSeriesPoint[] | null {
  const outcome = buildMonthlySeries(precomputed, raw, options);
  return outcome.ok ? outcome.value.points : null;
}

/** Points whose period falls inside the inclusive range. Unparsable bounds are open. */
export function filterSeriesByRange(
  points: readonly TimeSeriesPoint[],
  range: DateRange
): TimeSeriesPoint[] {
  const from = normalizeDay(range.from);
  const to = normalizeDay(range.to);
  return points.filter((p) => (from === null || p.period >= from) && (to === null || p.period <= to));
}
