/**
 * GROUP AGGREGATOR
 *
 * Sales totals by category or by region. Same precedence as the monthly
 * series: a precomputed aggregate wins, raw records are the fallback.
 */

import { absent, present, type Outcome } from '../../common/outcome.js';
import { getRootLogger } from '../../common/logger.js';
import { cellToString, toNumber, type TabularDataset } from '../artifacts/dataset.js';
import { requireColumns, resolveColumn } from '../schema/schema.resolver.js';
import { DEFAULT_ALIAS_TABLE } from '../schema/schema.aliases.js';
import type { AggregatorOptions } from './monthly.aggregator.js';
import type { GroupDimension, GroupTotal, GroupTotals } from './time-series.types.js';

function fromPrecomputed(
  dataset: TabularDataset,
  dimension: GroupDimension,
  options: AggregatorOptions
): Outcome<GroupTotals> {
  const table = options.aliasTable ?? DEFAULT_ALIAS_TABLE;
  const keyColumn = resolveColumn(dataset, dimension, table) ?? dataset.columns[0];
  const valueColumn =
    resolveColumn(dataset, 'amount', table) ?? dataset.columns.find((c) => c !== keyColumn);

  if (keyColumn === undefined || valueColumn === undefined || keyColumn === valueColumn) {
    return absent({ kind: 'SCHEMA_MISMATCH', missing: [dimension, 'amount'], available: [...dataset.columns] });
  }

  // Aggregate order is kept as written
  const rows: GroupTotal[] = [];
  for (const row of dataset.rows) {
    const key = cellToString(row[keyColumn]);
    if (!key) continue;
    rows.push({ key, total: toNumber(row[valueColumn]) });
  }

  return present({ source: 'precomputed', dimension, keyColumn, valueColumn, rows });
}

function fromRaw(
  dataset: TabularDataset,
  dimension: GroupDimension,
  options: AggregatorOptions
): Outcome<GroupTotals> {
  const resolved = requireColumns(dataset, [dimension, 'amount'], options.aliasTable);
  if (!resolved.ok) return resolved;
  const [keyColumn, valueColumn] = resolved.value;

  // A key with no numeric amount sums to 0
  const sums = new Map<string, number>();
  for (const row of dataset.rows) {
    const key = cellToString(row[keyColumn]);
    if (!key) continue;
    sums.set(key, (sums.get(key) ?? 0) + (toNumber(row[valueColumn]) ?? 0));
  }

  const rows = [...sums.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, total]) => ({ key, total }));

  return present({ source: 'derived', dimension, keyColumn, valueColumn, rows });
}

export function buildGroupTotals(
  precomputed: TabularDataset | null,
  raw: TabularDataset | null,
  dimension: GroupDimension,
  options: AggregatorOptions = {}
): Outcome<GroupTotals> {
  const logger = options.logger ?? getRootLogger();

  let outcome: Outcome<GroupTotals>;
  if (precomputed) {
    outcome = fromPrecomputed(precomputed, dimension, options);
  } else if (raw) {
    outcome = fromRaw(raw, dimension, options);
  } else {
    return absent({ kind: 'NO_SOURCE', detail: `No ${dimension} aggregate or raw records available` });
  }

  if (!outcome.ok) {
    logger.warn({ dimension, absence: outcome.absence }, '[GroupTotals] totals unavailable');
    return outcome;
  }
  if (outcome.value.rows.length === 0) {
    return absent({ kind: 'EMPTY_RESULT', detail: `No ${dimension} rows with a key` });
  }
  return outcome;
}
