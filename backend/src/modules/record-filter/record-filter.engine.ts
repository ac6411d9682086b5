/**
 * RECORD FILTER ENGINE
 * ====================
 *
 * Conjunction of predicates over a dataset's rows.
 *
 * - every predicate is compiled to a row test, so evaluation order cannot
 *   change which rows survive
 * - a predicate on a column the dataset lacks is a no-op
 * - the input is never touched; rows keep their original order
 */

import {
  cellToString,
  columnValues,
  selectRows,
  toNumber,
  type DataRow,
  type TabularDataset,
} from '../artifacts/dataset.js';
import type { FilterPredicate, NumericBounds } from './record-filter.types.js';

type RowTest = (row: DataRow) => boolean;

function compile(predicate: FilterPredicate, columns: ReadonlySet<string>): RowTest | null {
  if (!columns.has(predicate.column)) return null;
  const { column } = predicate;

  switch (predicate.kind) {
    case 'equals': {
      const expected = cellToString(predicate.value);
      return (row) => cellToString(row[column]) === expected;
    }
    case 'range': {
      const { min, max } = predicate;
      return (row) => {
        const n = toNumber(row[column]);
        if (n === null) return false;
        return (min === null || n >= min) && (max === null || n <= max);
      };
    }
    case 'contains': {
      const needle = predicate.substring.trim().toLowerCase();
      if (!needle) return null;
      return (row) => {
        const cell = row[column];
        if (cell === null || cell === undefined) return false;
        return String(cell).toLowerCase().includes(needle);
      };
    }
  }
}

export function applyFilters(
  dataset: TabularDataset,
  predicates: readonly FilterPredicate[]
): TabularDataset {
  const columns = new Set(dataset.columns);
  const tests = predicates
    .map((p) => compile(p, columns))
    .filter((t): t is RowTest => t !== null);

  return selectRows(dataset, (row) => tests.every((test) => test(row)));
}

/** Distinct non-empty values of a column as sorted strings (select options). */
export function distinctValues(dataset: TabularDataset, column: string): string[] {
  const seen = new Set<string>();
  for (const cell of columnValues(dataset, column)) {
    const text = cellToString(cell);
    if (text) seen.add(text);
  }
  return [...seen].sort();
}

/** Min/max over a column's numeric cells, or null when it has none. */
export function numericExtent(dataset: TabularDataset, column: string): NumericBounds | null {
  let min = Infinity;
  let max = -Infinity;
  for (const cell of columnValues(dataset, column)) {
    const n = toNumber(cell);
    if (n === null) continue;
    if (n < min) min = n;
    if (n > max) max = n;
  }
  return min === Infinity ? null : { min, max };
}
