/**
 * TABULAR DATASET
 * ===============
 *
 * In-memory table loaded from a CSV artifact.
 * Columns keep their source order; rows are records keyed by column name.
 * Datasets are frozen: every transformation builds a new one.
 */

export type CellValue = string | number | null;

export type DataRow = Readonly<Record<string, CellValue>>;

export interface TabularDataset {
  readonly columns: readonly string[];
  readonly rows: readonly DataRow[];
}

// Markers loaded as null
const NA_MARKERS = new Set(['', 'NA', 'N/A', 'n/a', 'NaN', 'nan', 'null', 'NULL', '#N/A']);

const NUMERIC_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function createDataset(
  columns: readonly string[],
  rows: readonly Record<string, CellValue>[]
): TabularDataset {
  return Object.freeze({
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows.map((row) => Object.freeze({ ...row }))),
  });
}

/**
 * Typed value of a raw CSV cell: null for NA markers, number for numeric
 * text, the untouched text otherwise. Integers beyond 2^53 (long ids) stay
 * text so no digit is lost.
 */
export function coerceCell(raw: string): CellValue {
  const trimmed = raw.trim();
  if (NA_MARKERS.has(trimmed)) return null;
  if (NUMERIC_RE.test(trimmed)) {
    const n = Number(trimmed);
    if (Number.isInteger(n) && !Number.isSafeInteger(n)) return raw;
    if (Number.isFinite(n)) return n;
  }
  return raw;
}

export function toNumber(cell: CellValue | undefined): number | null {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell === 'string') {
    const trimmed = cell.trim();
    if (!NUMERIC_RE.test(trimmed)) return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function cellToString(cell: CellValue | undefined): string {
  if (cell === null || cell === undefined) return '';
  return String(cell).trim();
}

export function hasColumn(dataset: TabularDataset, column: string): boolean {
  return dataset.columns.includes(column);
}

export function columnValues(dataset: TabularDataset, column: string): CellValue[] {
  return dataset.rows.map((row) => row[column] ?? null);
}

/** Keep the rows `keep` accepts, in order; column layout unchanged. */
export function selectRows(
  dataset: TabularDataset,
  keep: (row: DataRow, index: number) => boolean
): TabularDataset {
  return createDataset(dataset.columns, dataset.rows.filter(keep));
}

/** New dataset with one column's cells rewritten. Unknown column → same content. */
export function mapColumn(
  dataset: TabularDataset,
  column: string,
  fn: (cell: CellValue) => CellValue
): TabularDataset {
  if (!hasColumn(dataset, column)) return dataset;
  return createDataset(
    dataset.columns,
    dataset.rows.map((row) => ({ ...row, [column]: fn(row[column] ?? null) }))
  );
}
