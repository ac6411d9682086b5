/**
 * RECORD FILTER TYPES
 */

import type { CellValue } from '../artifacts/dataset.js';

export type FilterPredicate =
  | { kind: 'equals'; column: string; value: CellValue }
  | { kind: 'range'; column: string; min: number | null; max: number | null }   // inclusive, null = open
  | { kind: 'contains'; column: string; substring: string };                    // case-insensitive

export interface NumericBounds {
  min: number | null;
  max: number | null;
}

/** Customer explorer inputs; each one maps to a concept, not a column. */
export interface ExplorerCriteria {
  segment?: string;                 // 'All' means no segment filter
  recency?: NumericBounds;
  sales?: NumericBounds;
  customerId?: string;
}

export const equals = (column: string, value: CellValue): FilterPredicate => ({ kind: 'equals', column, value });

export const range = (column: string, min: number | null, max: number | null): FilterPredicate => ({
  kind: 'range',
  column,
  min,
  max,
});

export const contains = (column: string, substring: string): FilterPredicate => ({
  kind: 'contains',
  column,
  substring,
});
