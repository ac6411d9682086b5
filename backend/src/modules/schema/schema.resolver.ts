/**
 * SCHEMA RESOLVER
 *
 * Finds the column standing for a concept. Looks at column names only,
 * in dataset order; first alias hit wins.
 */

import { absent, present, type Absence, type Outcome } from '../../common/outcome.js';
import type { TabularDataset } from '../artifacts/dataset.js';
import {
  DEFAULT_ALIAS_TABLE,
  normalizeColumnName,
  type AliasTable,
  type Concept,
} from './schema.aliases.js';

type ColumnSource = Pick<TabularDataset, 'columns'> | readonly string[];

export type SchemaMismatch = Extract<Absence, { kind: 'SCHEMA_MISMATCH' }>;

const aliasSets = new WeakMap<AliasTable, Map<Concept, ReadonlySet<string>>>();

function aliasSetFor(table: AliasTable, concept: Concept): ReadonlySet<string> {
  let sets = aliasSets.get(table);
  if (!sets) {
    sets = new Map();
    aliasSets.set(table, sets);
  }
  let set = sets.get(concept);
  if (!set) {
    set = new Set(table.aliases[concept].map(normalizeColumnName));
    sets.set(concept, set);
  }
  return set;
}

function columnsOf(source: ColumnSource): readonly string[] {
  return 'columns' in source ? source.columns : source;
}

export function resolveColumn(
  source: ColumnSource,
  concept: Concept,
  table: AliasTable = DEFAULT_ALIAS_TABLE
): string | null {
  const accepted = aliasSetFor(table, concept);
  for (const column of columnsOf(source)) {
    if (accepted.has(normalizeColumnName(column))) {
      return column;
    }
  }
  return null;
}

/**
 * Resolve several concepts at once; columns come back in concept order.
 * Any miss → SCHEMA_MISMATCH naming every unresolved concept.
 */
export function requireColumns(
  source: ColumnSource,
  concepts: readonly Concept[],
  table: AliasTable = DEFAULT_ALIAS_TABLE
): Outcome<string[], SchemaMismatch> {
  const columns: string[] = [];
  const missing: Concept[] = [];

  for (const concept of concepts) {
    const column = resolveColumn(source, concept, table);
    if (column === null) {
      missing.push(concept);
    } else {
      columns.push(column);
    }
  }

  if (missing.length > 0) {
    return absent({ kind: 'SCHEMA_MISMATCH', missing, available: [...columnsOf(source)] });
  }
  return present(columns);
}
