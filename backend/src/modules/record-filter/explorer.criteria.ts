/**
 * Explorer criteria → predicates
 *
 * Columns are found through the schema resolver, so the same criteria work
 * on "Segment", "label", "Recency_Days", ... An unresolved concept simply
 * contributes no predicate.
 */

import type { TabularDataset } from '../artifacts/dataset.js';
import { resolveColumn } from '../schema/schema.resolver.js';
import { DEFAULT_ALIAS_TABLE, type AliasTable } from '../schema/schema.aliases.js';
import { contains, equals, range, type ExplorerCriteria, type FilterPredicate, type NumericBounds } from './record-filter.types.js';

export const ALL_SEGMENTS = 'All';

function hasBound(bounds: NumericBounds | undefined): bounds is NumericBounds {
  return bounds !== undefined && (bounds.min !== null || bounds.max !== null);
}

export function buildExplorerPredicates(
  dataset: TabularDataset,
  criteria: ExplorerCriteria,
  table: AliasTable = DEFAULT_ALIAS_TABLE
): FilterPredicate[] {
  const predicates: FilterPredicate[] = [];

  const segmentCol = resolveColumn(dataset, 'segment', table);
  if (segmentCol && criteria.segment && criteria.segment !== ALL_SEGMENTS) {
    predicates.push(equals(segmentCol, criteria.segment));
  }

  const recencyCol = resolveColumn(dataset, 'recency', table);
  if (recencyCol && hasBound(criteria.recency)) {
    predicates.push(range(recencyCol, criteria.recency.min, criteria.recency.max));
  }

  const salesCol = resolveColumn(dataset, 'amount', table);
  if (salesCol && hasBound(criteria.sales)) {
    predicates.push(range(salesCol, criteria.sales.min, criteria.sales.max));
  }

  const idCol = resolveColumn(dataset, 'customer_id', table);
  const search = criteria.customerId?.trim();
  if (idCol && search) {
    predicates.push(contains(idCol, search));
  }

  return predicates;
}
