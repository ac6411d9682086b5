/**
 * SCHEMA ALIASES
 * ==============
 *
 * Concept → accepted column names. Pure data; bump the version whenever an
 * alias is added or reordered so resolved layouts can be traced back.
 */

export type Concept =
  | 'date'
  | 'amount'
  | 'category'
  | 'region'
  | 'segment'
  | 'customer_id'
  // customer views
  | 'recency'
  | 'order_count'
  | 'last_order';

export const CONCEPTS: readonly Concept[] = [
  'date',
  'amount',
  'category',
  'region',
  'segment',
  'customer_id',
  'recency',
  'order_count',
  'last_order',
];

export interface AliasTable {
  version: string;
  aliases: Readonly<Record<Concept, readonly string[]>>;
}

export const DEFAULT_ALIAS_TABLE: AliasTable = Object.freeze({
  version: 'v1',
  aliases: Object.freeze({
    date: ['order date', 'order_date', 'date'],
    amount: ['sales', 'revenue', 'amount', 'total_sales'],
    category: ['category'],
    region: ['region'],
    segment: ['segment', 'label'],
    customer_id: ['customer_id', 'customer id', 'id'],
    recency: ['recency_days', 'recency', 'days_since'],
    order_count: ['order_count', 'orders'],
    last_order: ['last_order', 'last order', 'order_date', 'order date'],
  }),
});

export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase();
}

export function isConcept(value: string): value is Concept {
  return CONCEPTS.some((c) => c === value);
}
