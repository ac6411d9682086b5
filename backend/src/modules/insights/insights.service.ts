/**
 * INSIGHTS SERVICE
 * ================
 *
 * Composes the core into the dashboard views. Every artifact read goes
 * through the shared ArtifactCache; reload() is the only way to drop it.
 */

import { absent, present, type Outcome } from '../../common/outcome.js';
import { getRootLogger, type Logger } from '../../common/logger.js';
import {
  cellToString,
  describeArtifacts,
  mapColumn,
  toNumber,
  type ArtifactCache,
  type ArtifactCatalog,
  type ArtifactKey,
  type ArtifactStatus,
  type TabularDataset,
} from '../artifacts/index.js';
import { DEFAULT_ALIAS_TABLE, resolveColumn, type AliasTable } from '../schema/index.js';
import {
  buildGroupTotals,
  buildMonthlySeries,
  filterSeriesByRange,
  formatDay,
  parseDateValue,
  type DateRange,
  type GroupDimension,
} from '../time-series/index.js';
import { reconcileForecast } from '../forecast/index.js';
import {
  applyFilters,
  buildExplorerPredicates,
  distinctValues,
  numericExtent,
  type ExplorerCriteria,
} from '../record-filter/index.js';
import type {
  BreakdownView,
  CustomerView,
  ForecastView,
  MonthlyView,
  OverviewSummary,
  SegmentShare,
} from './insights.types.js';

export interface InsightsServiceDeps {
  cache: ArtifactCache;
  catalog: ArtifactCatalog;
  logger?: Logger;
  aliasTable?: AliasTable;
}

function sumColumn(dataset: TabularDataset, column: string | null): number | null {
  if (!column) return null;
  return dataset.rows.reduce((acc, row) => acc + (toNumber(row[column]) ?? 0), 0);
}

export class InsightsService {
  private readonly cache: ArtifactCache;
  private readonly catalog: ArtifactCatalog;
  private readonly logger: Logger;
  private readonly aliasTable: AliasTable;

  constructor(deps: InsightsServiceDeps) {
    this.cache = deps.cache;
    this.catalog = deps.catalog;
    this.logger = deps.logger ?? getRootLogger();
    this.aliasTable = deps.aliasTable ?? DEFAULT_ALIAS_TABLE;
  }

  private read(key: ArtifactKey): Outcome<TabularDataset> {
    return this.cache.getOrLoad(this.catalog[key].path);
  }

  private dataset(key: ArtifactKey): TabularDataset | null {
    const outcome = this.read(key);
    return outcome.ok ? outcome.value : null;
  }

  files(): ArtifactStatus[] {
    return describeArtifacts(this.catalog);
  }

  // ═══════════════════════════════════════════════════════════════
  // OVERVIEW
  // ═══════════════════════════════════════════════════════════════

  overview(): OverviewSummary {
    const customers = this.read('customerSegments');
    if (!customers.ok) {
      return { customers: null, totalSales: null, totalOrders: null, segmentShare: customers };
    }

    const cust = customers.value;
    return {
      customers: cust.rows.length,
      totalSales: sumColumn(cust, resolveColumn(cust, 'amount', this.aliasTable)),
      totalOrders: sumColumn(cust, resolveColumn(cust, 'order_count', this.aliasTable)),
      segmentShare: this.segmentShare(cust),
    };
  }

  private segmentShare(cust: TabularDataset): Outcome<SegmentShare[]> {
    const segmentCol = resolveColumn(cust, 'segment', this.aliasTable);
    if (!segmentCol) {
      return absent({ kind: 'SCHEMA_MISMATCH', missing: ['segment'], available: [...cust.columns] });
    }

    const counts = new Map<string, number>();
    for (const row of cust.rows) {
      const segment = cellToString(row[segmentCol]);
      if (!segment) continue;
      counts.set(segment, (counts.get(segment) ?? 0) + 1);
    }

    return present(
      [...counts.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([segment, n]) => ({ segment, customers: n }))
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // CUSTOMERS / PROFILES
  // ═══════════════════════════════════════════════════════════════

  customers(criteria: ExplorerCriteria = {}): Outcome<CustomerView> {
    const customers = this.read('customerSegments');
    if (!customers.ok) return customers;

    const cust = customers.value;
    const table = this.aliasTable;
    const segmentCol = resolveColumn(cust, 'segment', table);
    const recencyCol = resolveColumn(cust, 'recency', table);
    const salesCol = resolveColumn(cust, 'amount', table);
    const lastOrderCol = resolveColumn(cust, 'last_order', table);

    const filters = buildExplorerPredicates(cust, criteria, table);
    let filtered = applyFilters(cust, filters);

    if (lastOrderCol) {
      filtered = mapColumn(filtered, lastOrderCol, (cell) => {
        const date = parseDateValue(cell);
        return date ? formatDay(date) : null;
      });
    }

    this.logger.debug?.(
      { filters: filters.length, total: cust.rows.length, matched: filtered.rows.length },
      '[Insights] customer filters applied'
    );

    return present({
      columns: filtered.columns,
      rows: filtered.rows,
      total: cust.rows.length,
      matched: filtered.rows.length,
      filters,
      options: {
        segments: segmentCol ? distinctValues(cust, segmentCol) : [],
        recency: recencyCol ? numericExtent(cust, recencyCol) : null,
        sales: salesCol ? numericExtent(cust, salesCol) : null,
      },
    });
  }

  /** Segment profile table, passed through as loaded. */
  profiles(): Outcome<TabularDataset> {
    return this.read('segmentProfile');
  }

  // ═══════════════════════════════════════════════════════════════
  // EXPLORATORY VIEWS
  // ═══════════════════════════════════════════════════════════════

  breakdown(dimension: GroupDimension, pick?: string): Outcome<BreakdownView> {
    const aggregateKey: ArtifactKey = dimension === 'category' ? 'categoryAggregate' : 'regionAggregate';
    const totals = buildGroupTotals(this.dataset(aggregateKey), this.dataset('rawOrders'), dimension, {
      aliasTable: this.aliasTable,
      logger: this.logger,
    });
    if (!totals.ok) return totals;

    const options = totals.value.rows.map((r) => r.key);
    const rows = pick && pick !== 'All' ? totals.value.rows.filter((r) => r.key === pick) : totals.value.rows;
    return present({ ...totals.value, rows, options });
  }

  monthly(range: DateRange = {}): Outcome<MonthlyView> {
    const series = this.actuals();
    if (!series.ok) return series;

    const { source, points } = series.value;
    const first = points[0];
    const last = points[points.length - 1];
    if (first === undefined || last === undefined) {
      return absent({ kind: 'EMPTY_RESULT', detail: 'Monthly series is empty' });
    }

    return present({
      source,
      points: filterSeriesByRange(points, range),
      bounds: { first: first.period, last: last.period },
    });
  }

  forecast(horizon: number): ForecastView {
    const actuals = this.actuals();
    const forecast = reconcileForecast({
      external: this.dataset('externalForecast'),
      actuals: actuals.ok ? actuals.value.points : null,
      horizon,
      logger: this.logger,
    });

    return {
      horizon,
      actuals: actuals.ok ? present(actuals.value.points) : actuals,
      forecast,
    };
  }

  private actuals() {
    return buildMonthlySeries(this.dataset('monthlyAggregate'), this.dataset('rawOrders'), {
      aliasTable: this.aliasTable,
      logger: this.logger,
    });
  }

  // ═══════════════════════════════════════════════════════════════
  // CONTROL
  // ═══════════════════════════════════════════════════════════════

  reload(): { generation: number } {
    const generation = this.cache.invalidateAll();
    this.logger.info({ generation }, '[Insights] artifacts reloaded');
    return { generation };
  }
}
