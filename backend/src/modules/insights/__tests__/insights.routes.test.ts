/**
 * Insights Routes Tests
 *
 * Full app over a temporary artifact tree, exercised with inject().
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildApp } from '../../../app.js';
import { loadEnv } from '../../../config/env.js';
import { ArtifactCache } from '../../artifacts/artifact.cache.js';

function createMockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const CUSTOMER_SEGMENTS = [
  'customer_id,segment,recency_days,total_sales,order_count,last_order',
  'C1,A,5,100,2,2024-01-05',
  'C2,A,20,250.5,3,01/15/2024',
  'C3,B,30,80,1,',
  'C4,A,60,40,1,2024-06-11',
].join('\n');

const RAW_ORDERS = [
  'Order Date,Sales,Category,Region',
  '2024-01-05,100,Furniture,West',
  '2024-01-20,50,Technology,East',
  '2024-06-11,30,Furniture,East',
].join('\n');

describe('Insights routes', () => {
  let base: string;
  let cache: ArtifactCache;
  let app: FastifyInstance;

  function writeArtifact(relative: string, content: string): void {
    const file = path.join(base, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  beforeEach(() => {
    base = fs.mkdtempSync(path.join(os.tmpdir(), 'insights-routes-'));
    writeArtifact('outputs/customer_segments.csv', CUSTOMER_SEGMENTS);
    writeArtifact('data/train.csv', RAW_ORDERS);

    cache = new ArtifactCache({ logger: createMockLogger() });
    const env = loadEnv({ INSIGHTS_BASE_DIR: base, LOG_LEVEL: 'silent', NODE_ENV: 'test' });
    app = buildApp({ env, cache });
  });

  afterEach(async () => {
    await app.close();
    fs.rmSync(base, { recursive: true, force: true });
  });

  it('GET /api/health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json().ok).toBe(true);
  });

  it('GET /files lists every artifact with its status', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/files' });
    const body = res.json();

    expect(body.ok).toBe(true);
    expect(body.data).toHaveLength(7);
    expect(body.data.find((f: { key: string }) => f.key === 'rawOrders').exists).toBe(true);
    expect(body.data.find((f: { key: string }) => f.key === 'externalForecast').exists).toBe(false);
  });

  it('GET /overview summarizes customers', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/overview' });

    expect(res.json()).toEqual({
      ok: true,
      data: {
        customers: 4,
        totalSales: 470.5,
        totalOrders: 7,
        segmentShare: {
          ok: true,
          value: [
            { segment: 'A', customers: 3 },
            { segment: 'B', customers: 1 },
          ],
        },
      },
    });
  });

  it('GET /customers filters and normalizes last order dates', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/insights/customers?segment=A&recencyMin=10&recencyMax=50',
    });
    const body = res.json();

    expect(body.ok).toBe(true);
    expect(body.data.total).toBe(4);
    expect(body.data.matched).toBe(1);
    expect(body.data.rows).toEqual([
      {
        customer_id: 'C2',
        segment: 'A',
        recency_days: 20,
        total_sales: 250.5,
        order_count: 3,
        last_order: '2024-01-15',
      },
    ]);
    expect(body.data.options).toEqual({
      segments: ['A', 'B'],
      recency: { min: 5, max: 60 },
      sales: { min: 40, max: 250.5 },
    });
  });

  it('GET /customers rejects a non-numeric bound', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/customers?recencyMin=abc' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('GET /profiles reports a missing artifact without failing', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/profiles' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.ok).toBe(false);
    expect(body.error).toBe('MISSING_ARTIFACT');
  });

  it('GET /breakdown/category derives totals from raw orders', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/breakdown/category' });

    expect(res.json().data).toEqual({
      source: 'derived',
      dimension: 'category',
      keyColumn: 'Category',
      valueColumn: 'Sales',
      rows: [
        { key: 'Furniture', total: 130 },
        { key: 'Technology', total: 50 },
      ],
      options: ['Furniture', 'Technology'],
    });
  });

  it('GET /breakdown/region narrows to the picked key', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/breakdown/region?pick=West' });
    const body = res.json();

    expect(body.data.rows).toEqual([{ key: 'West', total: 100 }]);
    expect(body.data.options).toEqual(['East', 'West']);
  });

  it('GET /breakdown rejects an unknown dimension', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/breakdown/segment' });
    expect(res.statusCode).toBe(400);
  });

  it('GET /monthly returns the series and its span', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/monthly?from=2024-02-01' });

    expect(res.json()).toEqual({
      ok: true,
      data: {
        source: 'derived',
        points: [{ period: '2024-06-01', value: 30 }],
        bounds: { first: '2024-01-01', last: '2024-06-01' },
      },
    });
  });

  it('GET /monthly rejects an unrecognisable date', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/monthly?to=later' });
    expect(res.statusCode).toBe(400);
  });

  it('GET /forecast falls back to the trailing mean', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/forecast' });
    const body = res.json();

    expect(body.ok).toBe(true);
    expect(body.data.horizon).toBe(3);
    expect(body.data.forecast.source).toBe('fallback');
    expect(body.data.forecast.baseline).toBe(90);
    expect(body.data.forecast.externalAbsence.kind).toBe('NO_SOURCE');
    expect(body.data.forecast.points.map((p: { period: string }) => p.period)).toEqual([
      '2024-07-01',
      '2024-08-01',
      '2024-09-01',
    ]);
  });

  it('GET /forecast prefers a valid external forecast', async () => {
    writeArtifact(
      'outputs/forecast_prophet.csv',
      'ds,yhat,yhat_lower,yhat_upper\n2024-07-01,100,90,110\n'
    );

    const res = await app.inject({ method: 'GET', url: '/api/insights/forecast?horizon=2' });

    expect(res.json().data.forecast).toEqual({
      source: 'external',
      points: [{ period: '2024-07-01', pointEstimate: 100, lowerBound: 90, upperBound: 110 }],
    });
  });

  it('GET /forecast reports INSUFFICIENT_DATA when the history has no values', async () => {
    writeArtifact('outputs/sales_by_month.csv', 'ds,y\n2024-01-01,n/a\n');

    const res = await app.inject({ method: 'GET', url: '/api/insights/forecast' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.ok).toBe(false);
    expect(body.error).toBe('INSUFFICIENT_DATA');
    expect(body.data.forecast.source).toBe('none');
  });

  it('GET /forecast rejects a horizon above the maximum', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/forecast?horizon=13' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('serves repeated reads from the cache and POST /reload clears it', async () => {
    await app.inject({ method: 'GET', url: '/api/insights/monthly' });
    await app.inject({ method: 'GET', url: '/api/insights/monthly' });
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1, generation: 0 });

    const res = await app.inject({ method: 'POST', url: '/api/insights/reload' });

    expect(res.json()).toEqual({ ok: true, data: { generation: 1 } });
    expect(cache.stats().entries).toBe(0);
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/insights/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('NOT_FOUND');
  });
});
