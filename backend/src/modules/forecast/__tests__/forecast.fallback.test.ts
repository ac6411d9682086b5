/**
 * Fallback Forecast Tests
 */

import { describe, expect, it } from 'vitest';
import { fallbackForecast } from '../forecast.fallback.js';
import { monthRange } from '../../time-series/period.utils.js';

function series(start: string, values: Array<number | null>) {
  const periods = monthRange(start, values.length);
  return values.map((value, i) => ({ period: periods[i] ?? start, value }));
}

describe('fallbackForecast', () => {
  it('extrapolates the mean of the actuals with a ±5% band', () => {
    const actuals = [
      { period: '2024-01-01', value: 150 },
      { period: '2024-06-01', value: 30 },
    ];

    const outcome = fallbackForecast(actuals, 3);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.baseline).toBe(90);
    expect(outcome.value.window).toBe(2);
    expect(outcome.value.points.map((p) => p.period)).toEqual(['2024-07-01', '2024-08-01', '2024-09-01']);
    for (const point of outcome.value.points) {
      expect(point.pointEstimate).toBe(90);
      expect(point.lowerBound).toBeCloseTo(85.5, 10);
      expect(point.upperBound).toBeCloseTo(94.5, 10);
    }
  });

  it('averages only the trailing six values', () => {
    const outcome = fallbackForecast(series('2024-01-01', [10, 20, 30, 40, 50, 60, 70, 80]), 1);

    expect(outcome.ok && outcome.value.baseline).toBe(55);
    expect(outcome.ok && outcome.value.window).toBe(6);
  });

  it('skips null values but starts after the latest period', () => {
    const outcome = fallbackForecast(series('2024-01-01', [null, 10, null, 20, null]), 2);

    expect(outcome.ok && outcome.value.baseline).toBe(15);
    expect(outcome.ok && outcome.value.points.map((p) => p.period)).toEqual(['2024-06-01', '2024-07-01']);
  });

  it('starts after the latest period even when the series is unsorted', () => {
    const outcome = fallbackForecast(
      [
        { period: '2024-05-01', value: 1 },
        { period: '2024-02-01', value: 3 },
      ],
      1
    );

    expect(outcome.ok && outcome.value.points[0]?.period).toBe('2024-06-01');
  });

  it('rolls over the year boundary', () => {
    const outcome = fallbackForecast([{ period: '2024-11-01', value: 5 }], 3);

    expect(outcome.ok && outcome.value.points.map((p) => p.period)).toEqual([
      '2024-12-01',
      '2025-01-01',
      '2025-02-01',
    ]);
  });

  it('keeps lower <= point <= upper for a negative baseline', () => {
    const outcome = fallbackForecast([{ period: '2024-01-01', value: -100 }], 1);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    const [point] = outcome.value.points;
    expect(point?.lowerBound).toBeCloseTo(-105, 10);
    expect(point?.upperBound).toBeCloseTo(-95, 10);
  });

  it('holds the band and month sequence for any baseline and horizon', () => {
    const cases: Array<[number[], number]> = [
      [[1], 1],
      [[12.5, 7.25, 3], 5],
      [[1000, 2000, 3000, 4000, 5000, 6000, 7000], 12],
      [[0], 2],
    ];

    for (const [values, horizon] of cases) {
      const outcome = fallbackForecast(series('2023-06-01', values), horizon);
      expect(outcome.ok).toBe(true);
      if (!outcome.ok) continue;

      const { baseline, points } = outcome.value;
      expect(points).toHaveLength(horizon);
      expect(points.map((p) => p.period)).toEqual(monthRange(points[0]?.period ?? '', horizon));
      for (const p of points) {
        expect(p.pointEstimate).toBe(baseline);
        expect(p.lowerBound).toBeLessThanOrEqual(p.pointEstimate);
        expect(p.pointEstimate).toBeLessThanOrEqual(p.upperBound);
        expect(p.lowerBound).toBeCloseTo(baseline * 0.95, 8);
        expect(p.upperBound).toBeCloseTo(baseline * 1.05, 8);
      }
    }
  });

  it('honours a custom window and band', () => {
    const outcome = fallbackForecast(series('2024-01-01', [10, 20, 30]), 1, { window: 2, band: 0.1 });

    expect(outcome.ok && outcome.value.baseline).toBe(25);
    expect(outcome.ok && outcome.value.points[0]?.upperBound).toBeCloseTo(27.5, 10);
  });

  it('reports INSUFFICIENT_DATA for an empty series', () => {
    expect(fallbackForecast([], 3)).toEqual({
      ok: false,
      absence: { kind: 'INSUFFICIENT_DATA', detail: 'Cannot forecast from an empty series' },
    });
  });

  it('reports INSUFFICIENT_DATA when every value is null', () => {
    const outcome = fallbackForecast(series('2024-01-01', [null, null]), 3);
    expect(!outcome.ok && outcome.absence.kind).toBe('INSUFFICIENT_DATA');
  });

  it('rejects a horizon that is not a positive integer', () => {
    const actuals = series('2024-01-01', [1]);
    expect(() => fallbackForecast(actuals, 0)).toThrow(RangeError);
    expect(() => fallbackForecast(actuals, -2)).toThrow(RangeError);
    expect(() => fallbackForecast(actuals, 1.5)).toThrow(RangeError);
  });
});
