/**
 * INSIGHTS ROUTES: HTTP Endpoints
 * ================================
 *
 *   GET  /api/insights/files
 *   GET  /api/insights/overview
 *   GET  /api/insights/customers?segment=&recencyMin=&recencyMax=&salesMin=&salesMax=&customerId=
 *   GET  /api/insights/profiles
 *   GET  /api/insights/breakdown/:dimension?pick=
 *   GET  /api/insights/monthly?from=&to=
 *   GET  /api/insights/forecast?horizon=
 *   POST /api/insights/reload
 *
 * Missing data answers 200 { ok: false, error: <absence kind> }; only bad
 * input is an HTTP error.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import { describeAbsence, type Outcome } from '../../common/outcome.js';
import { normalizeDay } from '../time-series/period.utils.js';
import type { InsightsService } from './insights.service.js';

export interface InsightsRoutesOptions {
  service: InsightsService;
  defaultHorizon: number;
  maxHorizon: number;
}

const optionalNumber = z.coerce.number().finite().optional();

const optionalDay = z
  .string()
  .optional()
  .refine((v) => v === undefined || normalizeDay(v) !== null, { message: 'not a recognisable date' });

const CustomersQuery = z.object({
  segment: z.string().optional(),
  recencyMin: optionalNumber,
  recencyMax: optionalNumber,
  salesMin: optionalNumber,
  salesMax: optionalNumber,
  customerId: z.string().optional(),
});

const BreakdownParams = z.object({
  dimension: z.enum(['category', 'region']),
});

const BreakdownQuery = z.object({
  pick: z.string().optional(),
});

const MonthlyQuery = z.object({
  from: optionalDay,
  to: optionalDay,
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; '),
      parsed.error.issues
    );
  }
  return parsed.data;
}

function toBody<T>(outcome: Outcome<T>) {
  if (outcome.ok) {
    return { ok: true as const, data: outcome.value };
  }
  return {
    ok: false as const,
    error: outcome.absence.kind,
    message: describeAbsence(outcome.absence),
    absence: outcome.absence,
  };
}

export async function registerInsightsRoutes(
  app: FastifyInstance,
  opts: InsightsRoutesOptions
): Promise<void> {
  const { service } = opts;

  const ForecastQuery = z.object({
    horizon: z.coerce.number().int().min(1).max(opts.maxHorizon).default(opts.defaultHorizon),
  });

  app.get('/files', async () => ({ ok: true, data: service.files() }));

  app.get('/overview', async () => ({ ok: true, data: service.overview() }));

  app.get('/customers', async (request) => {
    const q = parseOrThrow(CustomersQuery, request.query);
    return toBody(
      service.customers({
        segment: q.segment,
        recency: { min: q.recencyMin ?? null, max: q.recencyMax ?? null },
        sales: { min: q.salesMin ?? null, max: q.salesMax ?? null },
        customerId: q.customerId,
      })
    );
  });

  app.get('/profiles', async () => toBody(service.profiles()));

  app.get('/breakdown/:dimension', async (request) => {
    const { dimension } = parseOrThrow(BreakdownParams, request.params);
    const { pick } = parseOrThrow(BreakdownQuery, request.query);
    return toBody(service.breakdown(dimension, pick));
  });

  app.get('/monthly', async (request) => {
    const range = parseOrThrow(MonthlyQuery, request.query);
    return toBody(service.monthly(range));
  });

  app.get('/forecast', async (request) => {
    const { horizon } = parseOrThrow(ForecastQuery, request.query);
    const view = service.forecast(horizon);

    // The one reported failure: a fallback was needed but had nothing to average
    const insufficient =
      view.forecast.source === 'none'
        ? view.forecast.reasons.find((r) => r.kind === 'INSUFFICIENT_DATA')
        : undefined;
    if (insufficient) {
      return {
        ok: false,
        error: insufficient.kind,
        message: describeAbsence(insufficient),
        data: view,
      };
    }
    return { ok: true, data: view };
  });

  app.post('/reload', async () => ({ ok: true, data: service.reload() }));

  app.log.info('[Insights] Routes registered');
}
