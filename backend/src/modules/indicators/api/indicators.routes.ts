/**
 * INDICATORS API ROUTES
 *
 * Read-only views over the data directory plus the derived-indicator builder.
 * Query strings and bodies are validated with zod; a failed parse is a
 * ValidationError, which the global error handler turns into a 400.
 */

import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../../common/errors.js';
import { getIndicatorIds } from '../data/indicator_sources.registry.js';
import { dataDirsExist } from '../reader/data_dirs.js';
import { correlationToCsv, costAdjustmentsToCsv, seriesToCsv } from '../services/csv_export.service.js';
import {
  buildCorrelationView,
  buildCostAdjustments,
  buildDerivedView,
  buildForecastView,
  buildIndicatorList,
  buildIndicatorView,
  type PipelineContext,
} from '../services/indicator_view.service.js';
import { parseDay } from '../utils/time.utils.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const IndicatorId = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, 'Indicator id may only contain letters, digits, "_" and "-"');

const ParamsSchema = z.object({ id: IndicatorId });

const ListQuery = z.object({
  category: z.enum(['market', 'cost']).optional(),
});

const ForecastQuery = z.object({
  horizon: z.coerce.number().int().min(1).max(120).optional(),
  window: z.coerce.number().int().min(2).max(600).optional(),
  method: z.enum(['linear', 'exponential']).optional(),
});

const IndicatorQuery = ForecastQuery.extend({
  period: z.enum(['LAST_6_MONTHS', 'LAST_12_MONTHS', 'LAST_24_MONTHS', 'ALL']).optional(),
  forecast: z.enum(['true', 'false']).optional(),
});

const DayString = z.string().transform((raw, ctx) => {
  const day = parseDay(raw);
  if (!day) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unrecognised date: ${raw}` });
    return z.NEVER;
  }
  return day;
});

const CorrelationQuery = z.object({
  ids: z
    .string()
    .transform((raw) => raw.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(IndicatorId).min(1))
    .optional(),
  from: DayString.optional(),
  to: DayString.optional(),
  minOverlap: z.coerce.number().int().min(2).optional(),
  resample: z.enum(['none', 'monthly']).optional(),
}).refine((q) => !q.from || !q.to || q.from.getTime() <= q.to.getTime(), {
  message: '"from" must not be after "to"',
  path: ['from'],
});

const DerivedBody = z.object({
  id: IndicatorId,
  displayName: z.string().min(1).max(120).optional(),
  unit: z.string().max(32).optional(),
  weights: z
    .record(IndicatorId, z.number().finite())
    .refine((w) => Object.keys(w).length > 0, 'At least one weight is required'),
});

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || what}: ${i.message}`);
    throw new ValidationError(`Invalid ${what}`, details);
  }
  return result.data;
}

function sendCsv(reply: FastifyReply, filename: string, body: string): FastifyReply {
  return reply
    .header('Content-Type', 'text/csv; charset=utf-8')
    .header('Content-Disposition', `attachment; filename="${filename}"`)
    .send(body);
}

// ═══════════════════════════════════════════════════════════════
// REGISTER ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerIndicatorRoutes(fastify: FastifyInstance, ctx: PipelineContext): Promise<void> {
  const prefix = '/api/indicators';

  // ─────────────────────────────────────────────────────────────
  // Health check
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/health`, async () => {
    return {
      ok: true,
      module: 'indicators',
      dataDir: ctx.dataDir,
      directories: dataDirsExist(ctx.dataDir),
      registered: getIndicatorIds().length,
      cachedFiles: ctx.cache?.size ?? 0,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET / — registry with load state and summary
  // ─────────────────────────────────────────────────────────────

  fastify.get(prefix, async (req) => {
    const { category } = parse(ListQuery, req.query, 'query');
    const indicators = buildIndicatorList(ctx, category);
    return { ok: true, count: indicators.length, indicators };
  });

  // ─────────────────────────────────────────────────────────────
  // Correlation
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/correlation`, async (req) => {
    const q = parse(CorrelationQuery, req.query, 'query');
    const view = buildCorrelationView(q.ids ?? getIndicatorIds(), ctx, {
      from: q.from,
      to: q.to,
      minOverlap: q.minOverlap,
      resample: q.resample,
    });
    return { ok: true, ...view };
  });

  fastify.get(`${prefix}/correlation/csv`, async (req, reply) => {
    const q = parse(CorrelationQuery, req.query, 'query');
    const view = buildCorrelationView(q.ids ?? getIndicatorIds(), ctx, {
      from: q.from,
      to: q.to,
      minOverlap: q.minOverlap,
      resample: q.resample,
    });
    return sendCsv(reply, 'correlation.csv', correlationToCsv(view.matrix));
  });

  // ─────────────────────────────────────────────────────────────
  // POST /derived — weighted composite of base indicators
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/derived`, async (req) => {
    const body = parse(DerivedBody, req.body, 'body');
    const view = buildDerivedView(body, ctx);
    if (view.state === 'NO_DATA') {
      return { ok: true, ...view };
    }

    const { indicator, summary, excluded } = view;
    return {
      ok: true,
      state: view.state,
      indicatorId: indicator.meta.indicatorId,
      meta: indicator.meta,
      synthetic: indicator.synthetic,
      dataSource: indicator.dataSource,
      summary,
      points: indicator.points,
      excluded,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // Cost adjustments — latest yearly adjustment per cost index
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/cost-adjustments`, async () => {
    const adjustments = buildCostAdjustments(ctx);
    return { ok: true, count: adjustments.length, adjustments };
  });

  fastify.get(`${prefix}/cost-adjustments/csv`, async (_req, reply) => {
    return sendCsv(reply, 'cost_adjustments.csv', costAdjustmentsToCsv(buildCostAdjustments(ctx)));
  });

  // ─────────────────────────────────────────────────────────────
  // Single indicator
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/:id`, async (req) => {
    const { id } = parse(ParamsSchema, req.params, 'path');
    const q = parse(IndicatorQuery, req.query, 'query');
    const view = buildIndicatorView(id, ctx, {
      period: q.period,
      includeForecast: q.forecast !== 'false',
      horizon: q.horizon,
      window: q.window,
      method: q.method,
    });
    return { ok: true, ...view };
  });

  fastify.get(`${prefix}/:id/forecast`, async (req) => {
    const { id } = parse(ParamsSchema, req.params, 'path');
    const q = parse(ForecastQuery, req.query, 'query');
    const { state, forecast } = buildForecastView(id, ctx, q);
    return { ok: true, indicatorId: id, state, forecast };
  });

  fastify.get(`${prefix}/:id/csv`, async (req, reply) => {
    const { id } = parse(ParamsSchema, req.params, 'path');
    const view = buildIndicatorView(id, ctx);
    if (view.state === 'NO_DATA') {
      throw new NotFoundError(view.reason);
    }
    return sendCsv(reply, `${id}.csv`, seriesToCsv({ name: id, points: view.points }, view.forecast));
  });
}
