/**
 * INDICATOR VIEW SERVICE
 *
 * Per-request pipeline: load -> transform -> forecast -> correlate.
 * Holds no state of its own; the only thing shared between requests is the
 * read-only file cache passed in through the context.
 */

import type { Logger } from '../../../common/logger.js';
import type {
  ChartPoint,
  CorrelationMatrix,
  CorrelationOptions,
  CorrelationPair,
  CostAdjustment,
  ForecastOptions,
  ForecastSegment,
  Indicator,
  IndicatorLoadResult,
  IndicatorMeta,
  IndicatorSummary,
  SeriesPoint,
  TimePeriod,
} from '../contracts/indicator.contracts.js';
import {
  getIndicatorIds,
  resolveIndicatorSpec,
  type IndicatorCategory,
} from '../data/indicator_sources.registry.js';
import { loadIndicator, type IndicatorFileCache } from '../reader/indicator_file.reader.js';
import { computeCorrelationMatrix, topCorrelations } from './correlation.service.js';
import { appendForecast, resolveForecast } from './forecast.service.js';
import { summarizeIndicator } from './indicator_summary.service.js';
import { computeDerivedIndicator, filterTimePeriod, type WeightScheme } from './series_transform.service.js';

export interface PipelineContext {
  dataDir: string;
  now: () => Date;
  cache: IndicatorFileCache | null;
  logger: Logger;
  sampleMonths: number;
  forecast: ForecastOptions;
  minOverlap: number;
}

function load(indicatorId: string, ctx: PipelineContext): IndicatorLoadResult {
  return loadIndicator(indicatorId, {
    dataDir: ctx.dataDir,
    now: ctx.now(),
    sampleMonths: ctx.sampleMonths,
    cache: ctx.cache,
    logger: ctx.logger,
  });
}

function forecastFor(
  indicator: Indicator,
  ctx: PipelineContext,
  opts: Partial<ForecastOptions> = {},
): ForecastSegment {
  return resolveForecast(indicator, {
    horizon: opts.horizon ?? ctx.forecast.horizon,
    window: opts.window ?? ctx.forecast.window,
    method: opts.method ?? ctx.forecast.method,
    dataDir: ctx.dataDir,
    now: ctx.now(),
    cache: ctx.cache,
    logger: ctx.logger,
  });
}

// ═══════════════════════════════════════════════════════════════
// SINGLE INDICATOR
// ═══════════════════════════════════════════════════════════════

export interface IndicatorViewOptions extends Partial<ForecastOptions> {
  period?: TimePeriod;
  includeForecast?: boolean;
}

export type IndicatorView =
  | {
      state: 'LOADED' | 'PLACEHOLDER';
      indicatorId: string;
      meta: IndicatorMeta;
      synthetic: boolean;
      dataSource: string;
      skippedRows: number;
      summary: IndicatorSummary;
      points: SeriesPoint[];
      forecast: ForecastSegment | null;
      chart: ChartPoint[];
    }
  | { state: 'NO_DATA'; indicatorId: string; reason: string };

export function buildIndicatorView(
  indicatorId: string,
  ctx: PipelineContext,
  opts: IndicatorViewOptions = {},
): IndicatorView {
  const loaded = load(indicatorId, ctx);
  if (loaded.state === 'NO_DATA') {
    return { state: 'NO_DATA', indicatorId, reason: loaded.reason };
  }

  const { indicator } = loaded;
  const { period, includeForecast, ...forecastOpts } = opts;
  const forecast = includeForecast === false ? null : forecastFor(indicator, ctx, forecastOpts);
  const points = filterTimePeriod(indicator.points, period ?? 'ALL');

  return {
    state: loaded.state,
    indicatorId,
    meta: indicator.meta,
    synthetic: indicator.synthetic,
    dataSource: indicator.dataSource,
    skippedRows: indicator.skippedRows,
    summary: summarizeIndicator(indicator, forecast),
    points,
    forecast,
    chart: appendForecast({ name: indicator.name, points }, forecast),
  };
}

export function buildForecastView(
  indicatorId: string,
  ctx: PipelineContext,
  opts: Partial<ForecastOptions> = {},
): { state: IndicatorLoadResult['state']; forecast: ForecastSegment | null } {
  const loaded = load(indicatorId, ctx);
  if (loaded.state === 'NO_DATA') return { state: loaded.state, forecast: null };
  return { state: loaded.state, forecast: forecastFor(loaded.indicator, ctx, opts) };
}

// ═══════════════════════════════════════════════════════════════
// LIST
// ═══════════════════════════════════════════════════════════════

export interface IndicatorListEntry {
  indicatorId: string;
  displayName: string;
  category: IndicatorCategory;
  state: IndicatorLoadResult['state'];
  summary: IndicatorSummary | null;
  reason?: string;
}

export function buildIndicatorList(ctx: PipelineContext, category?: IndicatorCategory): IndicatorListEntry[] {
  return getIndicatorIds(category).map((indicatorId) => {
    const spec = resolveIndicatorSpec(indicatorId);
    const loaded = load(indicatorId, ctx);

    if (loaded.state === 'NO_DATA') {
      return {
        indicatorId,
        displayName: spec.displayName,
        category: spec.category,
        state: loaded.state,
        summary: null,
        reason: loaded.reason,
      };
    }

    const forecast = forecastFor(loaded.indicator, ctx);
    return {
      indicatorId,
      displayName: spec.displayName,
      category: spec.category,
      state: loaded.state,
      summary: summarizeIndicator(loaded.indicator, forecast),
    };
  });
}

// ═══════════════════════════════════════════════════════════════
// CORRELATION
// ═══════════════════════════════════════════════════════════════

export interface CorrelationView {
  matrix: CorrelationMatrix;
  top: CorrelationPair[];
  synthetic: string[];
  excluded: Array<{ indicatorId: string; reason: string }>;
}

export function buildCorrelationView(
  indicatorIds: string[],
  ctx: PipelineContext,
  opts: Partial<CorrelationOptions> = {},
): CorrelationView {
  const indicators: Indicator[] = [];
  const excluded: CorrelationView['excluded'] = [];

  for (const id of indicatorIds) {
    const loaded = load(id, ctx);
    if (loaded.state === 'NO_DATA') {
      excluded.push({ indicatorId: id, reason: loaded.reason });
    } else {
      indicators.push(loaded.indicator);
    }
  }

  const matrix = computeCorrelationMatrix(indicators, {
    ...opts,
    minOverlap: opts.minOverlap ?? ctx.minOverlap,
  });

  return {
    matrix,
    top: topCorrelations(matrix),
    synthetic: indicators.filter((i) => i.synthetic).map((i) => i.meta.indicatorId),
    excluded,
  };
}

// ═══════════════════════════════════════════════════════════════
// DERIVED
// ═══════════════════════════════════════════════════════════════

export interface DerivedRequest {
  id: string;
  displayName?: string;
  unit?: string;
  weights: WeightScheme;
}

type Excluded = Array<{ indicatorId: string; reason: string }>;

export type DerivedView =
  | { state: 'DERIVED'; indicator: Indicator; summary: IndicatorSummary; excluded: Excluded }
  | { state: 'NO_DATA'; indicatorId: string; reason: string; excluded: Excluded };

export function buildDerivedView(request: DerivedRequest, ctx: PipelineContext): DerivedView {
  const components: Indicator[] = [];
  const excluded: Excluded = [];

  for (const id of Object.keys(request.weights)) {
    const loaded = load(id, ctx);
    if (loaded.state === 'NO_DATA') {
      excluded.push({ indicatorId: id, reason: loaded.reason });
    } else {
      components.push(loaded.indicator);
    }
  }

  if (components.length === 0) {
    return {
      state: 'NO_DATA',
      indicatorId: request.id,
      reason: `No component of ${request.id} has data`,
      excluded,
    };
  }

  // a component with no data at all is missing at every timestamp: drop its term
  const usable: WeightScheme = {};
  for (const c of components) {
    usable[c.meta.indicatorId] = request.weights[c.meta.indicatorId];
  }

  const indicator = computeDerivedIndicator(components, usable, {
    indicatorId: request.id,
    displayName: request.displayName,
    unit: request.unit,
  });

  return { state: 'DERIVED', indicator, summary: summarizeIndicator(indicator), excluded };
}

// ═══════════════════════════════════════════════════════════════
// COST ADJUSTMENTS
// ═══════════════════════════════════════════════════════════════

/**
 * Latest year-over-year adjustment of every cost index that carries one
 */
export function buildCostAdjustments(ctx: PipelineContext): CostAdjustment[] {
  const rows: CostAdjustment[] = [];

  for (const indicatorId of getIndicatorIds('cost')) {
    const loaded = load(indicatorId, ctx);
    if (loaded.state === 'NO_DATA') continue;

    const { indicator } = loaded;
    const summary = summarizeIndicator(indicator);
    if (summary.yearlyAdjustment === null || indicator.points.length === 0) continue;

    const year = indicator.points[indicator.points.length - 1].ts.getUTCFullYear();
    rows.push({
      indicatorId,
      displayName: indicator.meta.displayName,
      adjustmentPct: summary.yearlyAdjustment,
      synthetic: indicator.synthetic,
      effectiveFrom: new Date(Date.UTC(year, 3, 1)),
      effectiveTo: new Date(Date.UTC(year + 1, 2, 31)),
    });
  }

  return rows;
}
