/**
 * FORECAST SERVICE
 *
 * Trend projection appended to an indicator's historical tail.
 *
 * Model: least squares over the trailing window of observed points,
 * x = days since the last observation. 'exponential' fits ln(value).
 * Band at step k: ±1.96·σ·√k (σ = residual std error).
 *
 * Pre-computed forecast files in forecasts/ take precedence when present.
 */

import fs from 'fs';
import { logger as defaultLogger, type Logger } from '../../../common/logger.js';
import type {
  ChartPoint,
  ForecastFit,
  ForecastOptions,
  ForecastPoint,
  ForecastSegment,
  Series,
} from '../contracts/indicator.contracts.js';
import { forecastFileCandidates, resolveDataDirs } from '../reader/data_dirs.js';
import { fileCache, readIndicatorFile, type IndicatorFileCache } from '../reader/indicator_file.reader.js';
import { addMonthsUtc, daysBetween, DAY_MS, monthStartUtc } from '../utils/time.utils.js';
import { observedPoints } from './series_transform.service.js';

const Z_95 = 1.96;

export const DEFAULT_FORECAST_OPTIONS: ForecastOptions = {
  horizon: 6,
  window: 12,
  method: 'linear',
};

function emptySegment(indicatorId: string, method: ForecastSegment['method']): ForecastSegment {
  return { indicatorId, projected: true, method, origin: 'MODEL', startsAt: null, points: [], fit: null };
}

// ═══════════════════════════════════════════════════════════════
// FIT HELPERS
// ═══════════════════════════════════════════════════════════════

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function fitLine(xs: number[], ys: number[]): { slope: number; intercept: number; residualStd: number } {
  const n = xs.length;
  const meanX = xs.reduce((s, v) => s + v, 0) / n;
  const meanY = ys.reduce((s, v) => s + v, 0) / n;

  let num = 0;
  let den = 0;
  for (let i = 0; i < n; i++) {
    num += (xs[i] - meanX) * (ys[i] - meanY);
    den += (xs[i] - meanX) ** 2;
  }

  const slope = den === 0 ? 0 : num / den;
  const intercept = meanY - slope * meanX;

  let sse = 0;
  for (let i = 0; i < n; i++) {
    sse += (ys[i] - (intercept + slope * xs[i])) ** 2;
  }
  const residualStd = Math.sqrt(sse / Math.max(n - 2, 1));

  return { slope, intercept, residualStd };
}

// ═══════════════════════════════════════════════════════════════
// MODEL FORECAST
// ═══════════════════════════════════════════════════════════════

/**
 * Project `horizon` steps past the last observation. The input series is
 * only read. Fewer than 2 observed points gives an empty segment.
 */
export function forecastSeries(
  series: Series,
  opts: Partial<ForecastOptions> = {},
  logger: Logger = defaultLogger,
): ForecastSegment {
  const horizon = opts.horizon ?? DEFAULT_FORECAST_OPTIONS.horizon;
  const window = opts.window ?? DEFAULT_FORECAST_OPTIONS.window;
  let method = opts.method ?? DEFAULT_FORECAST_OPTIONS.method;

  const history = observedPoints(series.points).slice(-Math.max(window, 2));
  if (horizon <= 0 || history.length < 2) {
    return emptySegment(series.name, method);
  }

  if (method === 'exponential' && history.some((p) => p.value <= 0)) {
    logger.warn({ series: series.name }, 'Exponential fit needs positive values, falling back to linear');
    method = 'linear';
  }

  const last = history[history.length - 1];
  const xs = history.map((p) => daysBetween(last.ts, p.ts));
  const ys = history.map((p) => (method === 'exponential' ? Math.log(p.value) : p.value));
  const { slope, intercept, residualStd } = fitLine(xs, ys);

  const spacing = median(history.slice(1).map((p, i) => p.ts.getTime() - history[i].ts.getTime()));
  const monthly = spacing >= 28 * DAY_MS && spacing <= 31 * DAY_MS;

  // trailing gaps after the last observation are history too: step past them
  const seriesEnd = series.points[series.points.length - 1].ts.getTime();
  const points: ForecastPoint[] = [];
  for (let k = 1; points.length < horizon; k++) {
    const ts = monthly ? addMonthsUtc(last.ts, k) : new Date(last.ts.getTime() + k * spacing);
    if (ts.getTime() <= seriesEnd) continue;
    const fitted = intercept + slope * daysBetween(last.ts, ts);
    const band = Z_95 * residualStd * Math.sqrt(k);

    points.push(
      method === 'exponential'
        ? { ts, value: Math.exp(fitted), lower: Math.exp(fitted - band), upper: Math.exp(fitted + band) }
        : { ts, value: fitted, lower: fitted - band, upper: fitted + band },
    );
  }

  const fit: ForecastFit = { window: history.length, slope, intercept, residualStd };

  return {
    indicatorId: series.name,
    projected: true,
    method,
    origin: 'MODEL',
    startsAt: points[0].ts,
    points,
    fit,
  };
}

// ═══════════════════════════════════════════════════════════════
// FILE FORECAST
// ═══════════════════════════════════════════════════════════════

export interface ForecastFileOptions {
  dataDir: string;
  now?: Date;
  /** Last historical timestamp; file rows at or before it are dropped */
  after?: Date | null;
  cache?: IndicatorFileCache | null;
  logger?: Logger;
}

/**
 * Pre-computed forecast (Date, value, lower_ci, upper_ci). Rows before the
 * current month, or not after `after`, are dropped. Null when no usable
 * file exists.
 */
export function loadForecastFile(indicatorId: string, opts: ForecastFileOptions): ForecastSegment | null {
  const logger = opts.logger ?? defaultLogger;
  const cache = opts.cache === undefined ? fileCache : opts.cache;
  const dirs = resolveDataDirs(opts.dataDir);
  const cutoff = monthStartUtc(opts.now ?? new Date()).getTime();
  const after = opts.after?.getTime() ?? -Infinity;

  for (const filePath of forecastFileCandidates(dirs, indicatorId)) {
    if (!fs.existsSync(filePath)) continue;

    let table = cache?.get(filePath);
    if (!table) {
      try {
        table = readIndicatorFile(filePath, {
          indicatorId,
          schema: { extraColumns: ['lower_ci', 'upper_ci'] },
          logger,
        });
        cache?.set(filePath, table);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ file: filePath, indicatorId, err: message }, 'Failed to read forecast file');
        continue;
      }
    }

    const lowerCol = table.extras.lower_ci ?? [];
    const upperCol = table.extras.upper_ci ?? [];
    const points: ForecastPoint[] = [];

    table.points.forEach((p, i) => {
      if (p.value === null || p.ts.getTime() < cutoff || p.ts.getTime() <= after) return;
      points.push({
        ts: p.ts,
        value: p.value,
        lower: lowerCol[i] ?? p.value,
        upper: upperCol[i] ?? p.value,
      });
    });

    if (points.length === 0) {
      logger.info({ file: filePath, indicatorId }, 'Forecast file has no rows past the history');
      continue;
    }

    return {
      indicatorId,
      projected: true,
      method: 'file',
      origin: 'FILE',
      startsAt: points[0].ts,
      points,
      fit: null,
    };
  }

  return null;
}

/**
 * File forecast when one is usable, model forecast otherwise. Either way
 * the segment starts after the series' last timestamp.
 */
export function resolveForecast(
  series: Series,
  opts: ForecastFileOptions & Partial<ForecastOptions>,
): ForecastSegment {
  const lastTs = series.points.length > 0 ? series.points[series.points.length - 1].ts : null;
  const fromFile = loadForecastFile(series.name, { ...opts, after: lastTs });
  if (fromFile) return fromFile;
  return forecastSeries(series, opts, opts.logger ?? defaultLogger);
}

// ═══════════════════════════════════════════════════════════════
// CHART VIEW
// ═══════════════════════════════════════════════════════════════

/**
 * History followed by the projected tail, as a new array.
 */
export function appendForecast(series: Series, segment: ForecastSegment | null): ChartPoint[] {
  const history: ChartPoint[] = series.points.map((p) => ({
    ts: p.ts,
    value: p.value,
    projected: false,
    interpolated: p.interpolated ?? false,
    lower: null,
    upper: null,
  }));

  const projected: ChartPoint[] = (segment?.points ?? []).map((p) => ({
    ts: p.ts,
    value: p.value,
    projected: true,
    interpolated: false,
    lower: p.lower,
    upper: p.upper,
  }));

  return [...history, ...projected];
}
