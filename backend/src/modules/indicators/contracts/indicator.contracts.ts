/**
 * INDICATOR CONTRACTS
 *
 * Data structures for series, indicators, forecasts and correlation views.
 * Everything below the file reader is derived per request and never persisted.
 */

import type { IndicatorCategory, PreferredDirection } from '../data/indicator_sources.registry.js';

// ═══════════════════════════════════════════════════════════════
// SERIES
// ═══════════════════════════════════════════════════════════════

/**
 * `value: null` is an explicit gap. `interpolated` marks gap-filled values.
 */
export interface SeriesPoint {
  ts: Date;
  value: number | null;
  interpolated?: boolean;
}

export interface Series {
  name: string;
  points: SeriesPoint[];   // strictly increasing ts
}

// ═══════════════════════════════════════════════════════════════
// INDICATOR
// ═══════════════════════════════════════════════════════════════

export interface IndicatorMeta {
  indicatorId: string;
  displayName: string;
  unit: string;
  source: string;
  description: string;
  preferredDirection: PreferredDirection;
  category: IndicatorCategory;
}

export interface Indicator extends Series {
  meta: IndicatorMeta;
  synthetic: boolean;        // generated placeholder, never real data
  dataSource: string;        // provenance label for the UI
  filePath: string | null;
  skippedRows: number;
  // optional numeric columns by name, aligned with points
  extras: Record<string, Array<number | null>>;
}

/**
 * Expected layout of a tabular indicator file
 */
export interface IndicatorFileSchema {
  dateColumn: string;
  valueColumn: string;
  extraColumns: string[];
}

export type IndicatorLoadResult =
  | { state: 'LOADED'; indicatorId: string; indicator: Indicator }
  | { state: 'PLACEHOLDER'; indicatorId: string; indicator: Indicator }
  | { state: 'NO_DATA'; indicatorId: string; reason: string; triedPaths: string[] };

// ═══════════════════════════════════════════════════════════════
// ALIGNMENT
// ═══════════════════════════════════════════════════════════════

/**
 * Several series on one shared axis. columns[name][i] belongs to axis[i].
 */
export interface AlignedFrame {
  axis: Date[];
  names: string[];
  columns: Record<string, SeriesPoint[]>;
}

export type TimePeriod = 'LAST_6_MONTHS' | 'LAST_12_MONTHS' | 'LAST_24_MONTHS' | 'ALL';

export interface TimeWindow {
  from?: Date | null;
  to?: Date | null;
}

export interface PointChange {
  ts: Date;
  monthlyChangePct: number | null;
  yoyChangePct: number | null;
}

// ═══════════════════════════════════════════════════════════════
// FORECAST
// ═══════════════════════════════════════════════════════════════

export type ForecastMethod = 'linear' | 'exponential';

export interface ForecastPoint {
  ts: Date;
  value: number;
  lower: number;
  upper: number;
}

export interface ForecastFit {
  window: number;
  slope: number;        // per day (log space for exponential)
  intercept: number;    // value at the last observation
  residualStd: number;
}

export interface ForecastSegment {
  indicatorId: string;
  projected: true;
  method: ForecastMethod | 'file';
  origin: 'MODEL' | 'FILE';
  startsAt: Date | null;
  points: ForecastPoint[];
  fit: ForecastFit | null;
}

export interface ForecastOptions {
  horizon: number;
  window: number;
  method: ForecastMethod;
}

export interface ChartPoint {
  ts: Date;
  value: number | null;
  projected: boolean;
  interpolated: boolean;
  lower: number | null;
  upper: number | null;
}

// ═══════════════════════════════════════════════════════════════
// CORRELATION
// ═══════════════════════════════════════════════════════════════

export type ResampleMode = 'none' | 'monthly';

export interface CorrelationOptions {
  from?: Date | null;
  to?: Date | null;
  minOverlap: number;
  resample: ResampleMode;
}

export interface CorrelationMatrix {
  ids: string[];
  values: Array<Array<number | null>>;   // symmetric, [-1, 1] or null
  overlap: number[][];                   // observed points used per pair
  window: { from: Date | null; to: Date | null };
  minOverlap: number;
  resample: ResampleMode;
}

export interface CorrelationPair {
  a: string;
  b: string;
  r: number;
  overlap: number;
}

// ═══════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════

export type TrendDirection = 'INCREASING' | 'DECREASING' | 'STABLE';

export type ImpactClass = 'positive' | 'negative' | 'neutral';

export interface IndicatorSummary {
  indicatorId: string;
  displayName: string;
  unit: string;
  preferredDirection: PreferredDirection;
  category: IndicatorCategory;
  currentValue: number | null;
  lastUpdated: string | null;   // YYYY-MM-DD
  monthlyChangePct: number | null;
  yoyChangePct: number | null;
  yearlyAdjustment: number | null;
  trend: TrendDirection;
  trendDescription: string;
  impact: ImpactClass;
  synthetic: boolean;
  dataSource: string;
}

// ═══════════════════════════════════════════════════════════════
// COST ADJUSTMENTS
// ═══════════════════════════════════════════════════════════════

export interface CostAdjustment {
  indicatorId: string;
  displayName: string;
  adjustmentPct: number;
  synthetic: boolean;
  effectiveFrom: Date;   // Apr 1 of the latest data year
  effectiveTo: Date;     // Mar 31 of the following year
}
