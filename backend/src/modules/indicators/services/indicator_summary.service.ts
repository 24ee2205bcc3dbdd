/**
 * INDICATOR SUMMARY SERVICE
 *
 * Card-level numbers for one indicator: latest value, changes, trend, impact.
 */

import type {
  ForecastSegment,
  ImpactClass,
  Indicator,
  IndicatorSummary,
  TrendDirection,
} from '../contracts/indicator.contracts.js';
import { getIndicatorSpec, type PreferredDirection } from '../data/indicator_sources.registry.js';
import { formatDay } from '../utils/time.utils.js';
import { computeChanges, observedPoints } from './series_transform.service.js';

const TREND_THRESHOLD_PCT = 0.7;
const TREND_LOOKBACK = 6;
const IMPACT_THRESHOLD_PCT = 2.0;

const TREND_TEXT: Record<TrendDirection, string> = {
  INCREASING: 'Prices have been trending upward.',
  DECREASING: 'Prices have been trending downward.',
  STABLE: 'Prices have been relatively stable.',
};

// ═══════════════════════════════════════════════════════════════
// TREND
// ═══════════════════════════════════════════════════════════════

/**
 * Mean % change over the last few observations, averaged with the
 * forecast's first-to-last % change when a forecast is given.
 */
export function determineTrend(
  indicator: Indicator,
  forecast?: ForecastSegment | null,
): { trend: TrendDirection; description: string; score: number | null } {
  const recent = observedPoints(indicator.points).slice(-TREND_LOOKBACK);
  if (recent.length < 2) {
    return {
      trend: 'STABLE',
      description: 'Trend cannot be determined due to insufficient data.',
      score: null,
    };
  }

  const changes: number[] = [];
  for (let i = 1; i < recent.length; i++) {
    const prev = recent[i - 1].value;
    if (prev !== 0) changes.push(((recent[i].value - prev) / Math.abs(prev)) * 100);
  }
  const recentTrend = changes.length > 0 ? changes.reduce((s, v) => s + v, 0) / changes.length : 0;

  let score = recentTrend;
  const fp = forecast?.points ?? [];
  if (fp.length >= 2 && fp[0].value !== 0) {
    const forecastTrend = ((fp[fp.length - 1].value - fp[0].value) / Math.abs(fp[0].value)) * 100;
    score = (recentTrend + forecastTrend) / 2;
  }

  const trend: TrendDirection =
    score > TREND_THRESHOLD_PCT ? 'INCREASING' : score < -TREND_THRESHOLD_PCT ? 'DECREASING' : 'STABLE';

  return { trend, description: TREND_TEXT[trend], score };
}

// ═══════════════════════════════════════════════════════════════
// IMPACT
// ═══════════════════════════════════════════════════════════════

/**
 * Business reading of a % change given which direction is preferred.
 * For neutral indicators a significant rise is read as a cost increase.
 */
export function classifyImpact(changePct: number | null, preferred: PreferredDirection): ImpactClass {
  if (changePct === null) return 'neutral';
  const significant = Math.abs(changePct) > IMPACT_THRESHOLD_PCT;

  switch (preferred) {
    case 'down':
      return changePct < 0 ? 'positive' : significant ? 'negative' : 'neutral';
    case 'up':
      return changePct > 0 ? 'positive' : significant ? 'negative' : 'neutral';
    default:
      if (!significant) return 'neutral';
      return changePct > 0 ? 'negative' : 'positive';
  }
}

// ═══════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════

function latestNonNull(values: Array<number | null> | undefined): number | null {
  if (!values) return null;
  for (let i = values.length - 1; i >= 0; i--) {
    const v = values[i];
    if (v !== null) return v;
  }
  return null;
}

export function summarizeIndicator(
  indicator: Indicator,
  forecast?: ForecastSegment | null,
): IndicatorSummary {
  const changes = computeChanges(indicator.points);

  let latestIdx = -1;
  for (let i = indicator.points.length - 1; i >= 0; i--) {
    if (indicator.points[i].value !== null) {
      latestIdx = i;
      break;
    }
  }

  const latest = latestIdx >= 0 ? indicator.points[latestIdx] : null;
  const change = latestIdx >= 0 ? changes[latestIdx] : null;
  const { trend, description } = determineTrend(indicator, forecast);
  const monthlyChangePct = change?.monthlyChangePct ?? null;

  return {
    indicatorId: indicator.meta.indicatorId,
    displayName: indicator.meta.displayName,
    unit: indicator.meta.unit,
    preferredDirection: indicator.meta.preferredDirection,
    category: indicator.meta.category,
    currentValue: latest?.value ?? null,
    lastUpdated: latest ? formatDay(latest.ts) : null,
    monthlyChangePct,
    yoyChangePct: change?.yoyChangePct ?? null,
    yearlyAdjustment: latestNonNull(indicator.extras.yearly_adjustment),
    trend,
    trendDescription: description,
    impact: classifyImpact(
      monthlyChangePct,
      getIndicatorSpec(indicator.meta.indicatorId)?.impactDirection ?? indicator.meta.preferredDirection,
    ),
    synthetic: indicator.synthetic,
    dataSource: indicator.dataSource,
  };
}
