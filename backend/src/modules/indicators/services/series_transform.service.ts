/**
 * SERIES TRANSFORM SERVICE
 *
 * Alignment convention: UNION. The shared axis is the sorted union of every
 * input timestamp; a series without a given timestamp gets a null gap there.
 * Resampling to months is a separate, explicit step (resampleMonthly).
 *
 * Gap-fill: carry the last known value forward, flagged interpolated.
 *
 * All functions return new arrays; inputs are never mutated.
 */

import { ValidationError } from '../../../common/errors.js';
import type {
  AlignedFrame,
  Indicator,
  IndicatorMeta,
  PointChange,
  Series,
  SeriesPoint,
  TimePeriod,
  TimeWindow,
} from '../contracts/indicator.contracts.js';
import { addMonthsUtc, monthKey, monthStartUtc } from '../utils/time.utils.js';

// ═══════════════════════════════════════════════════════════════
// ALIGNMENT
// ═══════════════════════════════════════════════════════════════

export function alignSeries(series: Series[]): AlignedFrame {
  const names = series.map((s) => s.name);
  if (new Set(names).size !== names.length) {
    throw new ValidationError('Series names must be unique for alignment', names);
  }

  const stamps = new Set<number>();
  for (const s of series) {
    for (const p of s.points) stamps.add(p.ts.getTime());
  }
  const axis = [...stamps].sort((a, b) => a - b).map((t) => new Date(t));

  const columns: AlignedFrame['columns'] = {};
  for (const s of series) {
    const byTs = new Map(s.points.map((p) => [p.ts.getTime(), p]));
    columns[s.name] = axis.map((ts) => {
      const p = byTs.get(ts.getTime());
      return p
        ? { ts, value: p.value, interpolated: p.interpolated ?? false }
        : { ts, value: null, interpolated: false };
    });
  }

  return { axis, names, columns };
}

/**
 * Carry-forward gap fill. Leading gaps (nothing to carry) stay null.
 */
export function fillGaps(points: SeriesPoint[]): SeriesPoint[] {
  let last: number | null = null;

  return points.map((p) => {
    if (p.value !== null) {
      last = p.value;
      return { ts: p.ts, value: p.value, interpolated: p.interpolated ?? false };
    }
    if (last !== null) {
      return { ts: p.ts, value: last, interpolated: true };
    }
    return { ts: p.ts, value: null, interpolated: false };
  });
}

export function alignAndFill(series: Series[]): AlignedFrame {
  const frame = alignSeries(series);
  const columns: AlignedFrame['columns'] = {};
  for (const name of frame.names) {
    columns[name] = fillGaps(frame.columns[name]);
  }
  return { ...frame, columns };
}

// ═══════════════════════════════════════════════════════════════
// DERIVED (WEIGHTED) INDICATORS
// ═══════════════════════════════════════════════════════════════

export type WeightScheme = Record<string, number>;

/**
 * Weighted combination of base indicators at each aligned timestamp.
 *
 * A component still missing after gap-fill drops its term; the remaining
 * terms are rescaled by sum|w_all| / sum|w_present| so the composite keeps
 * its scale instead of sagging toward zero.
 */
export function computeDerivedIndicator(
  components: Indicator[],
  weights: WeightScheme,
  meta: Pick<IndicatorMeta, 'indicatorId'> & Partial<IndicatorMeta>,
): Indicator {
  const weightIds = Object.keys(weights);
  if (weightIds.length === 0) {
    throw new ValidationError('Weighting scheme is empty');
  }

  const byId = new Map(components.map((c) => [c.meta.indicatorId, c]));
  const used: Indicator[] = [];
  const unknown: string[] = [];
  for (const id of weightIds) {
    const c = byId.get(id);
    if (c) used.push({ ...c, name: id });
    else unknown.push(id);
  }
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown components in weighting scheme: ${unknown.join(', ')}`, unknown);
  }

  const bad = weightIds.filter((id) => !Number.isFinite(weights[id]));
  if (bad.length > 0) {
    throw new ValidationError(`Weights must be finite numbers: ${bad.join(', ')}`, bad);
  }

  const totalWeight = weightIds.reduce((s, id) => s + Math.abs(weights[id]), 0);
  if (totalWeight === 0) {
    throw new ValidationError('Weights must not all be zero');
  }

  const frame = alignAndFill(used);

  const points: SeriesPoint[] = frame.axis.map((ts, i) => {
    let sum = 0;
    let presentWeight = 0;
    let interpolated = false;

    for (const id of weightIds) {
      const p = frame.columns[id][i];
      if (p.value === null) {
        interpolated = true;
        continue;
      }
      sum += weights[id] * p.value;
      presentWeight += Math.abs(weights[id]);
      if (p.interpolated) interpolated = true;
    }

    if (presentWeight === 0) {
      return { ts, value: null, interpolated: false };
    }
    return { ts, value: sum * (totalWeight / presentWeight), interpolated };
  });

  const recipe = weightIds.map((id) => `${id}×${weights[id]}`).join(' + ');
  const displayName = meta.displayName ?? meta.indicatorId;

  return {
    name: meta.indicatorId,
    points,
    meta: {
      indicatorId: meta.indicatorId,
      displayName,
      unit: meta.unit ?? '',
      source: meta.source ?? `Composite: ${recipe}`,
      description: meta.description ?? `Weighted composite of ${weightIds.join(', ')}`,
      preferredDirection: meta.preferredDirection ?? 'down',
      category: meta.category ?? 'cost',
    },
    synthetic: used.some((c) => c.synthetic),
    dataSource: `Derived: ${recipe}`,
    filePath: null,
    skippedRows: 0,
    extras: {},
  };
}

// ═══════════════════════════════════════════════════════════════
// RESAMPLING & FILTERING
// ═══════════════════════════════════════════════════════════════

/**
 * Last observation per calendar month, stamped on the 1st.
 */
export function resampleMonthly(points: SeriesPoint[]): SeriesPoint[] {
  const buckets = new Map<string, SeriesPoint>();

  for (const p of points) {
    const key = monthKey(p.ts);
    const current = buckets.get(key);
    if (!current || p.value !== null || current.value === null) {
      buckets.set(key, {
        ts: monthStartUtc(p.ts),
        value: p.value,
        interpolated: p.interpolated ?? false,
      });
    }
  }

  return [...buckets.values()].sort((a, b) => a.ts.getTime() - b.ts.getTime());
}

export function filterByWindow(points: SeriesPoint[], window: TimeWindow): SeriesPoint[] {
  const from = window.from?.getTime() ?? -Infinity;
  const to = window.to?.getTime() ?? Infinity;
  return points.filter((p) => p.ts.getTime() >= from && p.ts.getTime() <= to);
}

const PERIOD_MONTHS: Record<Exclude<TimePeriod, 'ALL'>, number> = {
  LAST_6_MONTHS: 6,
  LAST_12_MONTHS: 12,
  LAST_24_MONTHS: 24,
};

/**
 * Window measured back from the series' own latest timestamp, so the most
 * recent point is always kept.
 */
export function filterTimePeriod(points: SeriesPoint[], period: TimePeriod): SeriesPoint[] {
  if (period === 'ALL' || points.length === 0) return points.slice();

  const end = points[points.length - 1].ts;
  const start = addMonthsUtc(end, -PERIOD_MONTHS[period]);
  return filterByWindow(points, { from: start, to: end });
}

// ═══════════════════════════════════════════════════════════════
// CHANGES
// ═══════════════════════════════════════════════════════════════

function pctChange(current: number, previous: number | undefined): number | null {
  if (previous === undefined || previous === 0) return null;
  return ((current - previous) / Math.abs(previous)) * 100;
}

/**
 * Period-over-period changes between observed values (gaps are skipped).
 * YoY compares against the observation 12 steps back.
 */
export function computeChanges(points: SeriesPoint[]): PointChange[] {
  const observed: number[] = [];

  return points.map((p) => {
    if (p.value === null) {
      return { ts: p.ts, monthlyChangePct: null, yoyChangePct: null };
    }
    const n = observed.length;
    const change: PointChange = {
      ts: p.ts,
      monthlyChangePct: pctChange(p.value, n >= 1 ? observed[n - 1] : undefined),
      yoyChangePct: pctChange(p.value, n >= 12 ? observed[n - 12] : undefined),
    };
    observed.push(p.value);
    return change;
  });
}

export function observedPoints(points: SeriesPoint[]): Array<{ ts: Date; value: number }> {
  const out: Array<{ ts: Date; value: number }> = [];
  for (const p of points) {
    if (p.value !== null && !p.interpolated) out.push({ ts: p.ts, value: p.value });
  }
  return out;
}
