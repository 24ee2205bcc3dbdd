/**
 * SAMPLE DATA GENERATOR
 *
 * Placeholder history for indicators with no data file.
 * Monthly points, seeded per indicator id so a given id renders the same
 * curve for the same month. Output is always flagged synthetic.
 */

import type { Indicator, SeriesPoint } from '../contracts/indicator.contracts.js';
import { resolveIndicatorSpec } from '../data/indicator_sources.registry.js';
import { addMonthsUtc, monthStartUtc } from '../utils/time.utils.js';

export const SAMPLE_SUFFIX = ' (Sample Data)';

/**
 * Mulberry32 - fast deterministic PRNG
 */
function mulberry32(seed: number): () => number {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Box-Muller transform for N(0,1)
 */
function randn(rng: () => number): number {
  let u = 0, v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

/**
 * FNV-1a over the id
 */
export function seedFor(key: string): number {
  let h = 2166136261;
  for (let i = 0; i < key.length; i++) {
    h ^= key.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export interface SampleOptions {
  now: Date;
  months: number;   // history length before the current month
}

export function generateSampleIndicator(indicatorId: string, opts: SampleOptions): Indicator {
  const spec = resolveIndicatorSpec(indicatorId);
  const { baseValue, trendPct, volatilityPct } = spec.sample;
  const rng = mulberry32(seedFor(indicatorId));

  const end = monthStartUtc(opts.now);
  const start = addMonthsUtc(end, -opts.months);

  const points: SeriesPoint[] = [];
  const values: number[] = [];
  const yearlyAdjustment: Array<number | null> = [];

  for (let i = 0; i <= opts.months; i++) {
    const ts = addMonthsUtc(start, i);

    let value = baseValue;
    if (i > 0) {
      const seasonal = 0.01 * Math.sin((2 * Math.PI * (ts.getUTCMonth() + 1)) / 12);
      const change = trendPct / 100 + seasonal + randn(rng) * (volatilityPct / 100);
      value = values[i - 1] * (1 + change);
    }

    values.push(value);
    points.push({ ts, value });

    if (spec.category === 'cost' && i >= 12) {
      yearlyAdjustment.push((value / values[i - 12] - 1) * 100);
    } else {
      yearlyAdjustment.push(null);
    }
  }

  return {
    name: indicatorId,
    points,
    meta: {
      indicatorId,
      displayName: spec.displayName,
      unit: spec.unit,
      source: spec.source + SAMPLE_SUFFIX,
      description: spec.description + SAMPLE_SUFFIX,
      preferredDirection: spec.preferredDirection,
      category: spec.category,
    },
    synthetic: true,
    dataSource: `Sample data (${spec.source})`,
    filePath: null,
    skippedRows: 0,
    extras: spec.category === 'cost' ? { yearly_adjustment: yearlyAdjustment } : {},
  };
}
