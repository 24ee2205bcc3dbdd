/**
 * CORRELATION SERVICE
 *
 * Pairwise Pearson correlation across aligned indicators.
 * Only timestamps where both sides are observed (not gaps, not gap-filled)
 * count. Too little overlap or zero variance -> null, never a guess.
 */

import type {
  CorrelationMatrix,
  CorrelationOptions,
  CorrelationPair,
  Series,
  SeriesPoint,
} from '../contracts/indicator.contracts.js';
import { alignAndFill, resampleMonthly } from './series_transform.service.js';

export const DEFAULT_MIN_OVERLAP = 6;

export function pearsonCorrelation(a: number[], b: number[]): number | null {
  if (a.length !== b.length || a.length < 2) return null;

  const n = a.length;
  const meanA = a.reduce((s, v) => s + v, 0) / n;
  const meanB = b.reduce((s, v) => s + v, 0) / n;

  let numerator = 0;
  let denomA = 0;
  let denomB = 0;

  for (let i = 0; i < n; i++) {
    const diffA = a[i] - meanA;
    const diffB = b[i] - meanB;
    numerator += diffA * diffB;
    denomA += diffA * diffA;
    denomB += diffB * diffB;
  }

  if (denomA === 0 || denomB === 0) return null;

  const r = numerator / Math.sqrt(denomA * denomB);
  return Math.max(-1, Math.min(1, r));
}

function isObserved(p: SeriesPoint): boolean {
  return p.value !== null && !p.interpolated;
}

/**
 * Values of both columns at indices where both are observed
 */
function overlapping(a: SeriesPoint[], b: SeriesPoint[], inWindow: boolean[]): { xs: number[]; ys: number[] } {
  const xs: number[] = [];
  const ys: number[] = [];
  for (let i = 0; i < a.length; i++) {
    const pa = a[i];
    const pb = b[i];
    if (!inWindow[i] || !isObserved(pa) || !isObserved(pb)) continue;
    if (pa.value === null || pb.value === null) continue;
    xs.push(pa.value);
    ys.push(pb.value);
  }
  return { xs, ys };
}

export function computeCorrelationMatrix(
  series: Series[],
  opts: Partial<CorrelationOptions> = {},
): CorrelationMatrix {
  const minOverlap = Math.max(2, opts.minOverlap ?? DEFAULT_MIN_OVERLAP);
  const resample = opts.resample ?? 'none';
  const from = opts.from ?? null;
  const to = opts.to ?? null;

  const prepared = resample === 'monthly'
    ? series.map((s) => ({ name: s.name, points: resampleMonthly(s.points) }))
    : series;

  const frame = alignAndFill(prepared);
  const ids = frame.names;
  const inWindow = frame.axis.map((ts) =>
    (from === null || ts.getTime() >= from.getTime()) && (to === null || ts.getTime() <= to.getTime()),
  );

  const n = ids.length;
  const values: Array<Array<number | null>> = ids.map(() => new Array<number | null>(n).fill(null));
  const overlap: number[][] = ids.map(() => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    for (let j = i; j < n; j++) {
      const { xs, ys } = overlapping(frame.columns[ids[i]], frame.columns[ids[j]], inWindow);
      const r = xs.length >= minOverlap ? pearsonCorrelation(xs, ys) : null;
      // diagonal: identical inputs give exactly 1 (or null)
      const value = i === j && r !== null ? 1 : r;

      values[i][j] = value;
      values[j][i] = value;
      overlap[i][j] = xs.length;
      overlap[j][i] = xs.length;
    }
  }

  return { ids, values, overlap, window: { from, to }, minOverlap, resample };
}

export function getCorrelation(matrix: CorrelationMatrix, a: string, b: string): number | null {
  const i = matrix.ids.indexOf(a);
  const j = matrix.ids.indexOf(b);
  if (i < 0 || j < 0) return null;
  return matrix.values[i][j];
}

/**
 * Strongest off-diagonal pairs by |r|
 */
export function topCorrelations(matrix: CorrelationMatrix, limit = 5): CorrelationPair[] {
  const pairs: CorrelationPair[] = [];
  for (let i = 0; i < matrix.ids.length; i++) {
    for (let j = i + 1; j < matrix.ids.length; j++) {
      const r = matrix.values[i][j];
      if (r === null) continue;
      pairs.push({ a: matrix.ids[i], b: matrix.ids[j], r, overlap: matrix.overlap[i][j] });
    }
  }
  return pairs.sort((x, y) => Math.abs(y.r) - Math.abs(x.r)).slice(0, limit);
}
