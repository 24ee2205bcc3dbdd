/**
 * CSV EXPORT SERVICE
 *
 * Text payloads for the dashboard's download buttons.
 */

import { stringify } from 'csv-stringify/sync';
import type {
  CorrelationMatrix,
  CostAdjustment,
  ForecastSegment,
  Series,
} from '../contracts/indicator.contracts.js';
import { formatDay, formatDisplayDay } from '../utils/time.utils.js';
import { appendForecast } from './forecast.service.js';

type Cell = string | number;

function cell(value: number | null): Cell {
  return value === null ? '' : value;
}

export function seriesToCsv(series: Series, forecast?: ForecastSegment | null): string {
  const rows: Cell[][] = [['Date', 'value', 'interpolated', 'projected', 'lower_ci', 'upper_ci']];

  for (const p of appendForecast(series, forecast ?? null)) {
    rows.push([
      formatDay(p.ts),
      cell(p.value),
      p.interpolated ? 'true' : 'false',
      p.projected ? 'true' : 'false',
      cell(p.lower),
      cell(p.upper),
    ]);
  }

  return stringify(rows);
}

export function correlationToCsv(matrix: CorrelationMatrix): string {
  const rows: Cell[][] = [['', ...matrix.ids]];
  matrix.ids.forEach((id, i) => {
    rows.push([id, ...matrix.values[i].map(cell)]);
  });
  return stringify(rows);
}

/**
 * Indicator, signed adjustment ("+2.50%") and the April-to-March period it applies to
 */
export function costAdjustmentsToCsv(rows: CostAdjustment[]): string {
  const out: Cell[][] = [['Indicator', 'Adjustment', 'Effective Period']];
  for (const r of rows) {
    out.push([
      r.displayName,
      `${r.adjustmentPct > 0 ? '+' : ''}${r.adjustmentPct.toFixed(2)}%`,
      `${formatDisplayDay(r.effectiveFrom)} - ${formatDisplayDay(r.effectiveTo)}`,
    ]);
  }
  return stringify(out);
}
