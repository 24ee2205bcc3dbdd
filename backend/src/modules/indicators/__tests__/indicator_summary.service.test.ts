import { describe, it, expect } from 'vitest';
import type { ForecastSegment } from '../contracts/indicator.contracts.js';
import { classifyImpact, determineTrend, summarizeIndicator } from '../services/indicator_summary.service.js';
import { day, makeIndicator, monthly } from './fixtures.js';

function segment(values: number[]): ForecastSegment {
  const points = monthly('2025-01', values).map((p) => ({
    ts: p.ts,
    value: p.value ?? 0,
    lower: p.value ?? 0,
    upper: p.value ?? 0,
  }));
  return { indicatorId: 'x', projected: true, method: 'linear', origin: 'MODEL', startsAt: points[0].ts, points, fit: null };
}

describe('determineTrend', () => {
  it('reads steady growth as increasing', () => {
    const result = determineTrend(makeIndicator('x', monthly('2024-01', [100, 102, 104, 106, 108, 110])));

    expect(result.trend).toBe('INCREASING');
    expect(result.description).toBe('Prices have been trending upward.');
  });

  it('reads steady decline as decreasing', () => {
    const result = determineTrend(makeIndicator('x', monthly('2024-01', [110, 108, 106, 104, 102, 100])));

    expect(result.trend).toBe('DECREASING');
    expect(result.description).toBe('Prices have been trending downward.');
  });

  it('reads small moves as stable', () => {
    const result = determineTrend(makeIndicator('x', monthly('2024-01', [100, 100.1, 100, 100.1])));

    expect(result.trend).toBe('STABLE');
    expect(result.description).toBe('Prices have been relatively stable.');
  });

  it('averages in the forecast direction', () => {
    const indicator = makeIndicator('x', monthly('2024-01', [100, 102, 104, 106, 108, 110]));

    expect(determineTrend(indicator, segment([110, 100, 90, 88])).trend).toBe('DECREASING');
  });

  it('cannot tell from a single observation', () => {
    const result = determineTrend(makeIndicator('x', monthly('2024-01', [100, null])));

    expect(result).toEqual({
      trend: 'STABLE',
      description: 'Trend cannot be determined due to insufficient data.',
      score: null,
    });
  });
});

describe('classifyImpact', () => {
  it.each([
    ['down', -1, 'positive'],
    ['down', 1, 'neutral'],
    ['down', 3, 'negative'],
    ['up', 3, 'positive'],
    ['up', -1, 'neutral'],
    ['up', -3, 'negative'],
    ['neutral', 1, 'neutral'],
    ['neutral', 3, 'negative'],
    ['neutral', -3, 'positive'],
  ] as const)('%s preference, %d%% change -> %s', (preferred, change, expected) => {
    expect(classifyImpact(change, preferred)).toBe(expected);
  });

  it('is neutral without a change', () => {
    expect(classifyImpact(null, 'down')).toBe('neutral');
  });
});

describe('summarizeIndicator', () => {
  it('reports the latest observed value and its change', () => {
    const indicator = makeIndicator('x', monthly('2024-01', [100, 110, null]), {
      extras: { yearly_adjustment: [1.5, 2.5, null] },
    });

    const summary = summarizeIndicator(indicator);

    expect(summary.currentValue).toBe(110);
    expect(summary.lastUpdated).toBe('2024-02-01');
    expect(summary.monthlyChangePct).toBeCloseTo(10, 10);
    expect(summary.yoyChangePct).toBeNull();
    expect(summary.yearlyAdjustment).toBe(2.5);
    expect(summary.trend).toBe('INCREASING');
    expect(summary.impact).toBe('negative');
    expect(summary.synthetic).toBe(false);
  });

  it('reads a dollar index decline as favourable', () => {
    const dollar = summarizeIndicator(makeIndicator('dollar_index', monthly('2024-01', [100, 99])));
    const other = summarizeIndicator(makeIndicator('other_gauge', monthly('2024-01', [100, 99])));

    expect(dollar.impact).toBe('positive');
    expect(other.impact).toBe('neutral');
  });

  it('handles an indicator with no values', () => {
    const summary = summarizeIndicator(makeIndicator('x', [{ ts: day('2024-01-01'), value: null }]));

    expect(summary.currentValue).toBeNull();
    expect(summary.lastUpdated).toBeNull();
    expect(summary.monthlyChangePct).toBeNull();
    expect(summary.impact).toBe('neutral');
  });
});
