import { describe, it, expect } from 'vitest';
import { generateSampleIndicator, SAMPLE_SUFFIX, seedFor } from '../reader/sample_data.generator.js';
import { formatDay } from '../utils/time.utils.js';

const NOW = new Date(Date.UTC(2024, 5, 15, 13, 30));

describe('generateSampleIndicator', () => {
  it('is deterministic per indicator id', () => {
    const a = generateSampleIndicator('wti_oil', { now: NOW, months: 24 });
    const b = generateSampleIndicator('wti_oil', { now: NOW, months: 24 });

    expect(a).toEqual(b);
  });

  it('gives different ids different curves', () => {
    const a = generateSampleIndicator('wti_oil', { now: NOW, months: 24 });
    const b = generateSampleIndicator('dollar_index', { now: NOW, months: 24 });

    expect(seedFor('wti_oil')).not.toBe(seedFor('dollar_index'));
    expect(a.points.map((p) => p.value)).not.toEqual(b.points.map((p) => p.value));
  });

  it('starts at the profile base value and ends at the current month', () => {
    const indicator = generateSampleIndicator('cruspi', { now: NOW, months: 12 });

    expect(indicator.points).toHaveLength(13);
    expect(indicator.points[0].value).toBe(100);
    expect(formatDay(indicator.points[0].ts)).toBe('2023-06-01');
    expect(formatDay(indicator.points[12].ts)).toBe('2024-06-01');
  });

  it('flags the output as sample data', () => {
    const indicator = generateSampleIndicator('cruspi', { now: NOW, months: 6 });

    expect(indicator.synthetic).toBe(true);
    expect(indicator.filePath).toBeNull();
    expect(indicator.meta.source.endsWith(SAMPLE_SUFFIX)).toBe(true);
    expect(indicator.meta.description.endsWith(SAMPLE_SUFFIX)).toBe(true);
    expect(indicator.dataSource).toBe('Sample data (CRU Steel Price Index)');
  });

  it('adds a yearly adjustment column for cost indicators only', () => {
    const cost = generateSampleIndicator('komatsu_equipment', { now: NOW, months: 24 });
    const market = generateSampleIndicator('cruspi', { now: NOW, months: 24 });

    const adj = cost.extras.yearly_adjustment;
    expect(adj).toHaveLength(25);
    expect(adj.slice(0, 12).every((v) => v === null)).toBe(true);

    const v0 = cost.points[0].value ?? NaN;
    const v12 = cost.points[12].value ?? NaN;
    expect(adj[12]).toBeCloseTo((v12 / v0 - 1) * 100, 10);
    expect(cost.points[0].value).toBe(180);

    expect(market.extras).toEqual({});
  });
});
