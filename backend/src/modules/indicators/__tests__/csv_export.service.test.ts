import { describe, it, expect } from 'vitest';
import type { CorrelationMatrix, ForecastSegment } from '../contracts/indicator.contracts.js';
import { correlationToCsv, costAdjustmentsToCsv, seriesToCsv } from '../services/csv_export.service.js';
import { day } from './fixtures.js';

describe('seriesToCsv', () => {
  it('writes history then the projected tail', () => {
    const forecast: ForecastSegment = {
      indicatorId: 's',
      projected: true,
      method: 'linear',
      origin: 'MODEL',
      startsAt: day('2024-03-01'),
      points: [{ ts: day('2024-03-01'), value: 12.5, lower: 11, upper: 14 }],
      fit: null,
    };

    const csv = seriesToCsv(
      {
        name: 's',
        points: [
          { ts: day('2024-01-01'), value: 10 },
          { ts: day('2024-02-01'), value: 10, interpolated: true },
        ],
      },
      forecast,
    );

    expect(csv).toBe(
      'Date,value,interpolated,projected,lower_ci,upper_ci\n' +
        '2024-01-01,10,false,false,,\n' +
        '2024-02-01,10,true,false,,\n' +
        '2024-03-01,12.5,false,true,11,14\n',
    );
  });

  it('leaves gaps empty', () => {
    const csv = seriesToCsv({ name: 's', points: [{ ts: day('2024-01-01'), value: null }] });

    expect(csv.split('\n')[1]).toBe('2024-01-01,,false,false,,');
  });
});

describe('correlationToCsv', () => {
  it('writes a labelled square matrix', () => {
    const matrix: CorrelationMatrix = {
      ids: ['a', 'b'],
      values: [
        [1, 0.5],
        [0.5, null],
      ],
      overlap: [
        [12, 12],
        [12, 12],
      ],
      window: { from: null, to: null },
      minOverlap: 6,
      resample: 'none',
    };

    expect(correlationToCsv(matrix)).toBe(',a,b\na,1,0.5\nb,0.5,\n');
  });
});

describe('costAdjustmentsToCsv', () => {
  it('writes signed adjustments with their effective period', () => {
    const csv = costAdjustmentsToCsv([
      {
        indicatorId: 'komatsu_equipment',
        displayName: 'Komatsu Heavy Equipment Cost Index',
        adjustmentPct: 2.5,
        synthetic: false,
        effectiveFrom: day('2024-04-01'),
        effectiveTo: day('2025-03-31'),
      },
      {
        indicatorId: 'explosives',
        displayName: 'Explosives',
        adjustmentPct: -1.234,
        synthetic: true,
        effectiveFrom: day('2024-04-01'),
        effectiveTo: day('2025-03-31'),
      },
    ]);

    expect(csv).toBe(
      'Indicator,Adjustment,Effective Period\n' +
        'Komatsu Heavy Equipment Cost Index,+2.50%,"Apr 01, 2024 - Mar 31, 2025"\n' +
        'Explosives,-1.23%,"Apr 01, 2024 - Mar 31, 2025"\n',
    );
  });
});
