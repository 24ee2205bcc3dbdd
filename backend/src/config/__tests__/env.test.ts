import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.PORT).toBe(8002);
    expect(env.DATA_DIR).toBe('./data');
    expect(env.FORECAST_HORIZON).toBe(6);
    expect(env.FORECAST_WINDOW).toBe(12);
    expect(env.CORRELATION_MIN_OVERLAP).toBe(6);
    expect(env.SAMPLE_HISTORY_MONTHS).toBe(24);
  });

  it('coerces numeric settings', () => {
    expect(parseEnv({ PORT: '9000', FORECAST_HORIZON: '12' })).toMatchObject({ PORT: 9000, FORECAST_HORIZON: 12 });
  });

  it('lists every invalid setting', () => {
    expect(() => parseEnv({ PORT: 'abc', CORRELATION_MIN_OVERLAP: '1' })).toThrow(
      /PORT:[\s\S]*CORRELATION_MIN_OVERLAP:/,
    );
  });
});
