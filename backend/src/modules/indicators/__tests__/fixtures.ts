/**
 * Shared test helpers: temp data dirs, CSV writers, series builders.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { Logger } from '../../../common/logger.js';
import type { Indicator, SeriesPoint } from '../contracts/indicator.contracts.js';

export const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'indicators-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, relPath: string, content: string): string {
  const filePath = path.join(dir, relPath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

export function day(iso: string): Date {
  return new Date(`${iso}T00:00:00.000Z`);
}

/**
 * Points on the 1st of consecutive months starting at `startIso` (YYYY-MM)
 */
export function monthly(startIso: string, values: Array<number | null>): SeriesPoint[] {
  const [y, m] = startIso.split('-').map(Number);
  return values.map((value, i) => ({ ts: new Date(Date.UTC(y, m - 1 + i, 1)), value }));
}

/**
 * Points on consecutive days starting at `startIso` (YYYY-MM-DD)
 */
export function daily(startIso: string, values: Array<number | null>): SeriesPoint[] {
  const start = day(startIso).getTime();
  return values.map((value, i) => ({ ts: new Date(start + i * 86_400_000), value }));
}

export function makeIndicator(id: string, points: SeriesPoint[], overrides: Partial<Indicator> = {}): Indicator {
  return {
    name: id,
    points,
    meta: {
      indicatorId: id,
      displayName: id,
      unit: '',
      source: 'test',
      description: 'test series',
      preferredDirection: 'neutral',
      category: 'market',
    },
    synthetic: false,
    dataSource: 'test',
    filePath: null,
    skippedRows: 0,
    extras: {},
    ...overrides,
  };
}
