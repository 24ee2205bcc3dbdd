/**
 * File reader and indicator loading
 */

import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EmptyDatasetError, MissingFileError } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import {
  IndicatorFileCache,
  loadIndicator,
  loadIndicators,
  readIndicatorFile,
} from '../reader/indicator_file.reader.js';
import { formatDay } from '../utils/time.utils.js';
import { createMockLogger, makeTmpDir, removeDir, writeFile } from './fixtures.js';

const NOW = new Date(Date.UTC(2024, 5, 15));

describe('readIndicatorFile', () => {
  let dir: string;
  let logger: Logger;

  beforeEach(() => {
    dir = makeTmpDir();
    logger = createMockLogger();
  });

  afterEach(() => removeDir(dir));

  it('keeps every row except the malformed ones', () => {
    const file = writeFile(
      dir,
      'mixed.csv',
      [
        'Date,value',
        '2024-01-01,100',
        '2024-02-01,101.5',
        '2024-03-01,abc',
        'not-a-date,5',
        '2024-04-01,',
        '2024-05-01,"1,050"',
        '2024-02-01,99',
      ].join('\n'),
    );

    const indicator = readIndicatorFile(file, { logger });

    expect(indicator.points).toHaveLength(7 - 3);
    expect(indicator.skippedRows).toBe(3);
    expect(indicator.points.map((p) => p.value)).toEqual([100, 101.5, null, 1050]);
    expect(indicator.points.map((p) => formatDay(p.ts))).toEqual([
      '2024-01-01',
      '2024-02-01',
      '2024-04-01',
      '2024-05-01',
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ file, reason: 'non-numeric value "abc"' }),
      'Skipping malformed row',
    );
  });

  it('sorts rows and accepts M/D/YYYY dates', () => {
    const file = writeFile(dir, 'us.csv', 'Date,value\n3/1/2024,3\n1/15/2024,1\n2/1/2024,2\n');

    const indicator = readIndicatorFile(file, { logger });

    expect(indicator.points.map((p) => formatDay(p.ts))).toEqual(['2024-01-15', '2024-02-01', '2024-03-01']);
    expect(indicator.points.map((p) => p.value)).toEqual([1, 2, 3]);
  });

  it('matches column names case-insensitively', () => {
    const file = writeFile(dir, 'case.csv', 'date,VALUE\n2024-01-01,7\n');

    expect(readIndicatorFile(file, { logger }).points[0].value).toBe(7);
  });

  it('derives id, data source and absolute path from the file', () => {
    const file = writeFile(dir, 'raw/baltic_dry_index.csv', 'Date,value\n2024-01-01,1500\n');

    const indicator = readIndicatorFile(file, { logger });

    expect(indicator.name).toBe('baltic_dry_index');
    expect(indicator.meta.displayName).toBe('Baltic Dry Index');
    expect(indicator.synthetic).toBe(false);
    expect(indicator.dataSource).toBe('Data from file: baltic_dry_index.csv');
    expect(indicator.filePath).toBe(path.resolve(file));
  });

  it('lets metadata columns override the registry defaults', () => {
    const file = writeFile(
      dir,
      'meta.csv',
      'Date,value,unit,source,preferred_direction\n2024-01-01,1,USD/t,Mill survey,UP\n2024-02-01,2,,,\n',
    );

    const indicator = readIndicatorFile(file, { indicatorId: 'cruspi', logger });

    expect(indicator.meta.displayName).toBe('CRU Steel Price Index');
    expect(indicator.meta.unit).toBe('USD/t');
    expect(indicator.meta.source).toBe('Mill survey');
    expect(indicator.meta.preferredDirection).toBe('up');
    expect(indicator.meta.category).toBe('market');
  });

  it('reads the yearly adjustment column when present', () => {
    const file = writeFile(dir, 'cost.csv', 'Date,value,yearly_adjustment\n2024-01-01,180,2.5\n2024-02-01,181,\n');

    const indicator = readIndicatorFile(file, { logger });

    expect(indicator.extras.yearly_adjustment).toEqual([2.5, null]);
  });

  it('throws MissingFileError for an absent file', () => {
    expect(() => readIndicatorFile(path.join(dir, 'nope.csv'), { logger })).toThrow(MissingFileError);
  });

  it('throws EmptyDatasetError when the value column is missing', () => {
    const file = writeFile(dir, 'nocol.csv', 'Date,price\n2024-01-01,1\n');

    expect(() => readIndicatorFile(file, { logger })).toThrow(EmptyDatasetError);
    expect(logger.error).toHaveBeenCalledWith(expect.objectContaining({ file }), 'Required columns missing');
  });

  it('throws EmptyDatasetError when no row parses', () => {
    const file = writeFile(dir, 'bad.csv', 'Date,value\nyesterday,1\n2024-01-01,lots\n');

    let caught: unknown;
    try {
      readIndicatorFile(file, { logger });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(EmptyDatasetError);
    expect(caught instanceof EmptyDatasetError && caught.skippedRows).toBe(2);
  });
});

describe('loadIndicator', () => {
  let dir: string;
  let logger: Logger;

  beforeEach(() => {
    dir = makeTmpDir();
    logger = createMockLogger();
  });

  afterEach(() => removeDir(dir));

  it('falls back to a synthetic placeholder when no file exists', () => {
    const result = loadIndicator('cruspi', { dataDir: dir, now: NOW, sampleMonths: 24, cache: null, logger });

    expect(result.state).toBe('PLACEHOLDER');
    if (result.state === 'NO_DATA') return;

    const { indicator } = result;
    expect(indicator.synthetic).toBe(true);
    expect(indicator.points).toHaveLength(25);
    expect(formatDay(indicator.points[0].ts)).toBe('2022-06-01');
    expect(formatDay(indicator.points[24].ts)).toBe('2024-06-01');
    expect(indicator.meta.source).toBe('CRU Steel Price Index (Sample Data)');
    expect(logger.warn).toHaveBeenCalledWith({ indicatorId: 'cruspi' }, 'No data files found, using sample data');
  });

  it('never serves a placeholder equal to the real file', () => {
    const placeholder = loadIndicator('cruspi', { dataDir: dir, now: NOW, cache: null, logger });
    writeFile(dir, 'processed/cruspi.csv', 'Date,value\n2024-04-01,100\n2024-05-01,101\n2024-06-01,102\n');
    const real = loadIndicator('cruspi', { dataDir: dir, now: NOW, cache: null, logger });

    expect(real.state).toBe('LOADED');
    if (real.state === 'NO_DATA' || placeholder.state === 'NO_DATA') return;
    expect(real.indicator.synthetic).toBe(false);
    expect(placeholder.indicator.points).not.toEqual(real.indicator.points);
  });

  it('prefers processed monthly files over raw files', () => {
    writeFile(dir, 'raw/wti_oil.csv', 'Date,value\n2024-01-01,70\n');
    writeFile(dir, 'processed/wti_oil_monthly.csv', 'Date,value\n2024-01-01,75\n');

    const result = loadIndicator('wti_oil', { dataDir: dir, cache: null, logger });

    expect(result.state).toBe('LOADED');
    if (result.state === 'NO_DATA') return;
    expect(result.indicator.dataSource).toBe('Data from file: wti_oil_monthly.csv');
    expect(result.indicator.points[0].value).toBe(75);
  });

  it('moves on to the next candidate when a file is unreadable', () => {
    writeFile(dir, 'processed/wti_oil.csv', 'Date,price\n2024-01-01,75\n');
    writeFile(dir, 'raw/wti_oil.csv', 'Date,value\n2024-01-01,70\n');

    const result = loadIndicator('wti_oil', { dataDir: dir, cache: null, logger });

    expect(result.state).toBe('LOADED');
    if (result.state === 'NO_DATA') return;
    expect(result.indicator.points[0].value).toBe(70);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ indicatorId: 'wti_oil' }),
      'Failed to read indicator file',
    );
  });

  it('reports NO_DATA when files exist but none parse', () => {
    writeFile(dir, 'raw/wti_oil.csv', 'Date,value\nsoon,1\n');

    const result = loadIndicator('wti_oil', { dataDir: dir, cache: null, logger });

    expect(result.state).toBe('NO_DATA');
    if (result.state !== 'NO_DATA') return;
    expect(result.reason).toBe('No parseable rows in wti_oil.csv');
    expect(result.triedPaths).toEqual([path.join(path.resolve(dir), 'raw', 'wti_oil.csv')]);
  });

  it('serves repeat loads from the cache', () => {
    writeFile(dir, 'raw/dollar_index.csv', 'Date,value\n2024-01-01,103\n');
    const cache = new IndicatorFileCache();

    const first = loadIndicator('dollar_index', { dataDir: dir, cache, logger });
    const second = loadIndicator('dollar_index', { dataDir: dir, cache, logger });

    expect(cache.size).toBe(1);
    if (first.state === 'NO_DATA' || second.state === 'NO_DATA') throw new Error('expected data');
    expect(second.indicator).toBe(first.indicator);
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it('loads several ids independently', () => {
    writeFile(dir, 'raw/wti_oil.csv', 'Date,value\nsoon,1\n');
    writeFile(dir, 'raw/dollar_index.csv', 'Date,value\n2024-01-01,103\n');

    const results = loadIndicators(['wti_oil', 'dollar_index', 'cruspi'], {
      dataDir: dir,
      now: NOW,
      cache: null,
      logger,
    });

    expect(results.map((r) => [r.indicatorId, r.state])).toEqual([
      ['wti_oil', 'NO_DATA'],
      ['dollar_index', 'LOADED'],
      ['cruspi', 'PLACEHOLDER'],
    ]);
  });
});
