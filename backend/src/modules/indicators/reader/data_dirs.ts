/**
 * DATA DIRECTORY LAYOUT
 *
 *   <DATA_DIR>/raw         files as collected
 *   <DATA_DIR>/processed   cleaned / monthly files (preferred)
 *   <DATA_DIR>/forecasts   pre-computed forecast files
 */

import fs from 'fs';
import path from 'path';
import type { Logger } from '../../../common/logger.js';

export const DATA_SUBDIRS = ['raw', 'processed', 'forecasts'] as const;

export type DataSubdir = (typeof DATA_SUBDIRS)[number];

export interface DataDirs {
  base: string;
  raw: string;
  processed: string;
  forecasts: string;
}

export function resolveDataDirs(dataDir: string): DataDirs {
  const base = path.resolve(dataDir);
  return {
    base,
    raw: path.join(base, 'raw'),
    processed: path.join(base, 'processed'),
    forecasts: path.join(base, 'forecasts'),
  };
}

/**
 * History file candidates, in priority order
 */
export function indicatorFileCandidates(dirs: DataDirs, indicatorId: string): string[] {
  return [
    path.join(dirs.processed, `${indicatorId}_monthly.csv`),
    path.join(dirs.processed, `${indicatorId}.csv`),
    path.join(dirs.raw, `${indicatorId}.csv`),
    path.join(dirs.raw, `${indicatorId}_sample.csv`),
    path.join(dirs.base, `${indicatorId}.csv`),
  ];
}

export function forecastFileCandidates(dirs: DataDirs, indicatorId: string): string[] {
  return [
    path.join(dirs.forecasts, `${indicatorId}_forecast.csv`),
    path.join(dirs.forecasts, `${indicatorId}.csv`),
    path.join(dirs.base, `${indicatorId}_forecast.csv`),
  ];
}

export interface DirStatus {
  name: 'base' | DataSubdir;
  path: string;
  created: boolean;
  fileCount: number;
}

/**
 * Create the layout if missing. Safe to run any number of times.
 */
export function ensureDataDirs(dataDir: string, logger?: Logger): DirStatus[] {
  const dirs = resolveDataDirs(dataDir);
  const entries: Array<[DirStatus['name'], string]> = [
    ['base', dirs.base],
    ['raw', dirs.raw],
    ['processed', dirs.processed],
    ['forecasts', dirs.forecasts],
  ];

  return entries.map(([name, dirPath]) => {
    const created = !fs.existsSync(dirPath);
    if (created) {
      fs.mkdirSync(dirPath, { recursive: true });
      logger?.info({ dir: dirPath }, 'Created data directory');
    } else {
      logger?.info({ dir: dirPath }, 'Data directory already present');
    }

    const fileCount = fs
      .readdirSync(dirPath, { withFileTypes: true })
      .filter((e) => e.isFile())
      .length;

    return { name, path: dirPath, created, fileCount };
  });
}

export function dataDirsExist(dataDir: string): Record<'base' | DataSubdir, boolean> {
  const dirs = resolveDataDirs(dataDir);
  return {
    base: fs.existsSync(dirs.base),
    raw: fs.existsSync(dirs.raw),
    processed: fs.existsSync(dirs.processed),
    forecasts: fs.existsSync(dirs.forecasts),
  };
}
