#!/usr/bin/env node
/**
 * DATA DIRECTORY SETUP
 *
 * Creates <DATA_DIR> with raw/, processed/ and forecasts/ beneath it.
 * Safe to re-run: existing directories and files are left alone.
 *
 * Run: npm run setup:data
 */

import { env } from '../src/config/env.js';
import { createLogger } from '../src/common/logger.js';
import { ensureDataDirs } from '../src/modules/indicators/reader/data_dirs.js';

const logger = createLogger('setup-data-dir');

try {
  const statuses = ensureDataDirs(env.DATA_DIR, logger);

  for (const s of statuses) {
    logger.info({ dir: s.name, path: s.path, files: s.fileCount }, `${s.name}: ${s.fileCount} file(s)`);
  }

  const created = statuses.filter((s) => s.created).length;
  logger.info(
    { dataDir: env.DATA_DIR, created, existing: statuses.length - created },
    'Data directory ready. Put source CSV files in raw/ or processed/, forecasts in forecasts/',
  );
} catch (err) {
  logger.error({ dataDir: env.DATA_DIR, err: err instanceof Error ? err.message : String(err) }, 'Setup failed');
  process.exitCode = 1;
}
