/**
 * INDICATORS MODULE
 *
 * Market and cost indicators read from CSV files in the data directory,
 * with trend forecasts, correlation and derived composites on top.
 * Indicators without a data file are served from deterministic sample data
 * and flagged `synthetic`.
 */

import { FastifyInstance } from 'fastify';
import { env } from '../../config/env.js';
import { registerIndicatorRoutes } from './api/indicators.routes.js';
import { fileCache } from './reader/indicator_file.reader.js';
import type { PipelineContext } from './services/indicator_view.service.js';

// ═══════════════════════════════════════════════════════════════
// REGISTER MODULE
// ═══════════════════════════════════════════════════════════════

export function defaultPipelineContext(fastify: FastifyInstance): PipelineContext {
  return {
    dataDir: env.DATA_DIR,
    now: () => new Date(),
    cache: fileCache,
    logger: fastify.log,
    sampleMonths: env.SAMPLE_HISTORY_MONTHS,
    forecast: {
      horizon: env.FORECAST_HORIZON,
      window: env.FORECAST_WINDOW,
      method: 'linear',
    },
    minOverlap: env.CORRELATION_MIN_OVERLAP,
  };
}

export async function registerIndicatorsModule(
  fastify: FastifyInstance,
  overrides: Partial<PipelineContext> = {},
): Promise<void> {
  const ctx: PipelineContext = { ...defaultPipelineContext(fastify), ...overrides };

  await registerIndicatorRoutes(fastify, ctx);

  fastify.log.info({ dataDir: ctx.dataDir }, 'Indicators module registered at /api/indicators/*');
}

// Re-export types and services
export * from './contracts/indicator.contracts.js';
export * from './data/indicator_sources.registry.js';
export { loadIndicator, loadIndicators, readIndicatorFile } from './reader/indicator_file.reader.js';
export { ensureDataDirs } from './reader/data_dirs.js';
export { forecastSeries, resolveForecast } from './services/forecast.service.js';
export { computeCorrelationMatrix, pearsonCorrelation } from './services/correlation.service.js';
export { alignSeries, computeDerivedIndicator, fillGaps } from './services/series_transform.service.js';
export type { PipelineContext } from './services/indicator_view.service.js';
