import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError, ValidationError } from './common/errors.js';
import { registerIndicatorsModule } from './modules/indicators/index.js';
import type { PipelineContext } from './modules/indicators/index.js';

export interface BuildAppOptions {
  /** false silences request logging (tests) */
  logger?: boolean;
  /** Pipeline overrides: data dir, clock, cache */
  indicators?: Partial<PipelineContext>;
}

/**
 * Build Fastify Application
 */
export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: opts.logger === false ? false : { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      else app.log.warn({ code: err.code, err: err.message }, 'Request rejected');

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err instanceof ValidationError && err.details.length > 0 ? { details: err.details } : {}),
      });
    }

    app.log.error(err);

    // Fastify validation errors (malformed JSON body etc.)
    if (err.validation || (err.statusCode !== undefined && err.statusCode < 500)) {
      return reply.status(err.statusCode ?? 400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    return reply.status(500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerIndicatorsModule(fastify, opts.indicators);
  });

  return app;
}
