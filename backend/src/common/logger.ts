import { pino } from 'pino';
import { env } from '../config/env.js';

// ═══════════════════════════════════════════════════════════════
// LOGGER CONTRACT
// ═══════════════════════════════════════════════════════════════

/**
 * Minimal pino-shaped logger. Fastify's `app.log`, a pino instance and
 * test doubles all satisfy it.
 */
export interface Logger {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
  debug?: (obj: Record<string, unknown>, msg?: string) => void;
}

export function createLogger(name: string): Logger {
  return pino({ name, level: env.LOG_LEVEL });
}

export const logger: Logger = createLogger('indicators');
