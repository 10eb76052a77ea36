/**
 * Structured Logger (pino-backed)
 *
 * Every log line is a JSON object containing:
 *   - `level`  : pino numeric level
 *   - `time`   : epoch ms
 *   - `service`: the tag passed to `createLogger`
 *   - `runId`  : auto-injected from AsyncLocalStorage (when inside a batch run)
 *   - `msg`    : human-readable message
 *   - …any extra fields from the payload object
 *
 * Lines go to stderr; stdout belongs to the CLI's JSON output. Pipe through
 * `pino-pretty` for human-readable formatting:
 *   npm start -- squad 5356 2> >(npx pino-pretty)
 */

import pino from 'pino';
import { getEnv } from '../config/env';
import { getRunContext } from './runContext';

// ─────────────────────────────────────────────────────────────────────────────
// Root pino instance
// ─────────────────────────────────────────────────────────────────────────────

function resolveLevel(): string {
  const env = getEnv();
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

const rootLogger = pino(
  {
    level: resolveLevel(),
    // Inject runId into every log line automatically via a mixin
    mixin() {
      const ctx = getRunContext();
      return ctx ? { runId: ctx.runId } : {};
    },
    // Serialise Error objects cleanly
    serializers: pino.stdSerializers,
  },
  pino.destination(2),
);

// ─────────────────────────────────────────────────────────────────────────────
// Public interface
// ─────────────────────────────────────────────────────────────────────────────

export type LogPayload = Record<string, unknown>;

export interface Logger {
  info(payload: LogPayload | string, message?: string): void;
  debug(payload: LogPayload | string, message?: string): void;
  warn(payload: LogPayload | string, message?: string): void;
  error(payload: LogPayload | string, message?: string): void;
}

/**
 * Create a child logger scoped to a specific service / module.
 *
 *   const logger = createLogger('normalizer');
 *   logger.warn({ playerId }, 'No minutes or appearances provided');
 *   logger.error('Something went wrong');
 */
export function createLogger(prefix: string): Logger {
  const child = rootLogger.child({ service: prefix });

  function log(
    level: 'info' | 'debug' | 'warn' | 'error',
    payload: LogPayload | string,
    message?: string,
  ): void {
    if (typeof payload === 'string') {
      child[level](payload);
    } else {
      child[level](payload, message ?? '');
    }
  }

  return {
    info: (p, m) => log('info', p, m),
    debug: (p, m) => log('debug', p, m),
    warn: (p, m) => log('warn', p, m),
    error: (p, m) => log('error', p, m),
  };
}
