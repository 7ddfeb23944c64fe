import pino, { type LoggerOptions } from 'pino';
import type { EnvConfig } from '../config/env.js';

export type Logger = pino.Logger;

// Amounts are bigint end to end; log records carry them as decimal strings.
function stringifyBigints(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}

export function createLogger(config: Pick<EnvConfig, 'LOG_LEVEL' | 'NODE_ENV'>): Logger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    base: { service: 'collateral-ledger' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      log: stringifyBigints,
    },
    redact: {
      paths: ['REDIS_URL', 'redisUrl', 'headers.authorization', 'headers.cookie'],
      censor: '[REDACTED]',
    },
  };

  if (config.NODE_ENV === 'development') {
    options.transport = { target: 'pino/file', options: { destination: 1 } };
  }

  return pino(options);
}
