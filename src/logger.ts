import { Writable } from 'node:stream';

import pino from 'pino';
import { z } from 'zod';

export const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('production'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();
let rootLogger: Logger | undefined;

function createRootLogger(): Logger {
  const env = validateLoggerEnv();
  const isTestEnv = env.NODE_ENV === 'test' || process.env['VITEST'] === 'true';

  const options: pino.LoggerOptions = {
    base: { pid: process.pid },
    level: env.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Logs go to stderr so stdout only ever carries the report.
  if (isTestEnv) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(options, noopStream);
  }
  return pino(options, pino.destination(2));
}

/**
 * Returns a child logger tagged with `category`, created on first use and
 * cached for the lifetime of the process.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  const logger = rootLogger.child({ category });
  loggerCache.set(category, logger);
  return logger;
}
