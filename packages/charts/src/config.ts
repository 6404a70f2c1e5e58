/**
 * Chart engine configuration, read from the environment
 */

import { z } from 'zod';
import { createLogger, type Logger, type LogLevel } from '@trade-charts/shared';

const ChartsEnvSchema = z.object({
  CHARTS_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
  CHARTS_LOG_TO_FILE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  CHARTS_LOG_DIR: z.string().min(1).optional(),
});

export interface ChartsConfig {
  logLevel: LogLevel;
  logToFile: boolean;
  logDir?: string;
}

/**
 * Parse engine settings from env vars
 *
 * @throws ZodError when a variable holds an unsupported value
 */
export function loadChartsConfig(env: NodeJS.ProcessEnv = process.env): ChartsConfig {
  const parsed = ChartsEnvSchema.parse(env);
  return {
    logLevel: parsed.CHARTS_LOG_LEVEL,
    logToFile: parsed.CHARTS_LOG_TO_FILE,
    logDir: parsed.CHARTS_LOG_DIR,
  };
}

let defaultLogger: Logger | undefined;

/**
 * Engine logger used when the caller does not pass one
 */
export function getChartsLogger(): Logger {
  if (!defaultLogger) {
    const config = loadChartsConfig();
    defaultLogger = createLogger({
      service: 'charts',
      level: config.logLevel,
      console: true,
      file: config.logToFile,
      logDir: config.logDir,
    });
  }
  return defaultLogger;
}
