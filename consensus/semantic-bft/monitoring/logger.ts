// consensus/semantic-bft/monitoring/logger.ts
// winston logger shared by the simulator components

import winston from 'winston';
import { ConfigurationError } from '../core/errors';
import { LOG_LEVELS, LoggingConfig } from '../core/config/config-manager';

export type LogLevel = LoggingConfig['level'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Pick a command-line level override, falling back to the configured one
 */
export function resolveLogLevel(override: string | undefined, fallback: LogLevel): LogLevel {
  if (override === undefined) return fallback;
  if (!isLogLevel(override)) {
    throw new ConfigurationError(`Unknown log level ${override}, expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return override;
}

export function createLogger(config: LoggingConfig): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message}`)
      )
    })
  ];

  if (config.file) {
    transports.push(new winston.transports.File({
      filename: config.file,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      )
    }));
  }

  return winston.createLogger({
    level: config.level,
    silent: config.silent,
    transports
  });
}
