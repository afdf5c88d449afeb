import winston from 'winston';
import { ENV_KEYS, isDevelopment, isProduction, PATHS } from '@filmbus/config';

export type Logger = winston.Logger;

function resolveLevel(): string {
  return process.env[ENV_KEYS.LOG_LEVEL] || (isDevelopment() ? 'debug' : 'info');
}

/**
 * Create a logger instance with consistent formatting
 */
export function createLogger(service: string): Logger {
  const format = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
      let msg = `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}`;
      if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
      }
      return msg;
    })
  );

  const logger = winston.createLogger({
    level: resolveLevel(),
    format,
    defaultMeta: { service },
    silent: process.env[ENV_KEYS.LOG_SILENT] === 'true',
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
    ],
  });

  // Add file transports in production
  if (isProduction()) {
    logger.add(
      new winston.transports.File({
        filename: `${PATHS.LOGS}/error.log`,
        level: 'error',
      })
    );
    logger.add(
      new winston.transports.File({
        filename: `${PATHS.LOGS}/combined.log`,
      })
    );
  }

  return logger;
}
