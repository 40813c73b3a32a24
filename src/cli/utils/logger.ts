import winston from 'winston';
import { config, AppConfig } from '../config';

const SERVICE_NAME = 'tictactoe-cli';
const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

// ============================================================================
// Formats
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging (file transport, and stderr when LOG_FORMAT=json).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(
    ({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
    }
  )
);

// ============================================================================
// Logger
// ============================================================================

/**
 * Build a logger for the given config.
 *
 * Every level goes to stderr: stdout carries the game itself and must stay
 * free of log lines.
 */
export function createLogger(
  appConfig: Pick<AppConfig, 'nodeEnv' | 'isTest' | 'logging'>
): winston.Logger {
  const consoleTransport = new winston.transports.Console({
    format: appConfig.logging.format === 'json' ? jsonFormat : consoleFormat,
    stderrLevels: ALL_LEVELS,
  });

  const fileTransports = appConfig.logging.file
    ? [
        new winston.transports.File({
          filename: appConfig.logging.file,
          format: jsonFormat,
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
      ]
    : [];

  return winston.createLogger({
    level: appConfig.logging.level,
    silent: appConfig.isTest,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: appConfig.nodeEnv,
    },
    transports: [consoleTransport, ...fileTransports],
  });
}

const logger = createLogger(config);

export { logger };
