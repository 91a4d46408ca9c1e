import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

// ============================================================================
// Formats
// ============================================================================

const SERVICE_NAME = 'lockstep-host';

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Handle Error objects specially
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
 * Format for structured JSON logging (used in production and file transports).
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
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, sessionId, ...meta }) => {
    const sessionStr = sessionId ? ` [${String(sessionId)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${sessionStr}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger
// ============================================================================

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

if (config.logging.file) {
  const logFile = path.resolve(config.logging.file);
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  logger.add(
    new winston.transports.File({
      filename: logFile,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/**
 * Child logger that tags every entry with the session it belongs to.
 */
export const createSessionLogger = (sessionId: string): winston.Logger =>
  logger.child({ sessionId });

export { logger };
