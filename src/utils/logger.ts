import path from 'path';
import winston from 'winston';
import { appConfig } from '../config';

const { logging } = appConfig;

const rotation = {
  ...(logging.maxSizeBytes !== undefined ? { maxsize: logging.maxSizeBytes } : {}),
  ...(logging.maxFiles !== undefined ? { maxFiles: logging.maxFiles } : {}),
};

// Create winston logger instance
const logger = winston.createLogger({
  level: logging.level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
      return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)} ${metaString}`;
    })
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    }),
    ...(logging.toFile
      ? [
          new winston.transports.File({
            filename: path.join(logging.directory, 'error.log'),
            level: 'error',
            ...rotation
          }),
          new winston.transports.File({
            filename: path.join(logging.directory, 'combined.log'),
            ...rotation
          })
        ]
      : [])
  ]
});

export const logEvent = (event: string, meta?: Record<string, unknown>): void => {
  const playlistEvent = `🎵 ${event}`;

  if (meta) {
    logger.info(playlistEvent, meta);
  } else {
    logger.info(playlistEvent);
  }
};

export const logError = (message: string, error?: Error, meta?: Record<string, unknown>): void => {
  const playlistError = `🎵💥 ${message}`;

  const errorMeta = {
    ...meta,
    ...(error && {
      error: error.message,
      stack: error.stack
    })
  };

  logger.error(playlistError, errorMeta);
};

export const logWarning = (message: string, meta?: Record<string, unknown>): void => {
  const playlistWarning = `🎵⚠️ ${message}`;

  if (meta) {
    logger.warn(playlistWarning, meta);
  } else {
    logger.warn(playlistWarning);
  }
};

export const logDebug = (message: string, meta?: Record<string, unknown>): void => {
  const playlistDebug = `🎵🔍 ${message}`;

  if (meta) {
    logger.debug(playlistDebug, meta);
  } else {
    logger.debug(playlistDebug);
  }
};

/** Message and stack of whatever was thrown, for log metadata. */
export const describeError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export { logger };
