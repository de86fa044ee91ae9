import winston from 'winston';
import path from 'path';
import fs from 'fs';
import DailyRotateFile from 'winston-daily-rotate-file';

const isTest = process.env.NODE_ENV === 'test';
const isProduction = process.env.NODE_ENV === 'production';

/**
 * File log format (JSON structured)
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json(),
);

/**
 * Developer console format (color + readable)
 */
const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${extra}`;
  }),
);

/**
 * Daily-rotated error and combined logs. Tests never touch the disk.
 */
const buildFileTransports = (): winston.transport[] => {
  if (isTest) return [];

  const logDir = path.resolve(process.env.LOG_DIR || 'logs');
  if (!fs.existsSync(logDir)) fs.mkdirSync(logDir, { recursive: true });

  return [
    // 🔴 Error logs (daily rotation)
    new DailyRotateFile({
      dirname: logDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      level: 'error',
      maxSize: '10m',
      maxFiles: '14d',
    }),

    // 🟢 Combined logs (info + errors)
    new DailyRotateFile({
      dirname: logDir,
      filename: 'combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '14d',
    }),
  ];
};

/**
 * Create Winston logger
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  defaultMeta: { service: process.env.SERVICE_NAME || 'reddit-extractor-api' },
  format: fileFormat,
  silent: isTest,
  transports: buildFileTransports(),
});

/**
 * Console transport for dev/local environments
 */
if (!isProduction && !isTest) {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
    }),
  );
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const scoped =
  (level: LogLevel, prefix: string) =>
  (message: string, meta?: Record<string, unknown>): void => {
    if (meta) logger.log(level, `${prefix} ${message}`, meta);
    else logger.log(level, `${prefix} ${message}`);
  };

/**
 * Scoped logger, e.g. `jobLogger(id).info('claimed')` → `[Job <id>] claimed`.
 */
export const jobLogger = (jobId: string) => ({
  debug: scoped('debug', `[Job ${jobId}]`),
  info: scoped('info', `[Job ${jobId}]`),
  warn: scoped('warn', `[Job ${jobId}]`),
  error: scoped('error', `[Job ${jobId}]`),
});

/**
 * Handle fatal errors gracefully
 */
process.on('uncaughtException', (err) => {
  logger.error('💥 Uncaught Exception:', err);
});
process.on('unhandledRejection', (reason) => {
  logger.error('⚠️ Unhandled Promise Rejection:', reason);
});

/**
 * Graceful shutdown for logs
 */
export const closeLogger = async (): Promise<void> =>
  new Promise((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
