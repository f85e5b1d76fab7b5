import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { config } from '../config';
import { SwapRecord, SwapStatus } from '../types';
import { describeError, GasOptimizerError } from './errors';

const logDir = path.join(process.cwd(), 'logs');

// JSON.stringify throws on bigint, and most of the amounts logged here are bigints.
const bigintReplacer = (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value);

function stringifyMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, bigintReplacer);
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json({ replacer: bigintReplacer })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${stringifyMeta(meta)}`;
    }
    return msg;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
  }),
];

if (config.logging.toFile) {
  transports.push(
    new DailyRotateFile({
      filename: path.join(logDir, 'gas-optimizer-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
      format: logFormat,
    }),
    new DailyRotateFile({
      filename: path.join(logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
      level: 'error',
      format: logFormat,
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  transports,
});

export function logSwap(message: string, data?: Record<string, unknown>) {
  logger.info(`[SWAP] ${message}`, data);
}

export function logTransition(record: SwapRecord, from: SwapStatus) {
  logger.info(`[SWAP] ${record.swapId} ${from} -> ${record.status}`, {
    user: record.user,
    destinationChain: record.destinationChain,
    failureReason: record.failureReason,
  });
}

export function logError(message: string, error: unknown) {
  const meta: Record<string, unknown> = { error: describeError(error) };
  if (error instanceof GasOptimizerError) {
    meta.code = error.code;
    meta.details = error.details;
  }
  if (error instanceof Error) {
    meta.stack = error.stack;
  }
  logger.error(`[ERROR] ${message}`, meta);
}
