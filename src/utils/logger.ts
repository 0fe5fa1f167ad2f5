import util from 'node:util';
import winston from 'winston';

const WINSTON_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

type WinstonLevel = (typeof WINSTON_LEVELS)[number];

export type LogLevel = WinstonLevel | 'silent';

const DEFAULT_LOG_LEVEL: WinstonLevel = 'info';

const isWinstonLevel = (value: string): value is WinstonLevel => WINSTON_LEVELS.some((level) => level === value);

/**
 * LOG_LEVEL の値を正規化（不明な値は info）
 */
export function normalizeLevel(level: string | undefined): LogLevel {
  const normalized = level?.trim().toLowerCase();
  if (!normalized) return DEFAULT_LOG_LEVEL;
  if (normalized === 'silent') return 'silent';
  return isWinstonLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

function formatMeta(meta: Record<string, unknown>): string {
  if (Object.keys(meta).length === 0) {
    return '';
  }
  return ` ${util.inspect(meta, { depth: 4, breakLength: 80, colors: false })}`;
}

const consoleFormat = winston.format.printf((info) => {
  const { timestamp, level, message, stack, context, metadata } = info;
  const meta = metadata && typeof metadata === 'object' ? { ...metadata } : {};
  const contextLabel = typeof context === 'string' ? `[${context}] ` : '';
  const body = typeof stack === 'string' ? stack : String(message);
  return `${String(timestamp)} ${level}: ${contextLabel}${body}${formatMeta(meta)}`;
});

const initialLevel = normalizeLevel(process.env['LOG_LEVEL']);

const rootLogger = winston.createLogger({
  level: initialLevel === 'silent' ? DEFAULT_LOG_LEVEL : initialLevel,
  levels: winston.config.npm.levels,
  silent: initialLevel === 'silent',
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
    }),
  ],
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'label', 'context', 'stack'] }),
    consoleFormat,
  ),
});

export type Logger = winston.Logger;

/**
 * モジュール単位のロガーを取得
 */
export function createLogger(context: string): Logger {
  return rootLogger.child({ context });
}

export function setLogLevel(level: string): void {
  const normalized = normalizeLevel(level);
  rootLogger.level = normalized === 'silent' ? DEFAULT_LOG_LEVEL : normalized;
  rootLogger.silent = normalized === 'silent';
}

export function getLogLevel(): LogLevel {
  return rootLogger.silent ? 'silent' : normalizeLevel(rootLogger.level);
}
