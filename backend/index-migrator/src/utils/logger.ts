/**
 * Logger Utility
 * Winston を使用したロギングユーティリティ
 */

import winston from 'winston';
import * as path from 'path';
import { createCircularReplacer, serializeError } from './safe-json';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_DIR = process.env.LOG_DIR;
const LOG_MAX_FILES = parseInt(process.env.LOG_MAX_FILES || '30', 10);
const LOG_MAX_SIZE_MB = parseInt(process.env.LOG_MAX_SIZE || '50', 10);

/**
 * メタデータを1行のJSONに整形（循環参照対応）
 */
function formatMetadata(metadata: Record<string, unknown>, space?: number): string {
  if (Object.keys(metadata).length === 0) {
    return '';
  }

  try {
    const processed = { ...metadata };
    if (processed.error instanceof Error) {
      processed.error = serializeError(processed.error);
    }
    return ` ${JSON.stringify(processed, createCircularReplacer(), space)}`;
  } catch (error) {
    return ` [Metadata serialization error: ${error instanceof Error ? error.message : String(error)}]`;
  }
}

/**
 * ファイル出力用フォーマット
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, label, ...metadata }) => {
    let msg = `${timestamp} [${level.toUpperCase()}]`;

    if (label) {
      msg += ` [${label}]`;
    }

    return `${msg} ${message}${formatMetadata(metadata)}`;
  })
);

/**
 * コンソール出力用のカラーフォーマット
 */
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss'
  }),
  winston.format.printf(({ timestamp, level, message, label, ...metadata }) => {
    let msg = `${timestamp} ${level}`;

    if (label) {
      msg += ` [${label}]`;
    }

    return `${msg} ${message}${formatMetadata(metadata)}`;
  })
);

function fileTransports(dir: string): winston.transport[] {
  return [
    new winston.transports.File({
      filename: path.join(dir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: LOG_MAX_FILES
    }),
    new winston.transports.File({
      filename: path.join(dir, 'combined.log'),
      format: fileFormat,
      maxsize: LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: LOG_MAX_FILES
    })
  ];
}

/**
 * デフォルトのロガーを作成
 * LOG_DIR が指定された場合のみファイルに出力する
 */
const defaultLogger = winston.createLogger({
  level: LOG_LEVEL,
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  transports: [
    new winston.transports.Console({
      format: consoleFormat
    }),
    ...(LOG_DIR ? fileTransports(LOG_DIR) : [])
  ]
});

/**
 * ラベル付きロガーを作成
 */
export function createLogger(label: string): winston.Logger {
  return defaultLogger.child({ label });
}

/**
 * ログレベルを動的に変更
 */
export function setLogLevel(level: string): void {
  defaultLogger.level = level;
}

/**
 * ログをフラッシュ（すべてのトランスポートを閉じる）
 */
export async function flushLogs(): Promise<void> {
  return new Promise((resolve) => {
    defaultLogger.on('finish', () => resolve());
    defaultLogger.end();
  });
}
