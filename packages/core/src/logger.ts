import { appendFileSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { rootLogger } from './logging/pino-setup.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const LOG_DIR = resolve(__dirname, '../.logs');

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Reads the current log level from AUTHWIRE_LOG_LEVEL.
 * Defaults to 'info' if not set or invalid.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.AUTHWIRE_LOG_LEVEL || '').toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

function enabled(min: LogLevel): boolean {
  return LEVELS[currentLevel()] >= LEVELS[min];
}

/**
 * Stable per-process run identifier so log lines from one process share a file.
 * @internal
 */
function runId(): string {
  if (!process.env.AUTHWIRE_RUN_ID) {
    process.env.AUTHWIRE_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.AUTHWIRE_RUN_ID;
}

/**
 * Path of the JSON Lines event log for the current run.
 * @internal
 */
function logFilePath(): string {
  return resolve(LOG_DIR, `run-${runId()}.jsonl`);
}

/**
 * Writes a structured log event.
 *
 * Every event goes to the pino root logger (silent unless its level is
 * raised). The JSON Lines file is written when AUTHWIRE_LOG is `1`/`true`,
 * subject to the AUTHWIRE_LOG_LEVEL threshold; error-level events are always
 * written.
 * @param level - Log severity level
 * @param event - Event identifier for categorization
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  rootLogger[level]({ event, data });

  const loggingEnabled =
    process.env.AUTHWIRE_LOG === '1' ||
    process.env.AUTHWIRE_LOG === 'true' ||
    level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    appendFileSync(logFilePath(), JSON.stringify(entry) + '\n', {
      encoding: 'utf8',
    });
  } catch (error) {
    // The event log is best effort; pino already received the entry.
    rootLogger.debug({ err: error }, 'event log write failed');
  }
}

/**
 * Logs an error event with its message, stack and code.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(context: string, rawError: unknown, extra?: unknown): void {
  const details =
    rawError instanceof Error
      ? {
          message: rawError.message,
          stack: rawError.stack,
          code: 'code' in rawError ? rawError.code : undefined,
        }
      : { message: String(rawError) };

  logEvent('error', `error:${context}`, {
    ...details,
    extra,
    argv: process.argv,
    cwd: process.cwd(),
  });
}
