import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggingSettings {
  level: LogLevel;
  filePath?: string;
}

let settings: LoggingSettings = { level: 'warn' };
let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  const filePath = settings.filePath;
  if (!filePath) return null;
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      process.stderr.write(`log file sink disabled: ${error.message}\n`);
      settings = { ...settings, filePath: undefined };
      fileSink = null;
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (error) {
    process.stderr.write(`log file sink unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
    settings = { ...settings, filePath: undefined };
    return null;
  }
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const context = getLogContext();
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...context,
    ...baseContext,
    ...(data ? redactSecrets(data) : {}),
  };
}

/**
 * Every record goes to the file sink when one is configured; stderr only
 * receives records at or above the configured level, so stdout stays the
 * conversation.
 */
function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  if (LEVEL_ORDER[record.level] >= LEVEL_ORDER[settings.level]) {
    process.stderr.write(`${line}\n`);
  }
  ensureFileSink()?.write(`${line}\n`);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Apply logging settings from configuration. Safe to call more than once.
 */
export function configureLogging(next: { level?: LogLevel; filePath?: string }): void {
  settings = {
    level: next.level ?? settings.level,
    filePath: next.filePath,
  };

  if (!sinkHooksInstalled) {
    sinkHooksInstalled = true;
    process.once('exit', closeFileSink);
  }
}

/**
 * Restore defaults and close the file sink.
 */
export function resetLogging(): void {
  closeFileSink();
  settings = { level: 'warn' };
}
