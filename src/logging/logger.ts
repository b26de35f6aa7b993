/**
 * Structured Logger
 *
 * One JSON object per line on stdout. Every entry carries the service
 * name and a correlation id; child loggers narrow the context to a
 * component or a single request.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogMetadata = Record<string, unknown>;

export interface LogContext {
  correlationId?: string;
  component?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  metadata?: LogMetadata;
  error?: { name: string; message: string; stack?: string };
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

/** Sink for finished entries; tests swap it to capture them. */
export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Defaults to 'meter-exporter'. */
  service?: string;
  /** Entries below this level are dropped. Defaults to 'info'. */
  level?: LogLevel;
  context?: LogContext;
  output?: LogOutput;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

function writeJsonLine(entry: LogEntry): void {
  process.stdout.write(`${JSON.stringify(entry)}\n`);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'meter-exporter';
  const level = options.level ?? 'info';
  const output = options.output ?? writeJsonLine;
  const correlationId = options.context?.correlationId ?? randomUUID();
  const component = options.context?.component;

  function emit(entryLevel: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (SEVERITY[entryLevel] < SEVERITY[level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      service,
      correlationId,
    };
    if (component) entry.component = component;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;
    if (error) entry.error = { name: error.name, message: error.message, stack: error.stack };

    output(entry);
  }

  return {
    debug: (message, metadata) => emit('debug', message, undefined, metadata),
    info: (message, metadata) => emit('info', message, undefined, metadata),
    warn: (message, metadata) => emit('warn', message, undefined, metadata),
    error: (message, error, metadata) => emit('error', message, error, metadata),
    fatal: (message, error, metadata) => emit('fatal', message, error, metadata),
    child: (context) =>
      createLogger({
        service,
        level,
        output,
        context: {
          correlationId: context.correlationId ?? correlationId,
          component: context.component ?? component,
        },
      }),
  };
}
