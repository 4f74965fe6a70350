/**
 * Diagnostic logger
 *
 * Writes `[tether]`-prefixed lines to a side channel (stderr by default).
 * The protocol stream is never touched from here.
 *
 * @internal
 */

import type { Writable } from 'node:stream';

/**
 * MCP log levels (RFC 5424 severities, lowest first)
 */
export const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Receives one formatted line, without trailing newline
 */
export type LogSink = (line: string) => void;

export interface Logger {
  readonly name: string;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
  /** Logger for a sub-component; shares the level with its parent */
  child(name: string): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  sink?: LogSink;
  /** Clock for timestamps (tests pin it) */
  now?: () => Date;
}

const guardedStreams = new WeakSet<Writable>();

/**
 * Sink writing one line per entry to a stream
 *
 * Write failures (EPIPE on a closed stderr) surface as `'error'` events after
 * the write returns, so the stream gets a listener that drops them.
 */
export function streamSink(stream: Writable): LogSink {
  if (!guardedStreams.has(stream)) {
    guardedStreams.add(stream);
    stream.on('error', () => undefined);
  }
  return (line) => {
    stream.write(`${line}\n`);
  };
}

interface LevelCell {
  level: LogLevel;
}

class StreamLogger implements Logger {
  constructor(
    readonly name: string,
    private readonly cell: LevelCell,
    private readonly sink: LogSink,
    private readonly now: () => Date
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.cell.level)) {
      return;
    }
    try {
      this.sink(formatLine(this.now(), level, this.name, message, context));
    } catch {
      // A failing sink must never reach protocol output
    }
  }

  child(name: string): Logger {
    return new StreamLogger(`${this.name}:${name}`, this.cell, this.sink, this.now);
  }

  setLevel(level: LogLevel): void {
    this.cell.level = level;
  }

  getLevel(): LogLevel {
    return this.cell.level;
  }
}

/**
 * Format one log line
 *
 * `[tether] <iso time> <level> <name>: <message> <context json>`
 */
export function formatLine(
  time: Date,
  level: LogLevel,
  name: string,
  message: string,
  context?: Record<string, unknown>
): string {
  const base = `[tether] ${time.toISOString()} ${level} ${name}: ${message}`;
  if (!context || Object.keys(context).length === 0) {
    return base;
  }
  return `${base} ${safeStringify(context)}`;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (v instanceof Error ? { name: v.name, message: v.message, stack: v.stack } : v));
  } catch {
    return '"[unserializable context]"';
  }
}

/**
 * Create a root logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.child('dispatcher').info('Handling request', { method: 'tools/list' });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new StreamLogger(
    options.name ?? 'tether',
    { level: options.level ?? 'info' },
    options.sink ?? streamSink(process.stderr),
    options.now ?? (() => new Date())
  );
}

/**
 * Logger that drops everything (handy in tests)
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'emergency', sink: () => undefined });
}
