import { logBuffer } from '@/shared/logging/logBuffer';
import type { LogLevel } from '@/types/logLevel';

export type { LogLevel } from '@/types/logLevel';

export type LogContext = Record<string, unknown>;

/** One emitted log event before formatting. */
export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  scopes: readonly string[];
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

type LogSettings = Required<LoggerOptions>;

// `spam` sits below debug and is reserved for per-poll traces.
const SEVERITY: Record<LogLevel, number> = {
  spam: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 99,
};

/**
 * What collaborators depend on; tests hand in recording fakes.
 */
export type Logger = Pick<ComponentLogger, 'spam' | 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Process-wide log settings shared by every component logger.
 */
class LogManager {
  private readonly settings: LogSettings = {
    level: 'info',
    json: false,
    stdout: process.stdout,
    stderr: process.stderr,
  };

  public configure(options: LoggerOptions): void {
    if (options.level) this.settings.level = options.level;
    if (options.json !== undefined) this.settings.json = options.json;
    if (options.stdout) this.settings.stdout = options.stdout;
    if (options.stderr) this.settings.stderr = options.stderr;
  }

  public get level(): LogLevel {
    return this.settings.level;
  }

  public accepts(level: LogLevel): boolean {
    return level !== 'none' && SEVERITY[level] >= SEVERITY[this.settings.level];
  }

  public emit(record: LogRecord): void {
    if (!this.accepts(record.level)) {
      return;
    }
    const line = this.settings.json ? renderJson(record) : renderLine(record);
    const stream = record.level === 'error' ? this.settings.stderr : this.settings.stdout;
    stream.write(`${line}\n`);
    logBuffer.append(line);
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return new ComponentLogger([component, ...scopes]);
}

/**
 * Logger tagged with a scope path, rendered as `[Announce|Negotiator]`.
 */
export class ComponentLogger {
  constructor(private readonly scopes: readonly string[]) {}

  public child(scope: string): ComponentLogger {
    return new ComponentLogger([...this.scopes, scope]);
  }

  public isEnabled(level: LogLevel): boolean {
    return logManager.accepts(level);
  }

  public spam(message: string, context?: LogContext): void {
    this.emit('spam', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    logManager.emit({ timestamp: new Date().toISOString(), level, scopes: this.scopes, message, context });
  }
}

function renderLine(record: LogRecord): string {
  const header = `[${record.timestamp}][${record.level.toUpperCase()}][${record.scopes.join('|')}]`;
  return `${header}${formatContext(record.context)} ${record.message}`;
}

function renderJson(record: LogRecord): string {
  return JSON.stringify({
    timestamp: record.timestamp,
    level: record.level,
    scopes: record.scopes,
    message: record.message,
    context: record.context ?? {},
  });
}

/**
 * `key=value` pairs sorted by key; values with whitespace, quotes or brackets
 * are JSON-quoted.
 */
export function formatContext(context?: LogContext): string {
  if (!context) return '';
  const pairs: string[] = [];
  for (const key of Object.keys(context).sort()) {
    const value = context[key];
    if (value !== undefined) {
      pairs.push(`${key}=${renderValue(value)}`);
    }
  }
  return pairs.length > 0 ? ` [${pairs.join(' ')}]` : '';
}

function renderValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      if (value === '') return '""';
      return /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
    case 'object':
      if (value === null) return 'null';
      try {
        return JSON.stringify(value);
      } catch {
        return String(value);
      }
    default:
      return String(value);
  }
}
