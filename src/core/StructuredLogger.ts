// Logs structurés avec niveaux, composant et contexte

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export type LogFormat = 'pretty' | 'json';

export interface LogContext {
  component?: string;
  operation?: string;
  source?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: LogContext;
  error?: Error;
}

export type LogSinkFn = (level: LogLevel, line: string, entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
  sink?: LogSinkFn;
}

/**
 * Convertit LOG_LEVEL (debug, info, warn...) en LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch ((value || '').trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn':
    case 'warning': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'fatal': return LogLevel.FATAL;
    default: return fallback;
  }
}

export class StructuredLogger {
  private readonly logLevel: LogLevel;
  private readonly format: LogFormat;
  private readonly component: string | undefined;
  private readonly sink: LogSinkFn;

  constructor(options: LoggerOptions = {}) {
    this.logLevel = options.level ?? LogLevel.INFO;
    this.format = options.format ?? 'pretty';
    this.component = options.component;
    this.sink = options.sink ?? ((level, line) => this.writeToConsole(level, line));
  }

  /**
   * Logger enfant pour un composant (même niveau, même sortie)
   */
  child(component: string): StructuredLogger {
    const child = new StructuredLogger({
      level: this.logLevel,
      format: this.format,
      component,
      sink: this.sink
    });
    return child;
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context: LogContext = {}): void {
    this.log(LogLevel.ERROR, message, context, toError(error));
  }

  fatal(message: string, error?: unknown, context: LogContext = {}): void {
    this.log(LogLevel.FATAL, message, context, toError(error));
  }

  private log(level: LogLevel, message: string, context: LogContext, error?: Error): void {
    if (level < this.logLevel) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: this.component ? { component: this.component, ...context } : { ...context }
    };

    if (error) {
      entry.error = error;
    }

    const line = this.format === 'json' ? this.formatJson(entry) : this.formatPretty(entry);
    this.sink(level, line, entry);
  }

  private formatPretty(entry: LogEntry): string {
    const { timestamp, level, message, error } = entry;
    const { component, ...rest } = entry.context;

    let formatted = `[${timestamp}] ${level}`;
    if (component) {
      formatted += ` [${component}]`;
    }
    formatted += `: ${message}`;

    if (Object.keys(rest).length > 0) {
      formatted += ` | ${JSON.stringify(rest)}`;
    }

    if (error) {
      formatted += ` | Error: ${error.message}`;
      if (error.stack && entry.level !== 'WARN') {
        formatted += `\n${error.stack}`;
      }
    }

    return formatted;
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...entry.context,
      ...(entry.error ? { error: entry.error.message, stack: entry.error.stack } : {})
    });
  }

  /**
   * Écrire dans la console avec couleurs
   */
  private writeToConsole(level: LogLevel, message: string): void {
    const colors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m',  // Green
      [LogLevel.WARN]: '\x1b[33m',  // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.FATAL]: '\x1b[35m'  // Magenta
    };

    const reset = '\x1b[0m';
    const line = this.format === 'json' ? message : `${colors[level]}${message}${reset}`;

    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function toError(value: unknown): Error | undefined {
  if (value === undefined || value === null) return undefined;
  if (value instanceof Error) return value;
  return new Error(String(value));
}
