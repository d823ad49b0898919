/**
 * Logging utilities for subgap plugins
 */

import type { LogLevel, LogSink } from './types.js';
import { LOG_LEVEL_NAMES } from './types.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

type Color = keyof typeof COLORS;

const LEVEL_STYLE: Record<LogLevel | 'success', { label: string; color: Color }> = {
  debug: { label: 'DEBUG', color: 'gray' },
  info: { label: 'INFO ', color: 'blue' },
  warn: { label: 'WARN ', color: 'yellow' },
  error: { label: 'ERROR', color: 'red' },
  success: { label: 'OK   ', color: 'green' },
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

// Level shared by every logger that was not given one explicitly.
let defaultLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lowered = value.trim().toLowerCase();
  return LOG_LEVEL_NAMES.find((level) => level === lowered);
}

export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function getDefaultLogLevel(): LogLevel {
  return defaultLevel;
}

export interface LoggerOptions {
  level?: LogLevel;
  colors?: boolean;
  sink?: LogSink;
  now?: () => Date;
}

export class Logger {
  private name: string;
  private level?: LogLevel;
  private useColors: boolean;
  private sink: LogSink;
  private now: () => Date;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.level = options.level;
    this.sink = options.sink ?? consoleSink;
    this.useColors = (options.colors ?? true) && options.sink === undefined && process.stdout.isTTY === true;
    this.now = options.now ?? (() => new Date());
  }

  get effectiveLevel(): LogLevel {
    return this.level ?? defaultLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.effectiveLevel];
  }

  private colorize(text: string, color: Color): string {
    if (!this.useColors) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private format(style: LogLevel | 'success', message: string, meta?: Record<string, unknown>): string {
    const { label, color } = LEVEL_STYLE[style];
    const timestamp = this.colorize(this.now().toISOString(), 'gray');
    const name = this.colorize(`[${this.name}]`, 'cyan');

    let output = `${timestamp} ${this.colorize(label, color)} ${name} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      output += ` ${this.colorize(JSON.stringify(meta), 'gray')}`;
    }
    return output;
  }

  private write(level: LogLevel, style: LogLevel | 'success', message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog(level)) {
      this.sink(level, this.format(style, message, meta));
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', 'debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', 'info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', 'warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', 'error', message, meta);
  }

  success(message: string, meta?: Record<string, unknown>): void {
    this.write('info', 'success', message, meta);
  }

  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, {
      level: this.level,
      colors: this.useColors,
      sink: this.sink === consoleSink ? undefined : this.sink,
      now: this.now,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export function createLogger(name: string, level?: LogLevel): Logger {
  return new Logger(name, { level });
}
