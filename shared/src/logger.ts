/**
 * Logging utilities for torrent-forge packages
 */

import { LOG_LEVEL_NAMES, type LogLevel } from './types.js';

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
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

export class Logger {
  private name: string;
  private level: LogLevel;
  private useColors: boolean;

  constructor(name: string, level: LogLevel = 'info', useColors = true) {
    this.name = name;
    this.level = level;
    this.useColors = useColors && Boolean(process.stdout.isTTY);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private colorize(text: string, color: keyof typeof COLORS): string {
    if (!this.useColors) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private format(label: string, color: keyof typeof COLORS, message: string, meta?: Record<string, unknown>): string {
    const timestamp = this.colorize(new Date().toISOString(), 'gray');
    const name = this.colorize(`[${this.name}]`, 'cyan');

    let output = `${timestamp} ${this.colorize(label, color)} ${name} ${message}`;

    if (meta && Object.keys(meta).length > 0) {
      output += ` ${this.colorize(JSON.stringify(meta), 'gray')}`;
    }

    return output;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('DEBUG', 'gray', message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('INFO ', 'blue', message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('WARN ', 'yellow', message, meta));
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('ERROR', 'red', message, meta));
    }
  }

  /** Logged at info level with a distinct label */
  success(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('OK   ', 'green', message, meta));
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, this.level, this.useColors);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Create a named logger. Without an explicit level the LOG_LEVEL environment
 * variable is used, falling back to `info` when it is unset or unknown.
 */
export function createLogger(name: string, level?: LogLevel): Logger {
  const fromEnv = process.env.LOG_LEVEL;
  return new Logger(name, level ?? (isLogLevel(fromEnv) ? fromEnv : 'info'));
}
