export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const levelRank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  color?: boolean;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  muted: '\x1b[90m',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class Logger {
  private minLevel: LogLevel;
  private useJSON: boolean;
  private supportsColor: boolean;

  constructor(options: LoggerOptions = {}) {
    const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
    this.minLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

    // JSON lines in production, readable lines otherwise
    this.useJSON = options.json ?? (process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json');

    this.supportsColor =
      options.color ??
      (Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.FORCE_COLOR !== '0');
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.minLevel = options.level;
    if (options.json !== undefined) this.useJSON = options.json;
    if (options.color !== undefined) this.supportsColor = options.color;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  isEnabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.minLevel];
  }

  format(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): string {
    if (this.useJSON) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
      };
      if (context && Object.keys(context).length > 0) {
        entry.context = context;
      }
      if (error) {
        entry.error = { message: error.message, stack: error.stack, name: error.name };
      }
      return JSON.stringify(entry);
    }

    const paint = (color: string, text: string) => (this.supportsColor ? `${color}${text}${colors.reset}` : text);

    // timestamp (12 chars) + level (5 chars) + message
    const now = new Date();
    const timestamp = [now.getHours(), now.getMinutes(), now.getSeconds()]
      .map((part) => part.toString().padStart(2, '0'))
      .join(':');
    const stamp = `${timestamp}.${now.getMilliseconds().toString().padStart(3, '0')}`.padEnd(12);
    let output = `${paint(colors.muted, stamp)} ${paint(colors[level], level.toUpperCase().padEnd(5))}${message}`;

    if (context && Object.keys(context).length > 0) {
      const pairs = Object.entries(context)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join(' ');
      output += ` ${paint(colors.muted, pairs)}`;
    }

    if (error) {
      output += `\n${paint(colors.error, `  Error: ${error.message}`)}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1, 4);
        output += `\n${paint(colors.muted, `  ${stackLines.join('\n  ')}`)}`;
      }
    }

    return output;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled('debug')) {
      console.log(this.format('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled('info')) {
      console.log(this.format('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.isEnabled('error')) {
      console.error(this.format('error', message, context, error));
    }
  }
}

export const logger = new Logger();
