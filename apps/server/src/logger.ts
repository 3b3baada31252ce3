export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  color: boolean;
  /** Receives each formatted line; defaults to the console stream matching the level */
  write?: (level: LogLevel, line: string) => void;
  now?: () => Date;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  dim: '\x1b[90m', // Gray
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  return {
    level: isLogLevel(level) ? level : 'info',
    // JSON lines in production, readable output in development
    json: env.NODE_ENV === 'production' || env.LOG_FORMAT === 'json',
    color: Boolean(process.stdout.isTTY) && env.NO_COLOR === undefined && env.FORCE_COLOR !== '0',
  };
}

export class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions) {
    this.options = options;
  }

  get level(): LogLevel {
    return this.options.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.options.level];
  }

  private formatTimestamp(date: Date): string {
    if (this.options.json) {
      return date.toISOString();
    }

    // Fixed width: HH:MM:SS.mmm
    const hours = date.getHours().toString().padStart(2, '0');
    const minutes = date.getMinutes().toString().padStart(2, '0');
    const seconds = date.getSeconds().toString().padStart(2, '0');
    const ms = date.getMilliseconds().toString().padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`;
  }

  private paint(color: string, text: string): string {
    return this.options.color ? `${color}${text}${colors.reset}` : text;
  }

  format(level: LogLevel, message: string, context?: LogContext, error?: Error): string {
    const timestamp = this.formatTimestamp(this.options.now ? this.options.now() : new Date());

    if (this.options.json) {
      const entry: LogEntry = { timestamp, level, message };
      if (context && Object.keys(context).length > 0) {
        entry.context = context;
      }
      if (error) {
        entry.error = { message: error.message, stack: error.stack, name: error.name };
      }
      return JSON.stringify(entry);
    }

    let output = `${this.paint(colors.dim, timestamp)} ${this.paint(colors[level], level.toUpperCase().padEnd(5))} ${message}`;

    if (context && Object.keys(context).length > 0) {
      const pairs = Object.entries(context)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join(' ');
      output += ` ${this.paint(colors.dim, pairs)}`;
    }

    if (error) {
      output += `\n  ${this.paint(colors.error, `${error.name}: ${error.message}`)}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1, 4);
        output += `\n${stackLines.map((line) => `  ${this.paint(colors.dim, line.trim())}`).join('\n')}`;
      }
    }

    return output;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;
    const write = this.options.write ?? writeToConsole;
    write(level, this.format(level, message, context, error));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log('error', message, context, error);
  }
}

export const logger = new Logger(loggerOptionsFromEnv());
