/**
 * Structured logger
 *
 * Entries carry a timestamp, level, context and optional data, and are
 * written as coloured text or as one JSON object per line. `LOG_LEVEL` and
 * `LOG_FORMAT` select the threshold and format; without them, `NODE_ENV`
 * picks debug for development and json for production.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  context: string;
  message: string;
  service: string;
  data?: Record<string, unknown>;
  /** Stack of an Error passed as `data.error` */
  stack?: string;
  operation?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  format: 'text' | 'json';
  /** Module name shown in brackets */
  context: string;
  timestamps: boolean;
  service: string;
  /** Merged into the data of every entry */
  defaultFields?: Record<string, unknown>;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

function levelFromEnv(): LogLevel {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

function formatFromEnv(): 'text' | 'json' {
  const format = process.env['LOG_FORMAT']?.toLowerCase();
  if (format === 'json' || format === 'text') {
    return format;
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';

const LEVEL_STYLES: Record<LogLevel, string> = {
  debug: '\x1b[90mDEBUG',
  info: '\x1b[34mINFO ',
  warn: '\x1b[33mWARN ',
  error: '\x1b[31mERROR',
};

function formatText(entry: LogEntry, timestamps: boolean): string {
  const parts: string[] = [];

  if (timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    parts.push(`${DIM}${time}${RESET}`);
  }

  parts.push(`${LEVEL_STYLES[entry.level]}${RESET}`, `${CYAN}[${entry.context}]${RESET}`);
  if (entry.operation) {
    parts.push(`${DIM}(${entry.operation})${RESET}`);
  }
  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    const fields = Object.entries(entry.data)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(' ');
    parts.push(`${DIM}${fields}${RESET}`);
  }

  const line = parts.join(' ');
  return entry.stack ? `${line}\n${DIM}${entry.stack}${RESET}` : line;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly minLevel: number;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? levelFromEnv(),
      format: config.format ?? formatFromEnv(),
      context: config.context ?? 'app',
      timestamps: config.timestamps ?? true,
      service: config.service ?? process.env['SERVICE_NAME'] ?? 'iwslt',
    };
    if (config.defaultFields !== undefined) {
      this.config.defaultFields = config.defaultFields;
    }
    this.minLevel = LOG_LEVEL_VALUES[this.config.level];
  }

  private log(
    level: LogLevel,
    message: string,
    data: Record<string, unknown> | undefined,
    operation: string | undefined
  ): void {
    if (LOG_LEVEL_VALUES[level] < this.minLevel) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.config.context,
      message,
      service: this.config.service,
    };

    if (this.config.defaultFields || data) {
      entry.data = { ...this.config.defaultFields, ...data };
      const error = entry.data['error'];
      if (error instanceof Error) {
        entry.data['error'] = error.message;
        if (error.stack) {
          entry.stack = error.stack;
        }
      }
    }
    if (operation) {
      entry.operation = operation;
    }

    const output =
      this.config.format === 'json' ? JSON.stringify(entry) : formatText(entry, this.config.timestamps);

    // warn and error go to stderr
    if (level === 'warn' || level === 'error') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('debug', message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('info', message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('warn', message, data, operation);
  }

  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('error', message, data, operation);
  }

  /**
   * Derive a logger that adds `fields` to every entry
   */
  withFields(fields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: { ...this.config.defaultFields, ...fields },
    });
  }
}

/** Factory behind `createLogger`, replaceable in tests */
export interface LoggerProvider {
  createLogger(context: string): Logger;
}

class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggers = new Map<string, Logger>();

  createLogger(context: string): Logger {
    let logger = this.loggers.get(context);
    if (!logger) {
      logger = new Logger({ context });
      this.loggers.set(context, logger);
    }
    return logger;
  }
}

let loggerProvider: LoggerProvider = new DefaultLoggerProvider();

/**
 * @returns The provider that was active before
 */
export function setLoggerProvider(provider: LoggerProvider): LoggerProvider {
  const previous = loggerProvider;
  loggerProvider = provider;
  return previous;
}

export function resetLoggerProvider(): void {
  loggerProvider = new DefaultLoggerProvider();
}

/**
 * Logger for a module, cached per context by the default provider
 */
export function createLogger(context: string): Logger {
  return loggerProvider.createLogger(context);
}
