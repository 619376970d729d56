/**
 * Structured Logger
 *
 * Leveled, component-scoped logging shared by every core module.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  component: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  enableStructured: boolean;
  onLog?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'warn',
  component: 'retrace',
  enableConsole: true,
  enableStructured: false,
};

export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Create a child logger with a nested component name
   */
  child(component: string): Logger {
    return new Logger({
      ...this.config,
      component: `${this.config.component}.${component}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorInfo = error
      ? {
          name: error.name,
          message: error.message,
          code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
          stack: error.stack,
        }
      : undefined;

    this.log('error', message, context, errorInfo);
  }

  private log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      context,
      error,
    };

    this.config.onLog?.(entry);

    if (this.config.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  // Diagnostics always go to stderr
  private writeToConsole(entry: LogEntry): void {
    if (this.config.enableStructured) {
      console.error(JSON.stringify(entry));
      return;
    }

    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.component}]`;
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    console.error(`${prefix} ${entry.message}${contextStr}`);
    if (entry.level === 'error' && entry.error?.stack) {
      console.error(entry.error.stack);
    }
  }
}

let defaultLogger: Logger | null = null;

/**
 * Get or create the default logger
 */
export function getLogger(component?: string): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return component ? defaultLogger.child(component) : defaultLogger;
}

/**
 * Replace the default logger configuration
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  defaultLogger = new Logger(config);
}
