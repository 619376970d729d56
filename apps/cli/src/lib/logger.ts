/**
 * Logger wrapper with level-based filtering and structured output
 *
 * Result lines go to stdout through console; diagnostics (including the
 * core library's log entries) go through consola on stderr so `--json`
 * output stays parseable.
 */

import { createConsola, type ConsolaInstance } from 'consola';
import chalk from 'chalk';
import { configureLogger, type LogEntry as CoreLogEntry } from '@retrace/core';
import { getSymbols, shouldUseColors } from './environment.js';
import { isCliError, type CliError } from './errors.js';

/** Log levels mapping */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silent: -1,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

// consola numbering: 0 error, 1 warn, 3 info, 4 debug
const CONSOLA_LEVEL_MAP: Record<LogLevel, number> = {
  silent: -999,
  error: 0,
  warn: 1,
  info: 3,
  debug: 4,
};

/** Structured log entry */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  data?: unknown;
  context?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    suggestions?: string[];
  };
}

/** Logger options */
export interface LoggerOptions {
  /** Minimum log level */
  level?: LogLevel;
  /** Output as JSON */
  json?: boolean;
  /** Force colors off */
  colors?: boolean;
  /** Context to include in all log entries */
  context?: Record<string, unknown>;
}

/** Logger instance interface */
export interface Logger {
  readonly level: LogLevel;
  readonly jsonMode: boolean;
  success: (message: string) => void;
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
  log: (message: string) => void;
  logError: (error: CliError | Error) => void;
  newline: () => void;
  dim: (message: string) => void;
  step: (message: string) => void;
  table: (data: Record<string, unknown>[]) => void;
  json: (data: unknown) => void;
  diagnostics: ConsolaInstance;
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const symbols = getSymbols();
  const useJson = options.json ?? false;
  const useColors = (options.colors ?? true) && shouldUseColors() && !useJson;
  const level = options.level ?? 'info';
  const context = options.context ?? {};

  // Color functions (with fallbacks when colors disabled)
  const c = {
    green: useColors ? chalk.green : (s: string) => s,
    red: useColors ? chalk.red : (s: string) => s,
    yellow: useColors ? chalk.yellow : (s: string) => s,
    cyan: useColors ? chalk.cyan : (s: string) => s,
    dim: useColors ? chalk.dim : (s: string) => s,
    bold: useColors ? chalk.bold : (s: string) => s,
  };

  const diagnostics = createConsola({
    level: CONSOLA_LEVEL_MAP[level],
    stdout: process.stderr,
    stderr: process.stderr,
    formatOptions: {
      colors: useColors,
      date: false,
    },
  });

  function enabled(levelNum: number): boolean {
    return levelNum <= LOG_LEVEL_MAP[level];
  }

  function formatLogEntry(levelName: string, message: string, data?: unknown): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level: levelName,
      message,
      data,
      context: Object.keys(context).length > 0 ? context : undefined,
    };
  }

  function output(levelNum: number, levelName: string, symbol: string, colorFn: (s: string) => string, message: string): void {
    if (!enabled(levelNum)) return;

    if (useJson) {
      // Messages never share stdout with a JSON document
      console.error(JSON.stringify(formatLogEntry(levelName, message)));
      return;
    }

    const formatted = `${colorFn(symbol)} ${message}`;
    if (levelNum <= 1) {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }

  const logger: Logger = {
    level,
    jsonMode: useJson,
    diagnostics,

    success: (message: string) => {
      output(3, 'INFO', symbols.tick, c.green, message);
    },

    error: (message: string) => {
      output(1, 'ERROR', symbols.cross, c.red, message);
    },

    warn: (message: string) => {
      output(2, 'WARN', symbols.warning, c.yellow, message);
    },

    info: (message: string) => {
      output(3, 'INFO', symbols.info, c.cyan, message);
    },

    debug: (message: string, data?: Record<string, unknown>) => {
      if (data) {
        diagnostics.debug(message, data);
      } else {
        diagnostics.debug(message);
      }
    },

    log: (message: string) => {
      if (!useJson && enabled(3)) {
        console.log(message);
      }
    },

    logError: (error: CliError | Error) => {
      if (useJson) {
        const entry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: 'ERROR',
          message: error.message,
          context: Object.keys(context).length > 0 ? context : undefined,
          error: isCliError(error)
            ? { code: error.code, message: error.message, suggestions: error.suggestions }
            : { message: error.message },
        };
        console.error(JSON.stringify(entry));
        return;
      }

      if (!enabled(1)) return;

      console.error(`${c.red(symbols.cross)} ${isCliError(error) ? `[${error.code}] ` : ''}${error.message}`);

      if (isCliError(error)) {
        for (const p of error.context.paths ?? []) {
          console.error(`  ${c.dim(symbols.bullet)} ${p}`);
        }
        error.suggestions.forEach((suggestion) => {
          console.error(`  ${c.cyan(symbols.arrow)} ${suggestion}`);
        });
        if (level === 'debug' && error.cause) {
          console.error(c.dim(`  Caused by: ${error.cause.message}`));
        }
      }
    },

    newline: () => {
      if (!useJson && enabled(3)) {
        console.log('');
      }
    },

    dim: (message: string) => {
      if (!useJson && enabled(3)) {
        console.log(c.dim(message));
      }
    },

    step: (message: string) => {
      if (!useJson && enabled(3)) {
        console.log(`${c.cyan(symbols.pointerSmall)} ${message}`);
      }
    },

    table: (data: Record<string, unknown>[]) => {
      const first = data[0];
      if (useJson || !first || !enabled(3)) return;

      const columns = Object.keys(first);
      const columnWidths = columns.map((col) => {
        const maxDataWidth = Math.max(...data.map((row) => String(row[col] ?? '').length));
        return Math.max(col.length, maxDataWidth);
      });

      const headerRow = columns.map((col, i) => col.padEnd(columnWidths[i] ?? 0)).join('  ');
      console.log(c.bold(headerRow.trimEnd()));

      for (const row of data) {
        const rowStr = columns.map((col, i) => String(row[col] ?? '').padEnd(columnWidths[i] ?? 0)).join('  ');
        console.log(rowStr.trimEnd());
      }
    },

    json: (data: unknown) => {
      console.log(JSON.stringify(data, null, 2));
    },
  };

  return logger;
}

/**
 * Route the core library's log entries through the CLI diagnostics stream
 */
export function bridgeCoreLogging(logger: Logger): void {
  configureLogger({
    level: logger.level === 'info' ? 'warn' : logger.level,
    enableConsole: false,
    onLog: (entry: CoreLogEntry) => {
      const tagged = logger.diagnostics.withTag(entry.component);
      const detail = entry.context ? [entry.context] : [];
      tagged[entry.level](entry.message, ...detail);
    },
  });
}
