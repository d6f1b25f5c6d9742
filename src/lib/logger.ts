/**
 * Logging Utility
 *
 * Structured logging with levels and namespaces for the layers around the
 * kinematics core (session store, event sinks). The core itself never logs;
 * it reports through an injected SimulationEventSink.
 *
 * ## Usage
 *
 * ```typescript
 * import { createLogger } from './logger';
 * const log = createLogger('Simulation');
 * log.info('Trajectory ready', { samples: 39 });
 * ```
 *
 * ### Log Levels:
 * - debug: Detailed debugging info (outside production only)
 * - info: General operational info
 * - warn: Potential issues that don't break functionality
 * - error: Errors that affect functionality
 *
 * The minimum level defaults to `debug`, or `warn` when NODE_ENV=production,
 * and LOG_LEVEL overrides both.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  namespace: string;
  message: string;
  data?: unknown;
  timestamp: Date;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value);
}

function resolveDefaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'warn' : 'debug';
}

// Configuration
const config = {
  enabled: true,
  console: true,
  minLevel: resolveDefaultLevel(),
  handlers: [] as LogHandler[],
};

function shouldLog(level: LogLevel): boolean {
  return config.enabled && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[config.minLevel];
}

function writeEntry(entry: LogEntry): void {
  if (!shouldLog(entry.level)) return;

  if (config.console) {
    const consoleMethod = entry.level === 'error' ? console.error :
                         entry.level === 'warn' ? console.warn :
                         entry.level === 'debug' ? console.debug :
                         console.log;
    const line = `${entry.timestamp.toISOString()} [${entry.namespace}] ${entry.level.toUpperCase()} ${entry.message}`;

    if (entry.data !== undefined) {
      consoleMethod(line, entry.data);
    } else {
      consoleMethod(line);
    }
  }

  // Call registered handlers; a failing handler must not break the caller
  for (const handler of config.handlers) {
    try {
      handler(entry);
    } catch (handlerError) {
      console.error(`[Logger] handler failed for [${entry.namespace}] entry`, handlerError);
    }
  }
}

/**
 * Create a logger instance for a specific namespace
 */
export function createLogger(namespace: string): Logger {
  return {
    debug(message: string, data?: unknown) {
      writeEntry({ level: 'debug', namespace, message, data, timestamp: new Date() });
    },
    info(message: string, data?: unknown) {
      writeEntry({ level: 'info', namespace, message, data, timestamp: new Date() });
    },
    warn(message: string, data?: unknown) {
      writeEntry({ level: 'warn', namespace, message, data, timestamp: new Date() });
    },
    error(message: string, data?: unknown) {
      writeEntry({ level: 'error', namespace, message, data, timestamp: new Date() });
    },
  };
}

/**
 * Configure the logger
 */
export function configureLogger(options: {
  enabled?: boolean;
  console?: boolean;
  minLevel?: LogLevel;
}): void {
  if (options.enabled !== undefined) config.enabled = options.enabled;
  if (options.console !== undefined) config.console = options.console;
  if (options.minLevel !== undefined) config.minLevel = options.minLevel;
}

/**
 * Add a custom log handler (e.g., for writing logs to a file)
 */
export function addLogHandler(handler: LogHandler): () => void {
  config.handlers.push(handler);
  return () => {
    const index = config.handlers.indexOf(handler);
    if (index > -1) config.handlers.splice(index, 1);
  };
}

/**
 * Get current log configuration
 */
export function getLogConfig() {
  return { ...config, handlers: config.handlers.length };
}

// Pre-created loggers for common namespaces
export const loggers = {
  simulation: createLogger('Simulation'),
};

export default createLogger;
