import pino from 'pino';
import type { EnvConfig } from '@klinecheck/schemas';
import { FileTransport } from './file-transport';
import {
  type LogLevel,
  type LogConfig,
  DEFAULT_LOG_CONFIG,
  getLogLevel,
  getServiceFromName,
  shouldLog,
  LOG_LEVEL_PRIORITY,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'klinecheck', 'fetcher:http') */
  name: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Enable file logging (default: from config) */
  enableFileLogging?: boolean;
  /** Directory for log files (default: from config) */
  logDir?: string;
  /** Custom log config (default: DEFAULT_LOG_CONFIG) */
  config?: LogConfig;
  /** Runtime environment; 'development' pretty-prints the console (default: production) */
  environment?: EnvConfig['NODE_ENV'];
  /** Console destination override; bypasses pino-pretty */
  destination?: pino.DestinationStream;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Logging capability handed to every component.
 * Whoever creates it owns its lifecycle and must `close()` it.
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  flush: () => Promise<void>;
  close: () => Promise<void>;
}

/**
 * Whether console output goes through pino-pretty
 */
export function usesPrettyConsole(options: LoggerOptions): boolean {
  return options.environment === 'development' && !options.destination;
}

/**
 * Create a structured logger instance
 *
 * Console output goes through pino (pino-pretty in the development environment).
 * With file logging enabled, entries are also appended as JSON lines to
 * {logDir}/{service}.log with size-based rotation. Children share the
 * parent's file transport.
 *
 * @param options - Logger configuration options (or just a name string)
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions = typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? DEFAULT_LOG_CONFIG;
  const service = getServiceFromName(opts.name);
  const level = opts.level ?? getLogLevel(opts.name, config);
  const enableFileLogging = opts.enableFileLogging ?? config.enableFileLogging;

  const pinoOptions: pino.LoggerOptions = {
    name: opts.name,
    level,
    ...(usesPrettyConsole(opts) && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[klinecheck] {name} | {msg}',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const rootPino = opts.destination ? pino(pinoOptions, opts.destination) : pino(pinoOptions);

  const fileTransport = enableFileLogging
    ? new FileTransport({ logDir: opts.logDir ?? config.logDir, service })
    : null;

  const flush = async (): Promise<void> => {
    rootPino.flush();
    if (fileTransport) await fileTransport.flush();
  };

  const close = async (): Promise<void> => {
    rootPino.flush();
    if (fileTransport) await fileTransport.close();
  };

  function build(target: pino.Logger, name: string, bindings: Record<string, unknown>): Logger {
    const method =
      (logLevel: LogLevel): LogMethod =>
      (obj, msg) => {
        if (typeof obj === 'string') {
          target[logLevel](obj);
        } else {
          target[logLevel](obj, msg);
        }

        if (fileTransport && shouldLog(logLevel, level)) {
          const fields: Record<string, unknown> =
            typeof obj === 'string' ? { msg: obj } : { ...obj, msg };
          fileTransport.write({
            timestamp: new Date().toISOString(),
            level: logLevel.toUpperCase(),
            ...bindings,
            name,
            service,
            ...fields,
          });
        }
      };

    return {
      trace: method('trace'),
      debug: method('debug'),
      info: method('info'),
      warn: method('warn'),
      error: method('error'),
      fatal: method('fatal'),
      child: (childBindings) => {
        const childName =
          typeof childBindings.name === 'string' ? `${name}:${childBindings.name}` : name;
        return build(target.child(childBindings), childName, { ...bindings, ...childBindings });
      },
      flush,
      close,
    };
  }

  return build(rootPino, opts.name, {});
}

/**
 * Logger that discards everything, for callers that embed the library
 * without wanting output
 */
export function createNoOpLogger(): Logger {
  const noop: LogMethod = () => undefined;
  const logger: Logger = {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => logger,
    flush: async () => undefined,
    close: async () => undefined,
  };
  return logger;
}

// Re-export types for convenience
export type { LogLevel, LogConfig };
export { LOG_LEVEL_PRIORITY };
