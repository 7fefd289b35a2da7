/**
 * Structured logging using Pino.
 * JSON lines by default; `LOG_PRETTY=true` switches to pino-pretty output.
 */
import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

function envLevel(): LogLevel {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
}

const defaultOptions: LoggerOptions = {
  level: envLevel(),
  pretty: process.env['LOG_PRETTY'] === 'true',
};

function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'ovh-dns01-webhook',
      pid: undefined, // Don't include pid in logs
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.pretty) {
    return pino({
      ...baseConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'app,service',
          messageFormat: '{if service}[{service}] {end}{msg}',
        },
      },
    });
  }

  return pino(baseConfig);
}

export const logger = createLogger();

// pino children copy the parent level when created; kept here so
// setLogLevel reaches the ones created at module load
const children = new Set<pino.Logger>();

/**
 * Set the log level at runtime, on the root logger and every child
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  const child = logger.child(bindings);
  children.add(child);
  return child;
}

export default logger;
