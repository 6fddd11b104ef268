import { mkdirSync } from 'fs';
import { dirname } from 'path';
import pino, { type Logger, type LevelWithSilent } from 'pino';

// ============================================================================
// Logger Configuration
// ============================================================================

export interface LoggerConfig {
  level?: LevelWithSilent;
  /** Append logs to this file instead of stderr. */
  file?: string;
  base?: Record<string, unknown>;
}

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function levelFromEnv(): LevelWithSilent {
  const value = process.env.LOG_LEVEL;
  return LEVELS.find(level => level === value) ?? 'info';
}

/**
 * Structured logger used throughout the pipeline. `data` is merged into the
 * log line; errors are serialized by pino's `err` serializer.
 */
export interface RuntimeLogger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export function createLogger(config: LoggerConfig = {}): RuntimeLogger {
  const level = config.level ?? levelFromEnv();
  const base = { service: 'codesmith', ...config.base };

  let destination: pino.DestinationStream;
  if (config.file) {
    mkdirSync(dirname(config.file), { recursive: true });
    destination = pino.destination({ dest: config.file, sync: true, append: true });
  } else {
    destination = pino.destination({ dest: 2, sync: true });
  }

  return wrapLogger(pino({ level, base }, destination));
}

function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: bindings => wrapLogger(logger.child(bindings)),
  };
}

// ============================================================================
// Default Logger
// ============================================================================

let defaultLogger: RuntimeLogger | null = null;

export function getLogger(): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

/**
 * Replaces the process-wide default logger. The interactive CLI uses this to
 * move log output off the terminal.
 */
export function configureLogger(config: LoggerConfig): RuntimeLogger {
  defaultLogger = createLogger(config);
  return defaultLogger;
}

export const silentLogger: RuntimeLogger = createLogger({ level: 'silent' });
