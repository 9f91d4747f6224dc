/**
 * Pino Logger Factory
 *
 * Structured logging via pino, with typed wrappers and context binding.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level */
  level?: LogLevel;
  /** Enable pretty printing (for development) */
  pretty?: boolean;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
  /** Custom transport */
  transport?: LoggerOptions["transport"];
}

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level from the environment. Test runs are silent unless LOG_LEVEL says otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(requested)) {
    return requested;
  }
  if (env.NODE_ENV === "test" || env.VITEST) {
    return "silent";
  }
  return "info";
}

function defaultConfig(): LoggerConfig {
  return {
    level: resolveLogLevel(),
    pretty: process.env.LOG_PRETTY === "1" || process.env.LOG_PRETTY === "true",
    base: {
      service: "agent-engine",
    },
  };
}

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...defaultConfig(), ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.pretty && !mergedConfig.transport) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  } else if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  }

  return pino(options);
}

/**
 * Engine logger with common methods
 */
export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

/**
 * Create a runtime logger wrapper
 */
export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;

  return wrapLogger(logger);
}

/**
 * Wrap an existing pino logger (e.g. one writing to a test destination)
 */
export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
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
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

// Default root logger, created on first use
let rootLogger: RuntimeLogger | null = null;
const moduleLoggers = new Map<string, RuntimeLogger>();

/**
 * Get the root logger, or a child bound to `module`
 */
export function getLogger(module?: string): RuntimeLogger {
  if (!rootLogger) {
    rootLogger = createRuntimeLogger();
  }
  if (!module) {
    return rootLogger;
  }
  let logger = moduleLoggers.get(module);
  if (!logger) {
    logger = rootLogger.child({ module });
    moduleLoggers.set(module, logger);
  }
  return logger;
}

/**
 * Replace the root logger (tests, embedding applications)
 */
export function setRootLogger(logger: RuntimeLogger | null): void {
  rootLogger = logger;
  moduleLoggers.clear();
}
