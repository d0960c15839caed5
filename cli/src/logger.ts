/**
 * Structured logging backed by pino
 *
 * Logs go to stderr so stdout carries only response bodies and `export`
 * lines. Secret-bearing fields are censored by path before serialization.
 */

import pino from "pino";

/**
 * Log severity levels from least to most severe, plus "silent"
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Paths censored in every logger, regardless of configuration
 */
export const SECRET_PATHS: readonly string[] = [
  "password",
  "accessToken",
  "access_token",
  "headers.Authorization",
  "headers.authorization",
  "body.password",
];

/**
 * Configuration for creating a Logger
 */
export interface LoggerConfig {
  readonly level: LogLevel;
  readonly redactPaths?: readonly string[];
  readonly destination?: { write(msg: string): void };
}

/**
 * Structured logger interface
 */
export interface Logger {
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): Logger;
}

type Emit = (msgOrObj: string | Record<string, unknown>, msg?: string) => void;

function emitter(pinoLogger: pino.Logger, level: "debug" | "info" | "warn" | "error"): Emit {
  return (msgOrObj, msg) => {
    if (typeof msgOrObj === "string") {
      pinoLogger[level](msgOrObj);
    } else {
      pinoLogger[level](msgOrObj, msg ?? "");
    }
  };
}

function wrapPino(pinoLogger: pino.Logger): Logger {
  return {
    debug: emitter(pinoLogger, "debug"),
    info: emitter(pinoLogger, "info"),
    warn: emitter(pinoLogger, "warn"),
    error: emitter(pinoLogger, "error"),
    child(bindings: Record<string, unknown>): Logger {
      return wrapPino(pinoLogger.child(bindings));
    },
  };
}

/**
 * Create a Logger with secret redaction and an optional custom destination
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ headers }, "Applied credentials"); // Authorization is censored
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    redact: {
      paths: [...SECRET_PATHS, ...(config.redactPaths ?? [])],
      censor: "[REDACTED]",
    },
  };

  const destination = config.destination ?? pino.destination({ dest: 2, sync: true });
  return wrapPino(pino(options, destination));
}

/**
 * Logger that discards everything; the default for library consumers
 */
export const silentLogger: Logger = createLogger({
  level: "silent",
  destination: { write: () => undefined },
});

/**
 * Map the CLI's -v count onto a level: 0 keeps the configured level, 1 is info, 2+ is debug
 */
export function levelForVerbosity(verbosity: number, configured: LogLevel): LogLevel {
  if (verbosity >= 2) return "debug";
  if (verbosity === 1) return "info";
  return configured;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
