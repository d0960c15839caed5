/**
 * Runtime settings read from RESTCALL_* environment variables
 */

import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

/**
 * Program name; also the environment-variable prefix and the credentials directory name
 */
export const APP_NAME = "restcall";

/**
 * Settings shared by all commands
 */
export interface Settings {
  /** Credentials file; undefined means `.restcall/credentials` under the working directory */
  credentialsFile?: string;
  /** Skip TLS certificate verification */
  insecure: boolean;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Token endpoint used by `auth` */
  tokenPath: string;
  /** Log level when no -v flag is given */
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  insecure: false,
  timeoutMs: 30_000,
  tokenPath: "/auth/token",
  logLevel: "warn",
};

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];

/**
 * Parse a strictly decimal integer; anything else (including "12abc" or "1.5") yields NaN
 */
export function strictParseInt(raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return Number.NaN;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Read settings from the environment
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigurationError} listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const prefix = `${APP_NAME.toUpperCase()}_`;
  const errors: string[] = [];
  const fields: string[] = [];
  const settings: Settings = { ...DEFAULT_SETTINGS };

  const credentialsFile = env[`${prefix}CREDENTIALS_FILE`];
  if (credentialsFile) {
    settings.credentialsFile = credentialsFile;
  }

  const insecure = env[`${prefix}INSECURE`];
  if (insecure) {
    const normalized = insecure.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) {
      settings.insecure = true;
    } else if (FALSE_VALUES.includes(normalized)) {
      settings.insecure = false;
    } else {
      fields.push(`${prefix}INSECURE`);
      errors.push(`${prefix}INSECURE must be true or false (got: "${insecure}")`);
    }
  }

  const timeout = env[`${prefix}TIMEOUT_MS`];
  if (timeout) {
    const parsed = strictParseInt(timeout);
    if (Number.isNaN(parsed) || parsed <= 0) {
      fields.push(`${prefix}TIMEOUT_MS`);
      errors.push(`${prefix}TIMEOUT_MS must be a positive integer (got: "${timeout}")`);
    } else {
      settings.timeoutMs = parsed;
    }
  }

  const tokenPath = env[`${prefix}TOKEN_PATH`];
  if (tokenPath) {
    if (!tokenPath.startsWith("/")) {
      fields.push(`${prefix}TOKEN_PATH`);
      errors.push(`${prefix}TOKEN_PATH must start with '/' (got: "${tokenPath}")`);
    } else {
      settings.tokenPath = tokenPath;
    }
  }

  const logLevel = env[`${prefix}LOG_LEVEL`];
  if (logLevel) {
    const normalized = logLevel.trim().toLowerCase();
    if (isLogLevel(normalized)) {
      settings.logLevel = normalized;
    } else {
      fields.push(`${prefix}LOG_LEVEL`);
      errors.push(`${prefix}LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, silent (got: "${logLevel}")`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Configuration validation failed:\n  - ${errors.join("\n  - ")}`, fields);
  }

  return settings;
}
