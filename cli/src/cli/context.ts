/**
 * Context passed to command handlers
 */

import { credentialsPath } from "../auth/store.js";
import { strictParseInt, type Settings } from "../config.js";
import { BadParameterError } from "../errors.js";
import type { Transport } from "../http/transport.js";
import type { Logger } from "../logger.js";
import { resolveUserPath } from "../paths.js";

export interface TransportSettings {
  insecure: boolean;
  timeoutMs: number;
}

export interface CommandContext {
  appname: string;
  settings: Settings;
  logger: Logger;
  env: NodeJS.ProcessEnv;
  cwd: string;
  createTransport(settings: TransportSettings): Transport;
}

/**
 * Command-line overrides for transport settings
 */
export interface TransportFlags {
  insecure?: boolean;
  timeout?: string;
}

/**
 * Absolute path of the credentials file: the configured one, or `{cwd}/.{appname}/credentials`
 */
export function resolveCredentialsFile(context: CommandContext): string {
  return resolveUserPath(context.settings.credentialsFile ?? credentialsPath(context.appname, context.cwd), context.cwd);
}

/**
 * Merge --insecure/--timeout over the configured settings
 *
 * @throws {BadParameterError} if --timeout is not a positive integer
 */
export function resolveTransportSettings(settings: Settings, flags: TransportFlags): TransportSettings {
  let timeoutMs = settings.timeoutMs;
  if (flags.timeout !== undefined) {
    timeoutMs = strictParseInt(flags.timeout);
    if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
      throw new BadParameterError(`${flags.timeout}: must be a positive integer (milliseconds)`, "--timeout");
    }
  }
  return { insecure: flags.insecure === true || settings.insecure, timeoutMs };
}
