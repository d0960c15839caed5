/**
 * Locating the active credentials
 *
 * Environment variables win over the credentials file entirely; the two are
 * never merged field by field.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { CredentialsIOError, CredentialsNotFoundError, MissingFieldError, NotAuthenticatedError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { resolveUserPath } from "../paths.js";
import { AuthenticatedCredentials, type PurgeHook } from "./credentials.js";

export const CREDENTIALS_FILENAME = "credentials";

/**
 * Default credentials file: `{cwd}/.{appname}/credentials`
 */
export function credentialsPath(appname: string, cwd: string = process.cwd()): string {
  return path.join(cwd, `.${appname}`, CREDENTIALS_FILENAME);
}

/**
 * Environment-variable prefix for an app: `restcall` → `RESTCALL_`
 */
export function envPrefix(appname: string): string {
  return `${appname.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_`;
}

/**
 * Purge hook that deletes a credentials file; a missing file is not an error
 */
export function credentialsRemover(filePath: string): PurgeHook {
  const resolved = resolveUserPath(filePath);
  return async () => {
    try {
      await fs.rm(resolved, { force: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CredentialsIOError(`Failed to remove credentials: ${reason}`, resolved, { cause: error });
    }
  };
}

export interface RestoreOptions {
  appname: string;
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Credentials file (defaults to credentialsPath(appname)) */
  filePath?: string;
  logger?: Logger;
}

/**
 * Restore credentials from the environment, falling back to the credentials file
 *
 * File-backed credentials get a purge hook that deletes the file.
 *
 * @throws {NotAuthenticatedError} if neither source has credentials
 * @throws {InvalidFieldError} if the environment holds a malformed PORT
 * @throws {MissingFieldError} if the file lacks a field
 */
export async function restoreCredentials(options: RestoreOptions): Promise<AuthenticatedCredentials> {
  const logger = options.logger ?? silentLogger;
  const prefix = envPrefix(options.appname);

  try {
    const credentials = AuthenticatedCredentials.fromEnv(prefix, options.env ?? process.env);
    logger.debug({ source: "environment" }, "Restored credentials");
    return credentials;
  } catch (error) {
    if (!(error instanceof MissingFieldError)) {
      throw error;
    }
    logger.debug({ missing: error.field }, "No credentials in environment, trying file");
  }

  const filePath = options.filePath ?? credentialsPath(options.appname);
  try {
    const credentials = await AuthenticatedCredentials.fromFile(filePath);
    logger.debug({ source: resolveUserPath(filePath) }, "Restored credentials");
    return credentials.onPurge(credentialsRemover(filePath));
  } catch (error) {
    if (error instanceof CredentialsNotFoundError) {
      throw new NotAuthenticatedError(options.appname, { cause: error });
    }
    throw error;
  }
}
