/**
 * Credentials before and after authentication
 *
 * `Credentials` carries a username and password and only ever lives long
 * enough to be exchanged for a token. `AuthenticatedCredentials` carries the
 * token and can be saved to a file, restored from it, restored from
 * environment variables and exported as `export` lines. Neither class ever
 * renders its secret through toString, JSON.stringify or util.inspect.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { inspect } from "util";
import {
  AuthenticationError,
  CredentialsIOError,
  CredentialsNotFoundError,
  CredentialsParseError,
  InvalidFieldError,
  MissingFieldError,
  isErrnoException,
} from "../errors.js";
import { strictParseInt } from "../config.js";
import { quoteShellArgument } from "../http/curl.js";
import { resolveUserPath } from "../paths.js";
import type { Authenticator } from "./authenticator.js";

const MASK = "****";

/**
 * Connection target shared by both credential stages
 */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * On-disk document and `export` line order
 */
export interface CredentialsRecord {
  host: string;
  port: number;
  access_token: string;
}

/**
 * Side effect run by purge(), e.g. removing the credentials file
 */
export type PurgeHook = () => void | Promise<void>;

/**
 * Anything with a write(string) method: process.stdout, process.stderr, a test buffer
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Validate a TCP port: an integer in 1..65535
 *
 * @throws {InvalidFieldError}
 */
export function validatePort(port: number, source = "credentials"): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidFieldError("port", source, `${port} is not an integer between 1 and 65535`);
  }
  return port;
}

/**
 * Credentials that have not been exchanged for a token yet
 */
export class Credentials implements Endpoint {
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly #password: string;

  constructor(host: string, port: number, username: string, password: string) {
    this.host = host;
    this.port = validatePort(port);
    this.username = username;
    this.#password = password;
  }

  get password(): string {
    return this.#password;
  }

  /**
   * Exchange username and password for an access token
   *
   * The authenticator is called exactly once; failures are wrapped in
   * AuthenticationError and never retried here.
   */
  async authenticate(authenticator: Authenticator): Promise<AuthenticatedCredentials> {
    let accessToken: string;
    try {
      accessToken = await authenticator.authenticate(this);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      throw new AuthenticationError(`Authentication against ${this.host}:${this.port} failed`, undefined, {
        cause: error,
      });
    }
    return new AuthenticatedCredentials(this.host, this.port, accessToken);
  }

  toString(): string {
    return `Credentials(${JSON.stringify(this.host)}, ${this.port}, ${JSON.stringify(this.username)}, "${MASK}")`;
  }

  toJSON(): string {
    return this.toString();
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

/**
 * Credentials holding an access token
 *
 * TODO: encrypt the token at rest once a key source (OS keychain) is chosen.
 */
export class AuthenticatedCredentials implements Endpoint {
  readonly host: string;
  readonly port: number;
  readonly #accessToken: string;
  #onPurge: PurgeHook | undefined;

  constructor(host: string, port: number, accessToken: string) {
    this.host = host;
    this.port = validatePort(port);
    this.#accessToken = accessToken;
  }

  get accessToken(): string {
    return this.#accessToken;
  }

  /**
   * Attach the side effect that purge() runs
   */
  onPurge(hook: PurgeHook): this {
    this.#onPurge = hook;
    return this;
  }

  /**
   * Discard the persisted form of these credentials
   *
   * Runs the attached hook on every call; without a hook this does nothing.
   */
  async purge(): Promise<this> {
    if (this.#onPurge) {
      await this.#onPurge();
    }
    return this;
  }

  toRecord(): CredentialsRecord {
    return { host: this.host, port: this.port, access_token: this.#accessToken };
  }

  toString(): string {
    return `AuthenticatedCredentials(${JSON.stringify(this.host)}, ${this.port}, "${MASK}")`;
  }

  toJSON(): string {
    return this.toString();
  }

  [inspect.custom](): string {
    return this.toString();
  }

  /**
   * Restore credentials from a JSON credentials file
   *
   * @throws {CredentialsNotFoundError} if the file does not exist
   * @throws {CredentialsParseError} if the file is not a JSON object
   * @throws {MissingFieldError} if host, port or access_token is absent
   * @throws {InvalidFieldError} if a field has the wrong type or the port is out of range
   */
  static async fromFile(filePath: string): Promise<AuthenticatedCredentials> {
    const resolved = resolveUserPath(filePath);

    let content: string;
    try {
      content = await fs.readFile(resolved, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new CredentialsNotFoundError(resolved, { cause: error });
      }
      throw new CredentialsIOError(`Failed to read credentials from ${resolved}`, resolved, { cause: error });
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new CredentialsParseError(resolved, { cause: error });
    }
    if (typeof document !== "object" || document === null || Array.isArray(document)) {
      throw new CredentialsParseError(resolved);
    }

    const fields = new Map<string, unknown>(Object.entries(document));
    const read = (field: keyof CredentialsRecord): unknown => {
      if (!fields.has(field)) {
        throw new MissingFieldError(field, resolved);
      }
      return fields.get(field);
    };

    const host = read("host");
    const port = read("port");
    const accessToken = read("access_token");

    if (typeof host !== "string" || host.length === 0) {
      throw new InvalidFieldError("host", resolved, "expected a non-empty string");
    }
    if (typeof port !== "number") {
      throw new InvalidFieldError("port", resolved, "expected an integer");
    }
    if (typeof accessToken !== "string") {
      throw new InvalidFieldError("access_token", resolved, "expected a string");
    }

    return new AuthenticatedCredentials(host, validatePort(port, resolved), accessToken);
  }

  /**
   * Save credentials as JSON, readable and writable by the owner only
   *
   * The document is written to a temporary sibling and renamed into place.
   *
   * @param options.mkdir - Create missing parent directories first
   * @throws {CredentialsIOError} if the parent directory is missing (and mkdir is false) or the write fails
   */
  async writeToFile(filePath: string, options: { mkdir?: boolean } = {}): Promise<this> {
    const resolved = resolveUserPath(filePath);
    const tempFile = `${resolved}.tmp`;

    try {
      if (options.mkdir) {
        await fs.mkdir(path.dirname(resolved), { recursive: true, mode: 0o700 });
      }

      await fs.writeFile(tempFile, `${JSON.stringify(this.toRecord(), null, 2)}\n`, { mode: 0o600 });
      await fs.rename(tempFile, resolved);

      // Ensure correct permissions (in case umask interfered); a no-op where POSIX modes are absent
      await fs.chmod(resolved, 0o600);
    } catch (error) {
      await fs.rm(tempFile, { force: true });
      const reason = error instanceof Error ? error.message : String(error);
      throw new CredentialsIOError(`Failed to write credentials: ${reason}`, resolved, { cause: error });
    }

    return this;
  }

  /**
   * Restore credentials from `{PREFIX}HOST`, `{PREFIX}PORT` and `{PREFIX}ACCESS_TOKEN`
   *
   * @param prefix - Variable-name prefix, upper-cased before use
   * @param env - Environment to read (defaults to process.env)
   * @throws {MissingFieldError} if any variable is unset or empty
   * @throws {InvalidFieldError} if PORT is not a valid port number
   */
  static fromEnv(prefix = "", env: NodeJS.ProcessEnv = process.env): AuthenticatedCredentials {
    const upper = prefix.toUpperCase();
    const source = "environment";

    const read = (name: string): string => {
      const value = env[`${upper}${name}`];
      if (value === undefined || value === "") {
        throw new MissingFieldError(`${upper}${name}`, source);
      }
      return value;
    };

    const host = read("HOST");
    const rawPort = read("PORT");
    const accessToken = read("ACCESS_TOKEN");

    const port = strictParseInt(rawPort);
    if (Number.isNaN(port)) {
      throw new InvalidFieldError(`${upper}PORT`, source, `"${rawPort}" is not an integer`);
    }

    return new AuthenticatedCredentials(host, validatePort(port, source), accessToken);
  }

  /**
   * Write one `export NAME=value` line per field, in host, port, access_token order
   *
   * Values are shell-quoted where needed, so the output is safe to `eval`.
   * The prefix must not contain whitespace; it is not checked here.
   */
  printToEnv(prefix = "", sink: TextSink = process.stdout): this {
    for (const [key, value] of Object.entries(this.toRecord())) {
      sink.write(`export ${prefix}${key.toUpperCase()}=${quoteShellArgument(String(value))}\n`);
    }
    return this;
  }
}
