/**
 * Caller - builds authenticated requests against the credentials' host
 *
 * A CallRequest is bound to one Caller. Its URL and credential-applied
 * headers are computed on first use and reused afterwards, so the applier
 * runs at most once per request whether the request is sent, rendered as
 * curl, or both.
 */

import type { CredentialApplier } from "../auth/applier.js";
import type { AuthenticatedCredentials } from "../auth/credentials.js";
import { HttpResponseError, InvalidPathError, UnsupportedMethodError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { toCommandLine } from "./curl.js";
import {
  HTTP_METHODS,
  type HttpMethod,
  type JsonValue,
  type OutgoingRequest,
  type Transport,
  type TransportResponse,
} from "./transport.js";
import { composeUrl } from "./url.js";

export interface CallerOptions {
  /** The transport skips TLS verification; reflected as --insecure in curl output */
  insecure?: boolean;
  logger?: Logger;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: JsonValue;
}

/**
 * Upper-case and validate an HTTP method
 *
 * @throws {UnsupportedMethodError}
 */
export function normalizeMethod(method: string): HttpMethod {
  const upper = method.toUpperCase();
  const match = HTTP_METHODS.find((candidate) => candidate === upper);
  if (match === undefined) {
    throw new UnsupportedMethodError(method);
  }
  return match;
}

/**
 * @throws {InvalidPathError} if the path does not start with '/'
 */
export function assertPath(path: string): string {
  if (!path.startsWith("/")) {
    throw new InvalidPathError(path);
  }
  return path;
}

export class Caller {
  readonly insecure: boolean;
  readonly logger: Logger;

  constructor(
    readonly credentials: AuthenticatedCredentials,
    private readonly applier: CredentialApplier,
    private readonly transport: Transport,
    options: CallerOptions = {}
  ) {
    this.insecure = options.insecure ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build a request; nothing is sent until invoke()
   *
   * @throws {UnsupportedMethodError}
   * @throws {InvalidPathError}
   */
  request(method: string, path: string, options: RequestOptions = {}): CallRequest {
    return new CallRequest(this, method, path, options);
  }

  /**
   * Apply this caller's credentials to a set of headers
   */
  applyCredential(headers: Record<string, string>): Record<string, string> {
    return this.applier.apply(this.credentials, headers);
  }

  send(request: OutgoingRequest): Promise<TransportResponse> {
    return this.transport.send(request);
  }
}

export class CallRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly body: JsonValue | undefined;
  private readonly inputHeaders: Record<string, string>;
  private cachedUrl: string | undefined;
  private cachedHeaders: Record<string, string> | undefined;

  constructor(
    private readonly caller: Caller,
    method: string,
    path: string,
    options: RequestOptions = {}
  ) {
    this.method = normalizeMethod(method);
    this.path = assertPath(path);
    // Copies, so later changes to the caller's objects don't leak into this request
    this.inputHeaders = structuredClone(options.headers ?? {});
    // A JSON null body means no body, as with an absent one
    this.body = options.body === undefined || options.body === null ? undefined : structuredClone(options.body);
  }

  get credentials(): AuthenticatedCredentials {
    return this.caller.credentials;
  }

  get logger(): Logger {
    return this.caller.logger;
  }

  /**
   * `https://{host}:{port}{path}`
   */
  url(): string {
    if (this.cachedUrl === undefined) {
      this.cachedUrl = composeUrl(this.caller.credentials, this.path);
    }
    return this.cachedUrl;
  }

  /**
   * Request headers with credentials applied
   */
  headers(): Record<string, string> {
    if (this.cachedHeaders === undefined) {
      this.cachedHeaders = this.caller.applyCredential({ ...this.inputHeaders });
    }
    return { ...this.cachedHeaders };
  }

  /**
   * Send the request
   *
   * @throws {HttpResponseError} for any status other than 200
   * @throws {TransportError} when no response arrives
   */
  async invoke(): Promise<TransportResponse> {
    const logger = this.logger;
    logger.info(`${this.method} ${this.url()}`);

    const request: OutgoingRequest = { method: this.method, url: this.url(), headers: this.headers() };
    if (this.body !== undefined) {
      request.body = this.body;
    }

    const response = await this.caller.send(request);

    logger.debug({ status: response.status, reason: response.statusText }, "Response status");
    logger.debug({ text: response.text }, "Response body");

    if (response.status !== 200) {
      throw new HttpResponseError(response.status, response.statusText, response.text, response.headers);
    }

    return response;
  }

  /**
   * curl argv equivalent to invoke()
   */
  similarOfCurl(): string[] {
    const argv = ["curl"];

    if (this.caller.insecure) {
      argv.push("--insecure");
    }
    argv.push("-X", this.method, this.url());

    for (const [name, value] of Object.entries(this.headers())) {
      argv.push("-H", `${name}: ${value}`);
    }

    if (this.body !== undefined) {
      argv.push("-H", "Content-Type: application/json");
      argv.push("--data", JSON.stringify(this.body));
    }

    return argv;
  }

  /**
   * similarOfCurl() as a single shell-quoted line
   */
  toCurlCommandLine(): string {
    return toCommandLine(this.similarOfCurl());
  }
}

/**
 * Send a request; if the server answers 401, purge the credentials before rethrowing
 *
 * The request is not retried. A failing purge never replaces the HTTP error;
 * it is recorded on `purgeError`.
 */
export async function invokeOrPurge(request: CallRequest): Promise<TransportResponse> {
  try {
    return await request.invoke();
  } catch (error) {
    if (error instanceof HttpResponseError && error.statusCode === 401) {
      request.logger.warn("Credentials rejected (401); purging stored credentials");
      try {
        await request.credentials.purge();
      } catch (purgeError) {
        const reason = purgeError instanceof Error ? purgeError.message : String(purgeError);
        request.logger.warn({ reason }, "Failed to purge stored credentials");
        error.purgeError = purgeError;
      }
    }
    throw error;
  }
}
