/**
 * Custom error types for restcall
 *
 * Every failure that reaches the command line is one of these, so the CLI
 * boundary can render a title, an explanation and a suggested action.
 */

/**
 * Base class for all restcall errors
 */
export class RestcallError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "RestcallError";
    Object.setPrototypeOf(this, RestcallError.prototype);
  }
}

/**
 * No usable credentials in the environment or in the credentials file
 */
export class NotAuthenticatedError extends RestcallError {
  constructor(
    public readonly appname: string,
    options?: ErrorOptions
  ) {
    super(
      "Not yet authenticated. Please authenticate using the 'auth' subcommand first.",
      "NOT_AUTHENTICATED",
      options
    );
    this.name = "NotAuthenticatedError";
    Object.setPrototypeOf(this, NotAuthenticatedError.prototype);
  }
}

/**
 * A persisted credential lacks one of host, port or access_token
 */
export class MissingFieldError extends RestcallError {
  constructor(
    public readonly field: string,
    public readonly source: string
  ) {
    super(`Missing "${field}" in ${source}`, "MISSING_FIELD");
    this.name = "MissingFieldError";
    Object.setPrototypeOf(this, MissingFieldError.prototype);
  }
}

/**
 * A persisted credential field is present but unusable (e.g. a port that is not an integer)
 */
export class InvalidFieldError extends RestcallError {
  constructor(
    public readonly field: string,
    public readonly source: string,
    reason: string
  ) {
    super(`Invalid "${field}" in ${source}: ${reason}`, "INVALID_FIELD");
    this.name = "InvalidFieldError";
    Object.setPrototypeOf(this, InvalidFieldError.prototype);
  }
}

/**
 * The credentials file exists but is not a JSON object
 */
export class CredentialsParseError extends RestcallError {
  constructor(
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`${filePath}: not a valid credentials document`, "PARSE_ERROR", options);
    this.name = "CredentialsParseError";
    Object.setPrototypeOf(this, CredentialsParseError.prototype);
  }
}

/**
 * The credentials file does not exist
 */
export class CredentialsNotFoundError extends RestcallError {
  constructor(
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`${filePath}: no such credentials file`, "NOT_FOUND", options);
    this.name = "CredentialsNotFoundError";
    Object.setPrototypeOf(this, CredentialsNotFoundError.prototype);
  }
}

/**
 * Reading, writing or removing the credentials file failed
 */
export class CredentialsIOError extends RestcallError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(message, "IO_ERROR", options);
    this.name = "CredentialsIOError";
    Object.setPrototypeOf(this, CredentialsIOError.prototype);
  }
}

/**
 * Request path does not start with '/'
 */
export class InvalidPathError extends RestcallError {
  constructor(public readonly path: string) {
    super(`${JSON.stringify(path)}: must start with '/'`, "INVALID_PATH");
    this.name = "InvalidPathError";
    Object.setPrototypeOf(this, InvalidPathError.prototype);
  }
}

/**
 * HTTP method outside GET, POST, PUT, PATCH and DELETE
 */
export class UnsupportedMethodError extends RestcallError {
  constructor(public readonly method: string) {
    super(`Unsupported method: ${method}`, "UNSUPPORTED_METHOD");
    this.name = "UnsupportedMethodError";
    Object.setPrototypeOf(this, UnsupportedMethodError.prototype);
  }
}

/**
 * The server answered with anything other than 200
 */
export class HttpResponseError extends RestcallError {
  /** Set when purging credentials after a 401 failed as well */
  purgeError?: unknown;

  constructor(
    public readonly statusCode: number,
    public readonly reason: string,
    public readonly text: string,
    public readonly headers: Readonly<Record<string, string>> = {}
  ) {
    super(`HTTP ${statusCode} ${reason}`.trimEnd(), "HTTP_ERROR");
    this.name = "HttpResponseError";
    Object.setPrototypeOf(this, HttpResponseError.prototype);
  }
}

/**
 * Exchanging username and password for an access token failed
 */
export class AuthenticationError extends RestcallError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(message, "AUTH_ERROR", options);
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * The request never produced a response (DNS, TLS, connection, timeout)
 */
export class TransportError extends RestcallError {
  constructor(
    message: string,
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    super(message, "NETWORK_ERROR", options);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Invalid RESTCALL_* setting
 */
export class ConfigurationError extends RestcallError {
  constructor(
    message: string,
    public readonly fields: readonly string[] = []
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Invalid command-line argument or option value
 */
export class BadParameterError extends RestcallError {
  constructor(
    message: string,
    public readonly parameter: string,
    options?: ErrorOptions
  ) {
    super(message, "BAD_PARAMETER", options);
    this.name = "BadParameterError";
    Object.setPrototypeOf(this, BadParameterError.prototype);
  }
}

/**
 * Type guard to check if an error is a restcall error
 */
export function isRestcallError(error: unknown): error is RestcallError {
  return error instanceof RestcallError;
}

export function isNotAuthenticatedError(error: unknown): error is NotAuthenticatedError {
  return error instanceof NotAuthenticatedError;
}

export function isMissingFieldError(error: unknown): error is MissingFieldError {
  return error instanceof MissingFieldError;
}

export function isHttpResponseError(error: unknown): error is HttpResponseError {
  return error instanceof HttpResponseError;
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Narrow an unknown error to a Node.js system error (ENOENT, EACCES, ...)
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Pieces of a CLI error block
 */
export interface FormattedError {
  title: string;
  explanation: string;
  action?: string;
  command?: string;
  context?: string;
}

/**
 * Format an error for CLI output
 *
 * Format:
 * ✗ Error Title
 *
 *   Detailed explanation of what went wrong
 *
 *   Suggested action:
 *     command to run
 */
export function formatErrorMessage(error: unknown, appname: string): string {
  if (isNotAuthenticatedError(error)) {
    return formatErrorOutput({
      title: "Not authenticated",
      explanation: error.message,
      action: "To authenticate",
      command: `${appname} auth --host <host> --user <user>`,
    });
  }

  if (error instanceof MissingFieldError || error instanceof InvalidFieldError || error instanceof CredentialsParseError) {
    return formatErrorOutput({
      title: "Stored credentials are unusable",
      explanation: error.message,
      action: "To replace them",
      command: `${appname} logout && ${appname} auth --host <host> --user <user>`,
    });
  }

  if (isAuthenticationError(error)) {
    return formatErrorOutput({
      title: "Authentication failed",
      explanation: error.message,
      context: causeMessage(error),
    });
  }

  if (isTransportError(error)) {
    return formatErrorOutput({
      title: "Network request failed",
      explanation: `Unable to ${error.operation}.`,
      context: causeMessage(error) ?? error.message,
      action: "Suggested actions",
      command: [
        "• Check the host name and port",
        "• Use --insecure for servers with self-signed certificates",
      ].join("\n    "),
    });
  }

  if (isConfigurationError(error)) {
    return formatErrorOutput({
      title: "Invalid configuration",
      explanation: error.message,
    });
  }

  if (error instanceof BadParameterError) {
    return formatErrorOutput({
      title: `Invalid value for ${error.parameter}`,
      explanation: error.message,
      action: "For usage",
      command: `${appname} --help`,
    });
  }

  if (isRestcallError(error)) {
    return formatErrorOutput({
      title: "Request failed",
      explanation: error.message,
    });
  }

  if (error instanceof Error) {
    return formatErrorOutput({
      title: "An error occurred",
      explanation: error.message,
    });
  }

  return formatErrorOutput({
    title: "An unexpected error occurred",
    explanation: String(error),
  });
}

function causeMessage(error: Error): string | undefined {
  return error.cause instanceof Error ? error.cause.message : undefined;
}

function formatErrorOutput(error: FormattedError): string {
  const lines: string[] = [];

  lines.push(`✗ ${error.title}`);
  lines.push("");

  if (error.explanation) {
    lines.push(`  ${error.explanation}`);
    lines.push("");
  }

  if (error.context) {
    lines.push(`  Context: ${error.context}`);
    lines.push("");
  }

  if (error.action) {
    lines.push(`  ${error.action}:`);
    if (error.command) {
      lines.push(`    ${error.command}`);
    }
  }

  return lines.join("\n").trimEnd();
}
