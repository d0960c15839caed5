/**
 * Unit tests for error types and CLI error formatting
 */

import { describe, it, expect } from "vitest";
import {
  AuthenticationError,
  BadParameterError,
  ConfigurationError,
  HttpResponseError,
  InvalidPathError,
  MissingFieldError,
  NotAuthenticatedError,
  RestcallError,
  TransportError,
  UnsupportedMethodError,
  formatErrorMessage,
  isErrnoException,
  isHttpResponseError,
  isMissingFieldError,
  isNotAuthenticatedError,
  isRestcallError,
} from "../../src/errors.js";

describe("Error classes", () => {
  it("should keep the subclass through instanceof and carry a code", () => {
    const error = new MissingFieldError("host", "environment");

    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error).toBeInstanceOf(RestcallError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("MISSING_FIELD");
    expect(error.name).toBe("MissingFieldError");
    expect(error.message).toBe('Missing "host" in environment');
  });

  it("should describe HTTP failures by status and reason", () => {
    const error = new HttpResponseError(404, "Not Found", '{"detail":"nope"}');

    expect(error.message).toBe("HTTP 404 Not Found");
    expect(error.statusCode).toBe(404);
    expect(error.text).toBe('{"detail":"nope"}');
    expect(error.headers).toEqual({});
  });

  it("should trim the message when the reason is empty", () => {
    expect(new HttpResponseError(500, "", "").message).toBe("HTTP 500");
  });

  it("should name the offending path and method", () => {
    expect(new InvalidPathError("users").message).toBe(`"users": must start with '/'`);
    expect(new UnsupportedMethodError("TRACE").message).toBe("Unsupported method: TRACE");
  });

  it("should keep the cause", () => {
    const cause = new Error("ECONNREFUSED");
    const error = new TransportError("GET https://h:1/ failed", "reach https://h:1/", { cause });

    expect(error.cause).toBe(cause);
  });
});

describe("Type guards", () => {
  it("should narrow restcall errors", () => {
    expect(isRestcallError(new NotAuthenticatedError("restcall"))).toBe(true);
    expect(isRestcallError(new Error("plain"))).toBe(false);
    expect(isNotAuthenticatedError(new NotAuthenticatedError("restcall"))).toBe(true);
    expect(isMissingFieldError(new NotAuthenticatedError("restcall"))).toBe(false);
    expect(isHttpResponseError(new HttpResponseError(401, "Unauthorized", ""))).toBe(true);
    expect(isHttpResponseError("HTTP 401")).toBe(false);
  });

  it("should recognize Node.js system errors", () => {
    const error = Object.assign(new Error("no such file"), { code: "ENOENT" });

    expect(isErrnoException(error)).toBe(true);
    expect(isErrnoException(new Error("no code"))).toBe(false);
    expect(isErrnoException({ code: "ENOENT" })).toBe(false);
  });
});

describe("formatErrorMessage", () => {
  it("should suggest the auth command when not authenticated", () => {
    const output = formatErrorMessage(new NotAuthenticatedError("restcall"), "restcall");

    expect(output).toBe(
      [
        "✗ Not authenticated",
        "",
        "  Not yet authenticated. Please authenticate using the 'auth' subcommand first.",
        "",
        "  To authenticate:",
        "    restcall auth --host <host> --user <user>",
      ].join("\n")
    );
  });

  it("should include the cause of an authentication failure", () => {
    const error = new AuthenticationError("Authentication against api.test:443 failed", undefined, {
      cause: new Error("socket hang up"),
    });

    expect(formatErrorMessage(error, "restcall")).toBe(
      [
        "✗ Authentication failed",
        "",
        "  Authentication against api.test:443 failed",
        "",
        "  Context: socket hang up",
      ].join("\n")
    );
  });

  it("should point at --help for bad parameters", () => {
    const output = formatErrorMessage(new BadParameterError("abc: expected a number", "--port"), "restcall");

    expect(output.split("\n")[0]).toBe("✗ Invalid value for --port");
    expect(output.endsWith("    restcall --help")).toBe(true);
  });

  it("should render configuration errors", () => {
    const output = formatErrorMessage(new ConfigurationError("bad settings", ["RESTCALL_INSECURE"]), "restcall");

    expect(output).toBe("✗ Invalid configuration\n\n  bad settings");
  });

  it("should fall back for plain errors and non-errors", () => {
    expect(formatErrorMessage(new Error("boom"), "restcall")).toBe("✗ An error occurred\n\n  boom");
    expect(formatErrorMessage("boom", "restcall")).toBe("✗ An unexpected error occurred\n\n  boom");
  });
});
