import { describe, it, expect } from "vitest";
import { quoteShellArgument, toCommandLine } from "../../../src/http/curl.js";
import { composeUrl } from "../../../src/http/url.js";

describe("quoteShellArgument", () => {
  it("should leave safe arguments unquoted", () => {
    expect(quoteShellArgument("-X")).toBe("-X");
    expect(quoteShellArgument("https://api.test:443/users")).toBe("https://api.test:443/users");
  });

  it("should single-quote arguments with spaces or shell characters", () => {
    expect(quoteShellArgument("Accept: text/plain")).toBe("'Accept: text/plain'");
    expect(quoteShellArgument('{"a":1}')).toBe(`'{"a":1}'`);
    expect(quoteShellArgument("/items?id=1&x=2")).toBe("'/items?id=1&x=2'");
    expect(quoteShellArgument("")).toBe("''");
  });

  it("should escape embedded single quotes", () => {
    expect(quoteShellArgument("it's")).toBe(`'it'\\''s'`);
  });
});

describe("toCommandLine", () => {
  it("should join quoted arguments with spaces", () => {
    expect(toCommandLine(["curl", "-H", "X-A: 1", "--data", "{}"])).toBe("curl -H 'X-A: 1' --data '{}'");
  });
});

describe("composeUrl", () => {
  it("should always use https with an explicit port", () => {
    expect(composeUrl({ host: "api.test", port: 443 }, "/")).toBe("https://api.test:443/");
  });

  it("should bracket IPv6 literals", () => {
    expect(composeUrl({ host: "::1", port: 8443 }, "/health")).toBe("https://[::1]:8443/health");
    expect(composeUrl({ host: "[::1]", port: 8443 }, "/health")).toBe("https://[::1]:8443/health");
  });
});
