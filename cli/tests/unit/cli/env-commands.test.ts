import { describe, it, expect, afterEach, vi } from "vitest";
import { describeEnvironment, handleEnv } from "../../../src/cli/env-commands.js";
import { getPackageInfo } from "../../../src/version.js";

describe("Env Command", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should list the runtime, the CLI version and its dependencies", () => {
    const lines = describeEnvironment(
      { name: "restcall", version: "1.2.3", dependencies: { pino: "^9.5.0", axios: "^1.7.9" } },
      { execPath: "/usr/bin/node", nodeVersion: "v20.11.0" }
    );

    expect(lines).toEqual([
      "Node.js: /usr/bin/node",
      "  version: v20.11.0",
      "restcall: 1.2.3",
      "  axios: ^1.7.9",
      "  pino: ^9.5.0",
    ]);
  });

  it("should read its own package.json", () => {
    const info = getPackageInfo();

    expect(info.name).toBe("restcall");
    expect(Object.keys(info.dependencies)).toContain("axios");
  });

  it("should print one line per entry", async () => {
    const consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await handleEnv();

    expect(consoleLogSpy.mock.calls[0]).toEqual([`Node.js: ${process.execPath}`]);
    expect(consoleLogSpy.mock.calls[1]).toEqual([`  version: ${process.version}`]);
  });
});
