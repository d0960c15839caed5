import { describe, it, expect } from "vitest";
import * as os from "os";
import * as path from "path";
import { resolveUserPath } from "../../src/paths.js";

describe("resolveUserPath", () => {
  it("should expand a leading ~", () => {
    expect(resolveUserPath("~")).toBe(os.homedir());
    expect(resolveUserPath("~/creds.json")).toBe(path.join(os.homedir(), "creds.json"));
  });

  it("should resolve relative paths against the given directory", () => {
    expect(resolveUserPath("a/b", "/work")).toBe(path.resolve("/work", "a/b"));
  });

  it("should leave absolute paths alone", () => {
    expect(resolveUserPath("/etc/creds", "/work")).toBe(path.resolve("/etc/creds"));
  });

  it("should not expand ~ in the middle of a name", () => {
    expect(resolveUserPath("a~b", "/work")).toBe(path.resolve("/work", "a~b"));
  });
});
