/**
 * Unit tests for credential resolution (environment first, then file)
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { AuthenticatedCredentials } from "../../../src/auth/credentials.js";
import {
  credentialsPath,
  credentialsRemover,
  envPrefix,
  restoreCredentials,
} from "../../../src/auth/store.js";
import { InvalidFieldError, NotAuthenticatedError } from "../../../src/errors.js";

let testDir: string;
let filePath: string;

const ENV = {
  RESTCALL_HOST: "env.test",
  RESTCALL_PORT: "8443",
  RESTCALL_ACCESS_TOKEN: "env-token",
};

describe("Credential store", () => {
  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "restcall-store-"));
    filePath = path.join(testDir, ".restcall", "credentials");
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe("credentialsPath / envPrefix", () => {
    it("should place the file under .{appname} in the working directory", () => {
      expect(credentialsPath("restcall", "/work")).toBe(path.join("/work", ".restcall", "credentials"));
    });

    it("should upper-case the app name and replace other characters", () => {
      expect(envPrefix("restcall")).toBe("RESTCALL_");
      expect(envPrefix("my-api.cli")).toBe("MY_API_CLI_");
    });
  });

  describe("restoreCredentials", () => {
    it("should prefer the environment over the file", async () => {
      await new AuthenticatedCredentials("file.test", 443, "file-token").writeToFile(filePath, { mkdir: true });

      const credentials = await restoreCredentials({ appname: "restcall", env: ENV, filePath });

      expect(credentials.toRecord()).toEqual({ host: "env.test", port: 8443, access_token: "env-token" });
    });

    it("should not delete anything when environment credentials are purged", async () => {
      await new AuthenticatedCredentials("file.test", 443, "file-token").writeToFile(filePath, { mkdir: true });

      const credentials = await restoreCredentials({ appname: "restcall", env: ENV, filePath });
      await credentials.purge();

      expect(fs.existsSync(filePath)).toBe(true);
    });

    it("should fall back to the file when any variable is missing", async () => {
      await new AuthenticatedCredentials("file.test", 443, "file-token").writeToFile(filePath, { mkdir: true });

      const credentials = await restoreCredentials({
        appname: "restcall",
        env: { RESTCALL_HOST: "env.test", RESTCALL_PORT: "8443" },
        filePath,
      });

      expect(credentials.toRecord()).toEqual({ host: "file.test", port: 443, access_token: "file-token" });
    });

    it("should delete the file when file-backed credentials are purged", async () => {
      await new AuthenticatedCredentials("file.test", 443, "file-token").writeToFile(filePath, { mkdir: true });

      const credentials = await restoreCredentials({ appname: "restcall", env: {}, filePath });
      await credentials.purge();
      await credentials.purge();

      expect(fs.existsSync(filePath)).toBe(false);
    });

    it("should report not authenticated when neither source has credentials", async () => {
      const result = restoreCredentials({ appname: "restcall", env: {}, filePath });

      await expect(result).rejects.toThrow(NotAuthenticatedError);
      await expect(result).rejects.toThrow(
        "Not yet authenticated. Please authenticate using the 'auth' subcommand first."
      );
    });

    it("should not fall back when the environment holds a malformed port", async () => {
      await new AuthenticatedCredentials("file.test", 443, "file-token").writeToFile(filePath, { mkdir: true });

      const result = restoreCredentials({
        appname: "restcall",
        env: { ...ENV, RESTCALL_PORT: "eighty" },
        filePath,
      });

      await expect(result).rejects.toThrow(InvalidFieldError);
    });

    it("should surface a corrupt file instead of reporting not authenticated", async () => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify({ host: "file.test", port: 443 }));

      await expect(restoreCredentials({ appname: "restcall", env: {}, filePath })).rejects.toMatchObject({
        name: "MissingFieldError",
        field: "access_token",
      });
    });
  });

  describe("credentialsRemover", () => {
    it("should tolerate a file that is already gone", async () => {
      await expect(credentialsRemover(filePath)()).resolves.toBeUndefined();
    });
  });
});
