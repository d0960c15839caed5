/**
 * Version utilities
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface PackageInfo {
  name: string;
  version: string;
  dependencies: Record<string, string>;
}

/**
 * Read name, version and runtime dependencies from package.json
 */
export function getPackageInfo(): PackageInfo {
  // src/ in development and dist/ in production both sit one level below package.json
  const packageJsonPath = path.join(__dirname, "..", "package.json");
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));

  const info: PackageInfo = { name: "restcall", version: "unknown", dependencies: {} };
  if (typeof packageJson !== "object" || packageJson === null) {
    return info;
  }

  const fields = new Map<string, unknown>(Object.entries(packageJson));
  const name = fields.get("name");
  const version = fields.get("version");
  const dependencies = fields.get("dependencies");

  if (typeof name === "string") info.name = name;
  if (typeof version === "string") info.version = version;
  if (typeof dependencies === "object" && dependencies !== null) {
    for (const [dependency, range] of Object.entries(dependencies)) {
      if (typeof range === "string") {
        info.dependencies[dependency] = range;
      }
    }
  }
  return info;
}

/**
 * Get the CLI version from package.json
 */
export function getVersion(): string {
  return getPackageInfo().version;
}

/**
 * The current CLI version
 */
export const VERSION = getVersion();
