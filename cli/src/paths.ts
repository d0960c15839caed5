import * as os from "os";
import * as path from "path";

/**
 * Expand a leading `~` and resolve against the working directory
 */
export function resolveUserPath(filePath: string, cwd: string = process.cwd()): string {
  if (filePath === "~") {
    return os.homedir();
  }
  if (filePath.startsWith("~/") || filePath.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return path.resolve(cwd, filePath);
}
