/**
 * Environment report
 */

import chalk from "chalk";
import { getPackageInfo, type PackageInfo } from "../version.js";

export interface RuntimeInfo {
  execPath: string;
  nodeVersion: string;
}

export function describeEnvironment(
  packageInfo: PackageInfo = getPackageInfo(),
  runtime: RuntimeInfo = { execPath: process.execPath, nodeVersion: process.version }
): string[] {
  const lines = [
    `${chalk.bold("Node.js")}: ${runtime.execPath}`,
    `  version: ${runtime.nodeVersion}`,
    `${chalk.bold(packageInfo.name)}: ${packageInfo.version}`,
  ];
  for (const [dependency, range] of Object.entries(packageInfo.dependencies).sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`  ${dependency}: ${range}`);
  }
  return lines;
}

/**
 * Handle env command
 */
export async function handleEnv(): Promise<void> {
  for (const line of describeEnvironment()) {
    console.log(line);
  }
}
