/**
 * Main entry point for restcall
 */

export * from "./auth/index.js";
export * from "./http/index.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./logger.js";
export { resolveUserPath } from "./paths.js";
export { getPackageInfo, getVersion, VERSION, type PackageInfo } from "./version.js";
