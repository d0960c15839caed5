#!/usr/bin/env node

/**
 * restcall CLI - authenticated calls against a REST API
 */

import { Command, Option } from "commander";
import { handleAuth, handleLogout, type AuthCommandOptions } from "./cli/auth-commands.js";
import { handleCall, type CallCommandOptions } from "./cli/call-commands.js";
import type { CommandContext } from "./cli/context.js";
import { handleEnv } from "./cli/env-commands.js";
import { collect } from "./cli/input.js";
import { APP_NAME, loadSettings } from "./config.js";
import { formatErrorMessage } from "./errors.js";
import { AxiosTransport } from "./http/transport.js";
import { createLogger, levelForVerbosity } from "./logger.js";
import { VERSION } from "./version.js";

/**
 * Build the command context from settings and global options
 */
function getContext(): CommandContext {
  const settings = loadSettings(process.env);
  const verbosity: number = program.opts<{ verbose: number }>().verbose;
  const logger = createLogger({ level: levelForVerbosity(verbosity, settings.logLevel) });

  return {
    appname: APP_NAME,
    settings,
    logger,
    env: process.env,
    cwd: process.cwd(),
    createTransport: ({ insecure, timeoutMs }) =>
      new AxiosTransport({ insecure, timeoutMs, logger: logger.child({ component: "transport" }) }),
  };
}

/**
 * Run a handler, printing any error as a CLI error block
 */
async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(formatErrorMessage(error, APP_NAME));
    process.exit(1);
  }
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

// Create main program
const program = new Command();

program
  .name(APP_NAME)
  .description("restcall - authenticated calls against a REST API")
  .version(VERSION)
  .option("-v, --verbose", "Increase log output (-v info, -vv debug)", increaseVerbosity, 0);

// ============================================================================
// AUTH COMMANDS
// ============================================================================

program
  .command("auth")
  .description("Exchange a username and password for an access token")
  .requiredOption("--host <host>", "API host name")
  .option("--port <port>", "API port", "443")
  .requiredOption("--user <user>", "User name")
  .addOption(new Option("--pass <password>", "Password (prompted when omitted)").hideHelp())
  .option("--env", "Print export lines instead of writing the credentials file")
  .option("--insecure", "Skip TLS certificate verification")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .action(async (options: AuthCommandOptions) => {
    await run(() => handleAuth(getContext(), options));
  });

program
  .command("logout")
  .description("Remove the stored credentials file")
  .action(async () => {
    await run(() => handleLogout(getContext()));
  });

// ============================================================================
// CALL COMMAND
// ============================================================================

program
  .command("call <method> <path>")
  .description("Send an authenticated request and print the response body")
  .option("-H, --header <header>", 'Request header "Name: value" (repeatable)', collect, [])
  .option("-B, --body <json>", "JSON request body, or @file to read it from a file")
  .option("--curl", "Print an equivalent curl command instead of sending")
  .option("--show-header", "Print the response status and headers to stderr")
  .option("-p, --pretty", "Indent JSON responses")
  .option("--insecure", "Skip TLS certificate verification")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .action(async (method: string, path: string, options: CallCommandOptions) => {
    await run(() => handleCall(getContext(), method, path, options));
  });

// ============================================================================
// ENV COMMAND
// ============================================================================

program
  .command("env")
  .description("Show the runtime and dependency versions")
  .action(async () => {
    await run(() => handleEnv());
  });

// Parse arguments
await program.parseAsync(process.argv);
