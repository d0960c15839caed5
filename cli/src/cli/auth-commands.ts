/**
 * Authentication command handlers
 */

import chalk from "chalk";
import * as fs from "fs/promises";
import { PasswordGrantAuthenticator } from "../auth/authenticator.js";
import { Credentials } from "../auth/credentials.js";
import { credentialsRemover, envPrefix } from "../auth/store.js";
import { strictParseInt } from "../config.js";
import { BadParameterError, isErrnoException } from "../errors.js";
import { resolveCredentialsFile, resolveTransportSettings, type CommandContext, type TransportFlags } from "./context.js";
import { promptPassword } from "./prompt.js";

export const DEFAULT_PORT = 443;

export interface AuthCommandOptions extends TransportFlags {
  host: string;
  port?: string;
  user: string;
  pass?: string;
  /** Print `export` lines instead of writing the credentials file */
  env?: boolean;
}

export type PasswordPrompt = (message: string) => Promise<string>;

/**
 * @throws {BadParameterError} if the value is not an integer between 1 and 65535
 */
export function parsePortOption(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_PORT;
  }
  const port = strictParseInt(value);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new BadParameterError(`${value}: must be an integer between 1 and 65535`, "--port");
  }
  return port;
}

/**
 * Handle auth command
 */
export async function handleAuth(
  context: CommandContext,
  options: AuthCommandOptions,
  prompt: PasswordPrompt = promptPassword
): Promise<void> {
  const port = parsePortOption(options.port);
  const password = options.pass ?? (await prompt("Password: "));

  const transport = context.createTransport(resolveTransportSettings(context.settings, options));
  const authenticator = new PasswordGrantAuthenticator(transport, {
    tokenPath: context.settings.tokenPath,
    logger: context.logger,
  });

  const credentials = new Credentials(options.host, port, options.user, password);
  const authenticated = await credentials.authenticate(authenticator);

  if (options.env) {
    authenticated.printToEnv(envPrefix(context.appname), process.stdout);
    return;
  }

  const filePath = resolveCredentialsFile(context);
  await authenticated.writeToFile(filePath, { mkdir: true });
  console.error(chalk.green(`✓ Authenticated with ${options.host}:${port}`));
  console.error(chalk.gray(`  Credentials saved to ${filePath}`));
}

/**
 * Handle logout command
 *
 * Removes the credentials file. Credentials held in environment variables
 * are left alone.
 */
export async function handleLogout(context: CommandContext): Promise<void> {
  const filePath = resolveCredentialsFile(context);
  const existed = await fileExists(filePath);
  await credentialsRemover(filePath)();

  if (existed) {
    console.error(chalk.green(`✓ Removed ${filePath}`));
  } else {
    console.error(chalk.yellow(`No credentials file at ${filePath}`));
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
