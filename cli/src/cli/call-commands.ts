/**
 * Call command handler
 */

import chalk from "chalk";
import { BearerTokenApplier } from "../auth/applier.js";
import { restoreCredentials } from "../auth/store.js";
import { isHttpResponseError } from "../errors.js";
import { Caller, assertPath, invokeOrPurge, normalizeMethod } from "../http/caller.js";
import type { TransportResponse } from "../http/transport.js";
import { resolveCredentialsFile, resolveTransportSettings, type CommandContext, type TransportFlags } from "./context.js";
import { parseHeaderPairs, parseJsonArgument } from "./input.js";

export interface CallCommandOptions extends TransportFlags {
  header?: string[];
  body?: string;
  curl?: boolean;
  showHeader?: boolean;
  pretty?: boolean;
}

/**
 * Handle call command
 *
 * Arguments are validated before credentials are read, so a bad method or
 * path fails the same way whether or not the user has authenticated.
 */
export async function handleCall(
  context: CommandContext,
  method: string,
  path: string,
  options: CallCommandOptions
): Promise<void> {
  const normalizedMethod = normalizeMethod(method);
  assertPath(path);
  const headers = parseHeaderPairs(options.header ?? []);
  const body = parseJsonArgument(options.body);
  const transportSettings = resolveTransportSettings(context.settings, options);

  const credentials = await restoreCredentials({
    appname: context.appname,
    env: context.env,
    filePath: resolveCredentialsFile(context),
    logger: context.logger,
  });

  const caller = new Caller(
    credentials,
    new BearerTokenApplier(context.logger),
    context.createTransport(transportSettings),
    { insecure: transportSettings.insecure, logger: context.logger }
  );
  const request = caller.request(normalizedMethod, path, body === undefined ? { headers } : { headers, body });

  if (options.curl) {
    console.log(request.toCurlCommandLine());
    return;
  }

  let response: TransportResponse;
  try {
    response = await invokeOrPurge(request);
  } catch (error) {
    if (isHttpResponseError(error)) {
      console.error(chalk.red(`${error.statusCode} ${error.reason}`.trimEnd()));
      if (error.text) {
        console.log(error.text);
      }
      if (error.purgeError !== undefined) {
        const reason = error.purgeError instanceof Error ? error.purgeError.message : String(error.purgeError);
        console.error(chalk.yellow(`Could not remove stored credentials: ${reason}`));
      }
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (options.showHeader) {
    printStatusAndHeaders(response);
  }
  console.log(formatResponseBody(response, options.pretty === true));
}

function printStatusAndHeaders(response: TransportResponse): void {
  console.error(chalk.bold(`${response.status} ${response.statusText}`.trimEnd()));
  for (const [name, value] of Object.entries(response.headers)) {
    console.error(chalk.gray(`${name}: ${value}`));
  }
  console.error("");
}

/**
 * `application/json` and `application/*+json` count as JSON
 */
export function isJsonContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) {
    return false;
  }
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  return mediaType === "application/json" || mediaType.endsWith("+json");
}

/**
 * Re-serialize JSON bodies (indented by 2 when pretty); other bodies pass through
 */
export function formatResponseBody(response: TransportResponse, pretty: boolean): string {
  const contentType = Object.entries(response.headers).find(([name]) => name.toLowerCase() === "content-type")?.[1];
  if (!isJsonContentType(contentType)) {
    return response.text;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(response.text);
  } catch {
    // Mislabelled body; show it as sent
    return response.text;
  }
  return pretty ? JSON.stringify(parsed, null, 2) : JSON.stringify(parsed);
}
