/**
 * Authenticators exchange a username and password for an access token
 */

import { AuthenticationError } from "../errors.js";
import type { Transport } from "../http/transport.js";
import { composeUrl } from "../http/url.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Credentials } from "./credentials.js";

export interface Authenticator {
  /**
   * @returns The access token
   */
  authenticate(credentials: Credentials): Promise<string>;
}

export interface PasswordGrantOptions {
  /** Token endpoint path (default: /auth/token) */
  tokenPath?: string;
  logger?: Logger;
}

/**
 * POSTs `{ username, password }` to the token endpoint and reads
 * `access_token` (or `token`) from the JSON reply
 */
export class PasswordGrantAuthenticator implements Authenticator {
  private readonly tokenPath: string;
  private readonly logger: Logger;

  constructor(
    private readonly transport: Transport,
    options: PasswordGrantOptions = {}
  ) {
    this.tokenPath = options.tokenPath ?? "/auth/token";
    this.logger = options.logger ?? silentLogger;
  }

  async authenticate(credentials: Credentials): Promise<string> {
    const url = composeUrl(credentials, this.tokenPath);

    // Only the endpoint is logged; username and password never are
    this.logger.info({ host: credentials.host, port: credentials.port }, "Requesting access token");

    const response = await this.transport.send({
      method: "POST",
      url,
      headers: { Accept: "application/json" },
      body: { username: credentials.username, password: credentials.password },
    });

    if (response.status !== 200) {
      throw new AuthenticationError(
        `Authentication rejected: ${response.status} ${response.statusText}`.trimEnd(),
        response.status
      );
    }

    let reply: unknown;
    try {
      reply = JSON.parse(response.text);
    } catch (error) {
      throw new AuthenticationError("Token endpoint did not return JSON", response.status, { cause: error });
    }

    const token = extractToken(reply);
    if (token === undefined) {
      throw new AuthenticationError("Token endpoint reply carries no access_token", response.status);
    }

    this.logger.debug("Access token received");
    return token;
  }
}

function extractToken(reply: unknown): string | undefined {
  if (typeof reply !== "object" || reply === null) {
    return undefined;
  }
  for (const key of ["access_token", "token"]) {
    if (key in reply) {
      const value: unknown = Reflect.get(reply, key);
      if (typeof value === "string" && value.length > 0) {
        return value;
      }
    }
  }
  return undefined;
}
