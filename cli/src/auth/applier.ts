import { silentLogger, type Logger } from "../logger.js";
import type { AuthenticatedCredentials } from "./credentials.js";

/**
 * Stamps credentials onto outgoing request headers
 */
export interface CredentialApplier {
  apply(credentials: AuthenticatedCredentials, headers: Record<string, string>): Record<string, string>;
}

/**
 * Adds `Authorization: Bearer <token>`
 */
export class BearerTokenApplier implements CredentialApplier {
  constructor(private readonly logger: Logger = silentLogger) {}

  apply(credentials: AuthenticatedCredentials, headers: Record<string, string>): Record<string, string> {
    const applied = { ...headers, Authorization: `Bearer ${credentials.accessToken}` };

    // debug only, and headers.Authorization is censored by the logger
    this.logger.debug({ headers: applied }, "Applied credentials");

    return applied;
  }
}
