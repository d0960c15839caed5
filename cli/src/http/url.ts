import type { Endpoint } from "../auth/credentials.js";

/**
 * Compose `https://{host}:{port}{path}`; IPv6 literals are bracketed
 */
export function composeUrl(endpoint: Endpoint, path: string): string {
  const host = endpoint.host.includes(":") && !endpoint.host.startsWith("[") ? `[${endpoint.host}]` : endpoint.host;
  return `https://${host}:${endpoint.port}${path}`;
}
