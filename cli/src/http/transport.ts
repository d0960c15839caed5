/**
 * HTTP transport - the only place that touches the network
 *
 * `Transport` is the seam the rest of the code depends on; `AxiosTransport`
 * is the production implementation. Tests substitute an in-process fake.
 */

import * as https from "https";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { TransportError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Fully built request handed to a transport
 */
export interface OutgoingRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: JsonValue;
}

/**
 * Response as seen by the rest of restcall: status line, flattened headers, raw text
 */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  text: string;
}

export interface Transport {
  send(request: OutgoingRequest): Promise<TransportResponse>;
}

export interface AxiosTransportOptions {
  /** Skip TLS certificate verification (self-signed servers) */
  insecure?: boolean;
  /** Request timeout in milliseconds; 0 disables it */
  timeoutMs?: number;
  logger?: Logger;
  /** Replaces axios' HTTP adapter */
  adapter?: AxiosAdapter;
}

/**
 * Transport built on axios
 *
 * Every status code resolves (status checks belong to the caller), redirects
 * are not followed, and the body is kept as text.
 */
export class AxiosTransport implements Transport {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: AxiosTransportOptions = {}) {
    this.logger = options.logger ?? silentLogger;

    if (options.insecure) {
      this.logger.warn("TLS certificate verification is disabled");
    }

    this.http = axios.create({
      timeout: options.timeoutMs ?? 0,
      httpsAgent: new https.Agent({ rejectUnauthorized: !options.insecure }),
      maxRedirects: 0,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  async send(request: OutgoingRequest): Promise<TransportResponse> {
    const hasBody = request.body !== undefined;
    const headers: Record<string, string> = hasBody
      ? { "Content-Type": "application/json", ...request.headers }
      : { ...request.headers };

    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: request.url,
        headers,
        data: hasBody ? JSON.stringify(request.body) : undefined,
      });

      return {
        status: response.status,
        statusText: response.statusText ?? "",
        headers: flattenHeaders(response.headers),
        text: typeof response.data === "string" ? response.data : "",
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${request.method} ${request.url} failed: ${reason}`, `reach ${request.url}`, {
        cause: error,
      });
    }
  }
}

/**
 * Flatten axios response headers into plain strings
 */
export function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      flat[name] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      flat[name] = String(value);
    } else if (Array.isArray(value)) {
      flat[name] = value.map(String).join(", ");
    }
  }
  return flat;
}
