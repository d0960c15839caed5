/**
 * Unit tests for the axios transport, using a stub adapter instead of the network
 */

import { describe, it, expect } from "vitest";
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { TransportError } from "../../../src/errors.js";
import { AxiosTransport, flattenHeaders } from "../../../src/http/transport.js";

function stubAdapter(reply: Partial<AxiosResponse>): { adapter: AxiosAdapter; seen: InternalAxiosRequestConfig[] } {
  const seen: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    return {
      data: "",
      status: 200,
      statusText: "OK",
      headers: {},
      ...reply,
      config,
    };
  };
  return { adapter, seen };
}

describe("AxiosTransport", () => {
  it("should send the body as JSON with a content type", async () => {
    const { adapter, seen } = stubAdapter({ data: '{"id":1}', headers: { "content-type": "application/json" } });
    const transport = new AxiosTransport({ adapter });

    const response = await transport.send({
      method: "POST",
      url: "https://api.test:443/items",
      headers: { Authorization: "Bearer test-token" },
      body: { name: "widget" },
    });

    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe("post");
    expect(seen[0].url).toBe("https://api.test:443/items");
    expect(seen[0].data).toBe('{"name":"widget"}');
    expect(seen[0].headers.get("Content-Type")).toBe("application/json");
    expect(seen[0].headers.get("Authorization")).toBe("Bearer test-token");
    expect(response).toEqual({
      status: 200,
      statusText: "OK",
      headers: { "content-type": "application/json" },
      text: '{"id":1}',
    });
  });

  it("should resolve error statuses instead of throwing", async () => {
    const { adapter } = stubAdapter({ status: 404, statusText: "Not Found", data: "missing" });
    const transport = new AxiosTransport({ adapter });

    const response = await transport.send({ method: "GET", url: "https://api.test:443/nope", headers: {} });

    expect(response.status).toBe(404);
    expect(response.statusText).toBe("Not Found");
    expect(response.text).toBe("missing");
  });

  it("should keep JSON bodies as text", async () => {
    const { adapter } = stubAdapter({ data: '{"a": 1}', headers: { "content-type": "application/json" } });
    const transport = new AxiosTransport({ adapter });

    const response = await transport.send({ method: "GET", url: "https://api.test:443/", headers: {} });

    expect(response.text).toBe('{"a": 1}');
  });

  it("should not follow redirects and should apply the timeout", async () => {
    const { adapter, seen } = stubAdapter({});
    const transport = new AxiosTransport({ adapter, timeoutMs: 2500 });

    await transport.send({ method: "GET", url: "https://api.test:443/", headers: {} });

    expect(seen[0].maxRedirects).toBe(0);
    expect(seen[0].timeout).toBe(2500);
  });

  it("should wrap failures without a response", async () => {
    const adapter: AxiosAdapter = async () => {
      throw new Error("connect ECONNREFUSED");
    };
    const transport = new AxiosTransport({ adapter });

    const result = transport.send({ method: "GET", url: "https://api.test:443/", headers: {} });

    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toMatchObject({
      message: "GET https://api.test:443/ failed: connect ECONNREFUSED",
      operation: "reach https://api.test:443/",
    });
  });
});

describe("flattenHeaders", () => {
  it("should join lists and stringify scalars", () => {
    expect(flattenHeaders({ "set-cookie": ["a=1", "b=2"], "content-length": 12, ignored: undefined })).toEqual({
      "set-cookie": "a=1, b=2",
      "content-length": "12",
    });
  });
});
