import { describe, expect, it } from "vitest";
import { ApiClient } from "@/lib/api/client";
import type { Config } from "@/lib/config";
import { ApiRequestError } from "@/lib/errors";
import { createFetchMock, failingFetch } from "@/test-utils/fetch";
import { MemoryStore, resolverFor } from "@/test-utils/memory-store";

const API = "https://api.beaconhq.com";

function config(overrides: Partial<Config> = {}): Config {
  return { site: "beaconhq.com", ...overrides };
}

async function createClient(cfg: Config, fetch: typeof globalThis.fetch) {
  return ApiClient.create(cfg, {
    storage: resolverFor(new MemoryStore()),
    version: "1.2.3",
    fetch,
  });
}

describe("ApiClient", () => {
  it("sends bearer tokens with a versioned User-Agent", async () => {
    const mock = createFetchMock({
      [`GET ${API}/api/v1/validate`]: { status: 200, body: { valid: true } },
    });
    const client = await createClient(
      config({ accessToken: "env-token" }),
      mock.fetch
    );

    const response = await client.request("GET", "/api/v1/validate");

    expect(response).toEqual({
      status: 200,
      data: { valid: true },
      authType: "oauth",
    });
    const headers = mock.calls[0]?.headers;
    expect(headers?.get("authorization")).toBe("Bearer env-token");
    expect(headers?.get("user-agent")).toBe("beacon-cli/1.2.3");
    expect(headers?.get("beacon-api-key")).toBeNull();
  });

  it("sends the API key headers", async () => {
    const mock = createFetchMock({
      [`GET ${API}/api/v1/validate`]: { status: 200, body: {} },
    });
    const client = await createClient(
      config({ apiKey: "api-test", appKey: "app-test" }),
      mock.fetch
    );

    await client.request("GET", "/api/v1/validate");

    const headers = mock.calls[0]?.headers;
    expect(headers?.get("beacon-api-key")).toBe("api-test");
    expect(headers?.get("beacon-application-key")).toBe("app-test");
    expect(headers?.get("authorization")).toBeNull();
  });

  it("substitutes API keys on OAuth-incompatible endpoints", async () => {
    const mock = createFetchMock({
      [`POST ${API}/api/v2/logs/events/search`]: { status: 200, body: {} },
    });
    const client = await createClient(
      config({ accessToken: "env-token", apiKey: "api-test", appKey: "app-test" }),
      mock.fetch
    );

    const response = await client.request("POST", "/api/v2/logs/events/search", {
      body: { filter: { query: "service:web" } },
    });

    expect(client.auth.type).toBe("oauth");
    expect(response.authType).toBe("api-keys");
    const call = mock.calls[0];
    expect(call?.headers.get("authorization")).toBeNull();
    expect(call?.headers.get("beacon-api-key")).toBe("api-test");
    expect(call?.headers.get("content-type")).toBe("application/json");
    expect(call?.body).toBe('{"filter":{"query":"service:web"}}');
  });

  it("appends query parameters", async () => {
    const mock = createFetchMock({
      [`GET ${API}/api/v1/monitor?name=cpu&page=2`]: { status: 200, body: [] },
    });
    const client = await createClient(
      config({ accessToken: "env-token" }),
      mock.fetch
    );

    const response = await client.request("GET", "/api/v1/monitor", {
      query: { name: "cpu", page: "2", tags: undefined },
    });

    expect(response.data).toEqual([]);
  });

  it("returns null for empty bodies", async () => {
    const mock = createFetchMock({
      [`DELETE ${API}/api/v1/dashboard/abc`]: { status: 204 },
    });
    const client = await createClient(
      config({ accessToken: "env-token" }),
      mock.fetch
    );

    expect(await client.request("DELETE", "/api/v1/dashboard/abc")).toEqual({
      status: 204,
      data: null,
      authType: "oauth",
    });
  });

  it("reports API error envelopes", async () => {
    const mock = createFetchMock({
      [`GET ${API}/api/v1/monitor/42`]: {
        status: 403,
        body: { errors: ["Forbidden", "Missing scope monitors_read"] },
      },
    });
    const client = await createClient(
      config({ accessToken: "env-token" }),
      mock.fetch
    );

    const error = await client
      .request("GET", "/api/v1/monitor/42")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiRequestError);
    if (error instanceof ApiRequestError) {
      expect(error.status).toBe(403);
      expect(error.message).toBe(
        "HTTP 403: Forbidden; Missing scope monitors_read"
      );
    }
  });

  it("wraps network failures", async () => {
    const client = await createClient(
      config({ accessToken: "env-token" }),
      failingFetch("getaddrinfo ENOTFOUND")
    );

    await expect(client.request("GET", "/api/v1/validate")).rejects.toThrow(
      /^Request to api\.beaconhq\.com failed: getaddrinfo ENOTFOUND/
    );
  });
});
