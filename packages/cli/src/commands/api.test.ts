import { afterEach, describe, expect, it } from "vitest";
import { api, parseMethod, parseQuery } from "@/commands/api";
import { setAppContext } from "@/lib/context";
import { installTestContext } from "@/test-utils/context";
import { createFetchMock } from "@/test-utils/fetch";
import {
  MemoryStore,
  resolverFor,
  testClient,
  testTokens,
} from "@/test-utils/memory-store";

const API = "https://api.beaconhq.com";

describe("api", () => {
  afterEach(() => {
    setAppContext(null);
  });

  it("sends the request with the stored OAuth token", async () => {
    const store = new MemoryStore();
    await store.saveTokens(
      "beaconhq.com",
      testTokens({ issuedAt: Math.floor(Date.now() / 1000) })
    );
    installTestContext(resolverFor(store));
    const server = createFetchMock({
      [`POST ${API}/api/v1/monitor?validate=true`]: {
        status: 200,
        body: { id: 42 },
      },
    });

    const result = await api({
      method: "post",
      path: "api/v1/monitor",
      data: '{"name":"cpu"}',
      query: ["validate=true"],
      fetch: server.fetch,
    });

    expect(result).toEqual({ status: 200, data: { id: 42 }, authType: "oauth" });
    expect(server.calls[0]?.headers.get("authorization")).toBe(
      "Bearer access-test"
    );
    expect(server.calls[0]?.headers.get("user-agent")).toBe(
      "beacon-cli/0.0.0-test"
    );
    expect(server.calls[0]?.body).toBe('{"name":"cpu"}');
  });

  it("refreshes an expired token before the request", async () => {
    const store = new MemoryStore();
    await store.saveTokens("beaconhq.com", testTokens({ issuedAt: 1000 }));
    await store.saveClientCredentials("beaconhq.com", testClient());
    installTestContext(resolverFor(store));
    const server = createFetchMock({
      [`POST ${API}/oauth2/v1/token`]: {
        status: 200,
        body: {
          access_token: "access-new",
          token_type: "Bearer",
          expires_in: 3600,
        },
      },
      [`GET ${API}/api/v1/validate`]: { status: 200, body: { valid: true } },
    });

    await api({ method: "GET", path: "/api/v1/validate", fetch: server.fetch });

    expect(server.calls.map((c) => c.method)).toEqual(["POST", "GET"]);
    expect(server.calls[1]?.headers.get("authorization")).toBe(
      "Bearer access-new"
    );
  });

  it("uses API keys when asked to", async () => {
    const store = new MemoryStore();
    await store.saveTokens(
      "beaconhq.com",
      testTokens({ issuedAt: Math.floor(Date.now() / 1000) })
    );
    installTestContext(resolverFor(store), {
      apiKey: "api-test",
      appKey: "app-test",
    });
    const server = createFetchMock({
      [`GET ${API}/api/v1/validate`]: { status: 200, body: { valid: true } },
    });

    const result = await api({
      method: "GET",
      path: "/api/v1/validate",
      useApiKeys: true,
      fetch: server.fetch,
    });

    expect(result.authType).toBe("api-keys");
    expect(server.calls[0]?.headers.get("beacon-api-key")).toBe("api-test");
  });

  it("reports API keys when the endpoint swaps them in", async () => {
    const store = new MemoryStore();
    await store.saveTokens(
      "beaconhq.com",
      testTokens({ issuedAt: Math.floor(Date.now() / 1000) })
    );
    installTestContext(resolverFor(store), {
      apiKey: "api-test",
      appKey: "app-test",
    });
    const server = createFetchMock({
      [`GET ${API}/api/v2/api_keys`]: { status: 200, body: { data: [] } },
    });

    const result = await api({
      method: "GET",
      path: "/api/v2/api_keys",
      fetch: server.fetch,
    });

    expect(result.authType).toBe("api-keys");
    expect(server.calls[0]?.headers.get("beacon-api-key")).toBe("api-test");
  });

  it("rejects bodies that are not JSON", async () => {
    installTestContext(resolverFor(new MemoryStore()), {
      accessToken: "env-token",
    });

    await expect(
      api({ method: "POST", path: "/api/v1/monitor", data: "{name" })
    ).rejects.toThrow(/^Request body is not valid JSON/);
  });
});

describe("parseMethod", () => {
  it("normalizes case", () => {
    expect(parseMethod("patch")).toBe("PATCH");
  });

  it("rejects unknown methods", () => {
    expect(() => parseMethod("TRACE")).toThrow(
      'Unsupported method "TRACE". Use one of: GET, POST, PUT, PATCH, DELETE'
    );
  });
});

describe("parseQuery", () => {
  it("splits on the first equals sign", () => {
    expect(parseQuery(["q=a=b", "page=1"])).toEqual({ q: "a=b", page: "1" });
  });

  it("rejects pairs without a key", () => {
    expect(() => parseQuery(["=x"])).toThrow(
      'Invalid query parameter "=x". Use key=value'
    );
  });
});
