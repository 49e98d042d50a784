import { afterEach, describe, expect, it } from "vitest";
import { refresh } from "@/commands/auth/refresh";
import { setAppContext } from "@/lib/context";
import { installTestContext } from "@/test-utils/context";
import { createFetchMock } from "@/test-utils/fetch";
import {
  MemoryStore,
  resolverFor,
  testClient,
  testTokens,
} from "@/test-utils/memory-store";

const TOKEN_URL = "https://api.eu.beaconhq.com/oauth2/v1/token";
const SITE = "eu.beaconhq.com";

describe("refresh", () => {
  afterEach(() => {
    setAppContext(null);
  });

  it("refreshes even a valid token and stores the result", async () => {
    const store = new MemoryStore();
    await store.saveTokens(SITE, testTokens());
    await store.saveClientCredentials(SITE, testClient(SITE));
    installTestContext(resolverFor(store), { site: SITE });
    const server = createFetchMock({
      [`POST ${TOKEN_URL}`]: {
        status: 200,
        body: {
          access_token: "access-new",
          token_type: "Bearer",
          expires_in: 7200,
        },
      },
    });

    const result = await refresh({ fetch: server.fetch });

    expect(result.success).toBe(true);
    expect(result.tokens?.accessToken).toBe("access-new");
    const stored = await store.loadTokens(SITE);
    expect(stored?.accessToken).toBe("access-new");
    expect(stored?.refreshToken).toBe("refresh-test");
    expect(stored?.expiresIn).toBe(7200);
  });

  it("requires a refresh token", async () => {
    const store = new MemoryStore();
    await store.saveTokens(SITE, testTokens({ refreshToken: "" }));
    installTestContext(resolverFor(store), { site: SITE });

    expect(await refresh()).toEqual({
      success: false,
      error: "no refresh token available: run 'beacon auth login'",
    });
  });

  it("requires a client registration", async () => {
    const store = new MemoryStore();
    await store.saveTokens(SITE, testTokens());
    installTestContext(resolverFor(store), { site: SITE });

    expect(await refresh()).toEqual({
      success: false,
      error: "no client registration found: run 'beacon auth login'",
    });
  });

  it("requires a login", async () => {
    installTestContext(resolverFor(new MemoryStore()), { site: SITE });

    expect((await refresh()).error).toBe("not logged in: run 'beacon auth login'");
  });

  it("reports server rejections", async () => {
    const store = new MemoryStore();
    await store.saveTokens(SITE, testTokens());
    await store.saveClientCredentials(SITE, testClient(SITE));
    installTestContext(resolverFor(store), { site: SITE });
    const server = createFetchMock({
      [`POST ${TOKEN_URL}`]: {
        status: 400,
        body: {
          error: "invalid_grant",
          error_description: "Refresh token expired",
        },
      },
    });

    expect(await refresh({ fetch: server.fetch })).toEqual({
      success: false,
      error: "Refresh token expired",
    });
    expect((await store.loadTokens(SITE))?.accessToken).toBe("access-test");
  });
});
