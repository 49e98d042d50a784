import { afterEach, describe, expect, it, vi } from "vitest";
import { login } from "@/commands/auth/login";
import { CallbackServer } from "@/lib/auth/callback-server";
import { setAppContext } from "@/lib/context";
import { installTestContext } from "@/test-utils/context";
import { createFetchMock, type RecordedCall } from "@/test-utils/fetch";
import {
  MemoryStore,
  resolverFor,
  testClient,
} from "@/test-utils/memory-store";

const REGISTER_URL = "https://api.beaconhq.com/api/v2/oauth2/register";
const TOKEN_URL = "https://api.beaconhq.com/oauth2/v1/token";

/** A free loopback port, found the same way login finds one */
async function freePort(): Promise<number> {
  const listener = await CallbackServer.create({ ports: [0] });
  return listener.port;
}

function oauthServer(options: { registration?: boolean } = {}) {
  return createFetchMock({
    [`POST ${REGISTER_URL}`]: (call: RecordedCall) => {
      if (options.registration === false) {
        return { status: 500, body: "unexpected registration" };
      }
      const body = JSON.parse(call.body ?? "{}");
      return {
        status: 201,
        body: {
          client_id: "client-new",
          client_name: body.client_name,
          redirect_uris: body.redirect_uris,
        },
      };
    },
    [`POST ${TOKEN_URL}`]: {
      status: 200,
      body: {
        access_token: "access-test",
        refresh_token: "refresh-test",
        token_type: "Bearer",
        expires_in: 3600,
        scope: "dashboards_read",
      },
    },
  });
}

/**
 * Plays the user approving access: follows the authorization URL back to
 * the loopback listener with the code and the state it was given.
 */
function approvingBrowser(overrides: Record<string, string> = {}) {
  const opened: string[] = [];
  const openBrowser = async (url: string) => {
    opened.push(url);
    const authorize = new URL(url);
    const redirect = new URL(authorize.searchParams.get("redirect_uri") ?? "");
    redirect.searchParams.set("code", "code-abc");
    redirect.searchParams.set(
      "state",
      authorize.searchParams.get("state") ?? ""
    );
    for (const [key, value] of Object.entries(overrides)) {
      redirect.searchParams.set(key, value);
    }
    await fetch(redirect);
  };
  return { openBrowser, opened };
}

describe("login", () => {
  afterEach(() => {
    setAppContext(null);
  });

  it("registers, authorizes and stores tokens", async () => {
    const store = new MemoryStore();
    installTestContext(resolverFor(store));
    const port = await freePort();
    const server = oauthServer();
    const browser = approvingBrowser();
    const onBrowserOpen = vi.fn();

    const result = await login({
      ports: [port],
      fetch: server.fetch,
      openBrowser: browser.openBrowser,
      onBrowserOpen,
      timeoutMs: 5000,
    });

    expect(result.error).toBeUndefined();
    expect(result.success).toBe(true);
    expect(result.registeredClient).toBe(true);
    expect(result.storage).toBe("memory (secure)");
    expect(onBrowserOpen).toHaveBeenCalledWith(true);

    // Registration covers the port the listener bound
    const registration = JSON.parse(server.calls[0]?.body ?? "{}");
    expect(registration.redirect_uris).toEqual([
      `http://127.0.0.1:${port}/oauth/callback`,
    ]);
    expect((await store.loadClientCredentials("beaconhq.com"))?.clientId).toBe(
      "client-new"
    );

    // The code exchange carries the verifier matching the challenge
    const authorize = new URL(browser.opened[0] ?? "");
    const exchange = new URLSearchParams(server.calls[1]?.body);
    expect(exchange.get("code")).toBe("code-abc");
    expect(exchange.get("client_id")).toBe("client-new");
    expect(exchange.get("redirect_uri")).toBe(
      `http://127.0.0.1:${port}/oauth/callback`
    );
    expect(exchange.get("code_verifier")).toHaveLength(128);
    expect(authorize.searchParams.get("code_challenge_method")).toBe("S256");

    const tokens = await store.loadTokens("beaconhq.com");
    expect(tokens?.accessToken).toBe("access-test");
    expect(tokens?.clientId).toBe("client-new");
  });

  it("reuses a stored client registration", async () => {
    const store = new MemoryStore();
    await store.saveClientCredentials("beaconhq.com", testClient());
    installTestContext(resolverFor(store));
    const server = oauthServer({ registration: false });

    const result = await login({
      ports: [await freePort()],
      fetch: server.fetch,
      openBrowser: approvingBrowser().openBrowser,
      timeoutMs: 5000,
    });

    expect(result.success).toBe(true);
    expect(result.registeredClient).toBe(false);
    expect(server.calls.map((c) => c.url)).toEqual([TOKEN_URL]);
  });

  it("rejects a callback with the wrong state", async () => {
    const store = new MemoryStore();
    await store.saveClientCredentials("beaconhq.com", testClient());
    installTestContext(resolverFor(store));
    const server = oauthServer();

    const result = await login({
      ports: [await freePort()],
      fetch: server.fetch,
      openBrowser: approvingBrowser({ state: "forged" }).openBrowser,
      timeoutMs: 5000,
    });

    expect(result.success).toBe(false);
    expect(result.error).toBe("state mismatch in callback, possible CSRF attack");
    expect(server.calls).toHaveLength(0);
    expect(await store.loadTokens("beaconhq.com")).toBeNull();
  });

  it("reports provider errors from the callback", async () => {
    const store = new MemoryStore();
    await store.saveClientCredentials("beaconhq.com", testClient());
    installTestContext(resolverFor(store));

    const result = await login({
      ports: [await freePort()],
      fetch: oauthServer().fetch,
      openBrowser: approvingBrowser({
        error: "access_denied",
        error_description: "User denied access",
      }).openBrowser,
      timeoutMs: 5000,
    });

    expect(result).toEqual({
      success: false,
      error: "OAuth error: access_denied - User denied access",
    });
  });

  it("times out and releases the port when nobody approves", async () => {
    const store = new MemoryStore();
    await store.saveClientCredentials("beaconhq.com", testClient());
    installTestContext(resolverFor(store));
    const port = await freePort();
    const urls: string[] = [];
    const onBrowserOpen = vi.fn();

    const result = await login({
      ports: [port],
      noBrowser: true,
      fetch: oauthServer().fetch,
      onAuthorizationUrl: (url) => urls.push(url),
      onBrowserOpen,
      timeoutMs: 50,
    });

    expect(result.success).toBe(false);
    expect(result.error).toBe(
      "Timed out after 0s waiting for the OAuth callback"
    );
    expect(urls).toHaveLength(1);
    expect(onBrowserOpen).toHaveBeenCalledWith(false);

    // The listener was stopped, so the port can be bound again
    const again = await CallbackServer.create({ ports: [port] });
    expect(again.port).toBe(port);
  });

  it("still waits for the callback when the browser cannot open", async () => {
    const store = new MemoryStore();
    await store.saveClientCredentials("beaconhq.com", testClient());
    installTestContext(resolverFor(store));
    const onBrowserOpen = vi.fn();

    const result = await login({
      ports: [await freePort()],
      fetch: oauthServer().fetch,
      openBrowser: async () => {
        throw new Error("xdg-open not found");
      },
      onBrowserOpen,
      timeoutMs: 50,
    });

    expect(onBrowserOpen).toHaveBeenCalledWith(false);
    expect(result.error).toMatch(/^Timed out/);
  });

  it("fails when registration is rejected", async () => {
    installTestContext(resolverFor(new MemoryStore()));
    const server = createFetchMock({
      [`POST ${REGISTER_URL}`]: {
        status: 403,
        body: { error: "access_denied", error_description: "DCR disabled" },
      },
    });

    const result = await login({
      ports: [await freePort()],
      fetch: server.fetch,
      noBrowser: true,
    });

    expect(result).toEqual({ success: false, error: "DCR disabled" });
  });
});
