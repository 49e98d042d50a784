import { access, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { logout } from "@/commands/auth/logout";
import { FileStore } from "@/lib/auth/storage/file-store";
import { setAppContext } from "@/lib/context";
import { installTestContext } from "@/test-utils/context";
import {
  MemoryStore,
  resolverFor,
  testClient,
  testTokens,
} from "@/test-utils/memory-store";

describe("logout", () => {
  afterEach(() => {
    setAppContext(null);
  });

  it("removes tokens and the client registration for the site", async () => {
    const store = new MemoryStore();
    await store.saveTokens("beaconhq.com", testTokens());
    await store.saveClientCredentials("beaconhq.com", testClient());
    await store.saveTokens("eu.beaconhq.com", testTokens());
    installTestContext(resolverFor(store));

    const result = await logout();

    expect(result).toEqual({
      success: true,
      hadTokens: true,
      site: "beaconhq.com",
    });
    expect(await store.loadTokens("beaconhq.com")).toBeNull();
    expect(await store.loadClientCredentials("beaconhq.com")).toBeNull();
    expect(await store.loadTokens("eu.beaconhq.com")).not.toBeNull();
  });

  it("reports when there was nothing to remove", async () => {
    installTestContext(resolverFor(new MemoryStore()));

    const result = await logout();

    expect(result.hadTokens).toBe(false);
  });

  it("clears corrupt credential files", async () => {
    const dir = await mkdtemp(join(tmpdir(), "beacon-logout-"));
    try {
      const store = new FileStore(dir);
      await store.saveClientCredentials("beaconhq.com", testClient());
      await writeFile(store.tokensPath("beaconhq.com"), "{not json");
      installTestContext(resolverFor(store));

      const result = await logout();

      expect(result).toEqual({
        success: true,
        hadTokens: true,
        site: "beaconhq.com",
      });
      await expect(access(store.tokensPath("beaconhq.com"))).rejects.toThrow();
      await expect(access(store.clientPath("beaconhq.com"))).rejects.toThrow();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
