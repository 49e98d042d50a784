import type { ClientCredentials, TokenSet } from "@beaconhq/core";
import { mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileStore } from "@/lib/auth/storage/file-store";

const tokens: TokenSet = {
  accessToken: "access-test",
  refreshToken: "refresh-test",
  tokenType: "Bearer",
  expiresIn: 3600,
  issuedAt: 1_700_000_000,
  scope: "dashboards_read",
  clientId: "client-123",
};

const credentials: ClientCredentials = {
  clientId: "client-123",
  clientName: "beacon-cli",
  redirectUris: ["http://127.0.0.1:8000/oauth/callback"],
  registeredAt: 1_700_000_000,
  site: "eu.beaconhq.com",
};

let baseDir: string;
let dir: string;

describe("FileStore", () => {
  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "beacon-file-store-"));
    dir = join(baseDir, "config");
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("names files after the sanitized site", () => {
    const store = new FileStore(dir);

    expect(store.tokensPath("eu.beaconhq.com")).toBe(
      join(dir, "tokens_eu_beaconhq_com.json")
    );
    expect(store.clientPath("navy.oncall.beaconhq.com")).toBe(
      join(dir, "client_navy_oncall_beaconhq_com.json")
    );
  });

  it("returns null when nothing is stored", async () => {
    const store = new FileStore(dir);

    expect(await store.loadTokens("beaconhq.com")).toBeNull();
    expect(await store.loadClientCredentials("beaconhq.com")).toBeNull();
  });

  it("round-trips tokens in snake_case JSON", async () => {
    const store = new FileStore(dir);
    await store.saveTokens("eu.beaconhq.com", tokens);

    const raw = JSON.parse(
      await readFile(store.tokensPath("eu.beaconhq.com"), "utf8")
    );
    expect(raw.access_token).toBe("access-test");
    expect(raw.issued_at).toBe(1_700_000_000);
    expect(await store.loadTokens("eu.beaconhq.com")).toEqual(tokens);
  });

  it("round-trips client credentials", async () => {
    const store = new FileStore(dir);
    await store.saveClientCredentials("eu.beaconhq.com", credentials);

    expect(await store.loadClientCredentials("eu.beaconhq.com")).toEqual(
      credentials
    );
  });

  it.skipIf(process.platform === "win32")(
    "restricts the directory and files to the owner",
    async () => {
      const store = new FileStore(dir);
      await store.saveTokens("beaconhq.com", tokens);

      expect((await stat(dir)).mode & 0o777).toBe(0o700);
      expect((await stat(store.tokensPath("beaconhq.com"))).mode & 0o777).toBe(
        0o600
      );
    }
  );

  it("keeps sites apart", async () => {
    const store = new FileStore(dir);
    await store.saveTokens("beaconhq.com", tokens);

    expect(await store.loadTokens("eu.beaconhq.com")).toBeNull();
  });

  it("fails on corrupt files instead of treating them as missing", async () => {
    const store = new FileStore(dir);
    await store.saveTokens("beaconhq.com", tokens);
    await writeFile(store.tokensPath("beaconhq.com"), "{not json", "utf8");

    await expect(store.loadTokens("beaconhq.com")).rejects.toThrow(
      /^Failed to parse .*tokens_beaconhq_com\.json/
    );
  });

  it("fails on files with the wrong shape", async () => {
    const store = new FileStore(dir);
    await store.saveTokens("beaconhq.com", tokens);
    await writeFile(
      store.tokensPath("beaconhq.com"),
      JSON.stringify({ token: "x" }),
      "utf8"
    );

    await expect(store.loadTokens("beaconhq.com")).rejects.toThrow(
      /^Invalid credentials in /
    );
  });

  it("deletes tokens and tolerates deleting twice", async () => {
    const store = new FileStore(dir);
    await store.saveTokens("beaconhq.com", tokens);

    await store.deleteTokens("beaconhq.com");
    await store.deleteTokens("beaconhq.com");

    expect(await store.loadTokens("beaconhq.com")).toBeNull();
  });

  it("reports its backend and location", () => {
    const store = new FileStore(dir);
    expect(store.backendType).toBe("file");
    expect(store.storageLocation).toBe(dir);
  });
});
