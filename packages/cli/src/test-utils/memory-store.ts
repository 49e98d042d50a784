import type { ClientCredentials, TokenSet } from "@beaconhq/core";
import {
  type CredentialStore,
  StorageResolver,
  type StoreKind,
} from "@/lib/auth/storage";

/** In-memory credential store keyed by site */
export class MemoryStore implements CredentialStore {
  readonly backendType: StoreKind = "keychain";
  readonly storageLocation = "memory";
  readonly tokens = new Map<string, TokenSet>();
  readonly clients = new Map<string, ClientCredentials>();

  async saveTokens(site: string, tokens: TokenSet): Promise<void> {
    this.tokens.set(site, tokens);
  }

  async loadTokens(site: string): Promise<TokenSet | null> {
    return this.tokens.get(site) ?? null;
  }

  async deleteTokens(site: string): Promise<void> {
    this.tokens.delete(site);
  }

  async saveClientCredentials(
    site: string,
    credentials: ClientCredentials
  ): Promise<void> {
    this.clients.set(site, credentials);
  }

  async loadClientCredentials(site: string): Promise<ClientCredentials | null> {
    return this.clients.get(site) ?? null;
  }

  async deleteClientCredentials(site: string): Promise<void> {
    this.clients.delete(site);
  }
}

/** A resolver that always hands out `store` */
export function resolverFor(store: CredentialStore): StorageResolver {
  return new StorageResolver({
    env: {},
    isKeychainAvailable: async () => true,
    createStore: () => store,
    localStorageSupported: true,
  });
}

export function testTokens(overrides: Partial<TokenSet> = {}): TokenSet {
  return {
    accessToken: "access-test",
    refreshToken: "refresh-test",
    tokenType: "Bearer",
    expiresIn: 3600,
    issuedAt: 1_700_000_000,
    scope: "dashboards_read",
    clientId: "client-123",
    ...overrides,
  };
}

export function testClient(site = "beaconhq.com"): ClientCredentials {
  return {
    clientId: "client-123",
    clientName: "beacon-cli",
    redirectUris: ["http://127.0.0.1:8000/oauth/callback"],
    registeredAt: 1_699_000_000,
    site,
  };
}
