/**
 * Token lifecycle: decides which credentials a request is sent with.
 *
 * 1. BEACON_ACCESS_TOKEN, used as-is
 * 2. Stored OAuth tokens for the site, refreshed when expired
 * 3. The BEACON_API_KEY / BEACON_APP_KEY pair
 *
 * Storage and refresh problems never fail resolution; they only move it
 * down the list.
 */

import {
  type ClientCredentials,
  isTokenExpired,
  nowInSeconds,
  type TokenSet,
} from "@beaconhq/core";
import { DcrClient } from "@/lib/auth/dcr";
import type { CredentialStore, StorageResolver } from "@/lib/auth/storage";
import { type Config, hasApiKeys } from "@/lib/config";
import { AuthRequiredError, getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";

export type AuthContext =
  | { type: "oauth"; accessToken: string }
  | { type: "api-keys"; apiKey: string; appKey: string };

/** The part of the DCR client token refresh needs */
export type TokenRefresher = Pick<DcrClient, "refreshToken">;

export type ResolveAuthOptions = {
  config: Config;
  storage: StorageResolver;
  /** Skip OAuth entirely */
  forceApiKeys?: boolean;
  createDcrClient?: (site: string) => TokenRefresher;
  /** Clock in epoch seconds */
  now?: () => number;
};

export async function resolveAuth(
  options: ResolveAuthOptions
): Promise<AuthContext> {
  const { config, forceApiKeys = false } = options;

  if (!forceApiKeys) {
    if (config.accessToken) {
      log.debug("Using access token from BEACON_ACCESS_TOKEN");
      return { type: "oauth", accessToken: config.accessToken };
    }

    const tokens = await loadUsableTokens(options);
    if (tokens) {
      return { type: "oauth", accessToken: tokens.accessToken };
    }
  }

  if (hasApiKeys(config)) {
    log.debug("Using API key authentication");
    return { type: "api-keys", apiKey: config.apiKey, appKey: config.appKey };
  }

  throw new AuthRequiredError();
}

async function loadUsableTokens(
  options: ResolveAuthOptions
): Promise<TokenSet | null> {
  const { config, storage } = options;
  const now = options.now ?? nowInSeconds;
  const site = config.site;

  let store: CredentialStore;
  let tokens: TokenSet | null;
  try {
    store = await storage.resolve();
    tokens = await store.loadTokens(site);
  } catch (error) {
    log.debug(`Could not load stored tokens: ${getErrorMessage(error)}`);
    return null;
  }

  if (!tokens) {
    log.debug(`No stored tokens for ${site}`);
    return null;
  }

  if (!isTokenExpired(tokens, now())) {
    log.debug("Using stored OAuth token");
    return tokens;
  }

  if (!tokens.refreshToken) {
    log.debug("Stored token expired and has no refresh token");
    return null;
  }

  let refreshed: TokenSet;
  try {
    const credentials = await store.loadClientCredentials(site);
    if (!credentials) {
      log.debug(`No client registration for ${site}, cannot refresh`);
      return null;
    }

    const createDcrClient =
      options.createDcrClient ?? ((s: string) => new DcrClient({ site: s }));
    refreshed = await refreshTokenSet({
      tokens,
      credentials,
      refresher: createDcrClient(site),
    });
    log.debug("Refreshed expired OAuth token");
  } catch (error) {
    log.warn(`Token refresh failed: ${getErrorMessage(error)}`);
    return null;
  }

  // The provider has accepted the refresh, so the new set is used either way
  try {
    await store.saveTokens(site, refreshed);
  } catch (error) {
    log.warn(`Could not save refreshed tokens: ${getErrorMessage(error)}`);
  }
  return refreshed;
}

export type RefreshTokenSetOptions = {
  tokens: TokenSet;
  credentials: ClientCredentials;
  refresher: TokenRefresher;
};

/**
 * Refreshes `tokens`. The previous refresh token is kept when the server
 * does not issue a new one.
 */
export async function refreshTokenSet(
  options: RefreshTokenSetOptions
): Promise<TokenSet> {
  const { tokens, credentials, refresher } = options;

  const refreshed = await refresher.refreshToken(
    tokens.refreshToken,
    credentials
  );
  return refreshed.refreshToken
    ? refreshed
    : { ...refreshed, refreshToken: tokens.refreshToken };
}

export type RefreshAndStoreOptions = RefreshTokenSetOptions & {
  store: CredentialStore;
  site: string;
};

/** Refreshes `tokens` and persists the result; a failed save is an error */
export async function refreshAndStore(
  options: RefreshAndStoreOptions
): Promise<TokenSet> {
  const refreshed = await refreshTokenSet(options);
  await options.store.saveTokens(options.site, refreshed);
  return refreshed;
}
