/**
 * CLI Auth Refresh Command
 *
 * Exchanges the stored refresh token for a new access token, regardless of
 * whether the current one has expired.
 */

import type { TokenSet } from "@beaconhq/core";
import { refreshAndStore } from "@/lib/api/auth-resolver";
import { DcrClient, type FetchFn } from "@/lib/auth/dcr";
import { requireAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";

export type RefreshOptions = {
  fetch?: FetchFn;
};

export type RefreshResult = {
  success: boolean;
  error?: string;
  tokens?: TokenSet;
};

export async function refresh(
  options: RefreshOptions = {}
): Promise<RefreshResult> {
  const ctx = requireAppContext();
  const { site } = ctx;

  try {
    const store = await ctx.storage.resolve();

    const tokens = await store.loadTokens(site);
    if (!tokens) {
      return {
        success: false,
        error: "not logged in: run 'beacon auth login'",
      };
    }
    if (!tokens.refreshToken) {
      return {
        success: false,
        error: "no refresh token available: run 'beacon auth login'",
      };
    }

    const credentials = await store.loadClientCredentials(site);
    if (!credentials) {
      return {
        success: false,
        error: "no client registration found: run 'beacon auth login'",
      };
    }

    log.debug(`Refreshing token for ${site}`);
    const refreshed = await refreshAndStore({
      store,
      site,
      tokens,
      credentials,
      refresher: new DcrClient({ site, fetch: options.fetch }),
    });

    return { success: true, tokens: refreshed };
  } catch (error) {
    return { success: false, error: getErrorMessage(error) };
  }
}
