/**
 * CLI Auth Status Command
 *
 * Reports the stored OAuth token for the active site without contacting
 * the server.
 */

import {
  getTokenExpiresAt,
  isTokenExpired,
  nowInSeconds,
} from "@beaconhq/core";
import { requireAppContext } from "@/lib/context";

export type TokenStatus = "valid" | "expired" | "missing";

export type StatusOptions = {
  /** Clock in epoch seconds */
  now?: () => number;
};

export type StatusResult = {
  authenticated: boolean;
  site: string;
  status: TokenStatus;
  /** RFC 3339 timestamp of the provider-side expiry */
  expiresAt?: string;
  /** Seconds until the token is treated as expired (never negative) */
  expiresIn?: number;
  tokenType?: string;
  scope?: string;
  hasRefresh: boolean;
  storage: string;
  /** BEACON_ACCESS_TOKEN is set and overrides stored tokens */
  envTokenOverride: boolean;
};

export async function status(options: StatusOptions = {}): Promise<StatusResult> {
  const ctx = requireAppContext();
  const now = (options.now ?? nowInSeconds)();
  const store = await ctx.storage.resolve();
  const tokens = await store.loadTokens(ctx.site);

  const base = {
    site: ctx.site,
    storage: ctx.storage.describe(),
    envTokenOverride: ctx.config.accessToken !== undefined,
  };

  if (!tokens) {
    return {
      ...base,
      authenticated: false,
      status: "missing",
      hasRefresh: false,
    };
  }

  const expired = isTokenExpired(tokens, now);
  const expiresAt = getTokenExpiresAt(tokens);

  return {
    ...base,
    authenticated: !expired,
    status: expired ? "expired" : "valid",
    expiresAt: new Date(expiresAt * 1000).toISOString(),
    expiresIn: Math.max(0, expiresAt - now),
    tokenType: tokens.tokenType,
    scope: tokens.scope || undefined,
    hasRefresh: tokens.refreshToken.length > 0,
  };
}
