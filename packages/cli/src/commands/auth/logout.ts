/**
 * CLI Logout Command
 *
 * Removes stored OAuth tokens and the client registration for the active
 * site.
 */

import type { CredentialStore } from "@/lib/auth/storage";
import { requireAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";

export type LogoutResult = {
  /** Whether logout was successful */
  success: boolean;
  /** Whether tokens were actually cleared (false if none existed) */
  hadTokens: boolean;
  site: string;
};

export async function logout(): Promise<LogoutResult> {
  const ctx = requireAppContext();
  const { site } = ctx;
  const store = await ctx.storage.resolve();

  const hadTokens = await hasStoredTokens(store, site);

  log.debug(`Clearing credentials for ${site} from ${ctx.storage.describe()}`);
  await store.deleteTokens(site);
  await store.deleteClientCredentials(site);

  return { success: true, hadTokens, site };
}

/** Unreadable tokens still count as tokens to clear */
async function hasStoredTokens(
  store: CredentialStore,
  site: string
): Promise<boolean> {
  try {
    return (await store.loadTokens(site)) !== null;
  } catch (error) {
    log.debug(`Stored tokens are unreadable: ${getErrorMessage(error)}`);
    return true;
  }
}
