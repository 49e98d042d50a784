/**
 * CLI Login Command
 *
 * Authenticates with Beacon using the OAuth 2.0 authorization code flow with
 * PKCE. The CLI registers itself as a public client on first use (Dynamic
 * Client Registration), then receives the browser redirect on a loopback
 * listener.
 */

import type { ClientCredentials, TokenSet } from "@beaconhq/core";
import { openBrowser as defaultOpenBrowser } from "@/lib/auth/browser";
import {
  type CallbackListener,
  createCallbackListener,
} from "@/lib/auth/callback-server";
import { DcrClient, type FetchFn, validateCallback } from "@/lib/auth/dcr";
import { generatePkceChallenge, generateState } from "@/lib/auth/pkce";
import type { CredentialStore, StorageBackend } from "@/lib/auth/storage";
import { requireAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";

export const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

export type LoginOptions = {
  /** Skip opening browser automatically */
  noBrowser?: boolean;
  /** Store credentials in this backend instead of the resolved one */
  storage?: StorageBackend;
  /** How long to wait for the browser redirect */
  timeoutMs?: number;
  /** Loopback ports to try; every one of them is registered with the provider */
  ports?: readonly number[];
  /** Called with the authorization URL before the browser is opened (essential for UX) */
  onAuthorizationUrl?: (url: string) => void;
  /** Called after browser open attempt - true if opened, false if manual entry needed (essential for UX) */
  onBrowserOpen?: (opened: boolean) => void;
  /** Called once the listener waits for the redirect */
  onWaiting?: () => void | Promise<void>;
  openBrowser?: (url: string) => Promise<void>;
  fetch?: FetchFn;
  createListener?: (ports?: readonly number[]) => Promise<CallbackListener>;
};

export type LoginResult = {
  /** Whether login was successful */
  success: boolean;
  /** Error message if login failed */
  error?: string;
  tokens?: TokenSet;
  /** Human-readable storage location */
  storage?: string;
  /** Whether this login registered a new OAuth client */
  registeredClient?: boolean;
};

/**
 * Runs the browser login flow for the active site and stores the tokens.
 */
export async function login(options: LoginOptions = {}): Promise<LoginResult> {
  const {
    noBrowser = false,
    timeoutMs = DEFAULT_CALLBACK_TIMEOUT_MS,
    ports,
    onAuthorizationUrl,
    onBrowserOpen,
    onWaiting,
    openBrowser = defaultOpenBrowser,
    createListener = (candidates) =>
      createCallbackListener({ ports: candidates }),
  } = options;

  const ctx = requireAppContext();
  const { site } = ctx;
  log.debug(`Starting OAuth login for ${site}`);

  let listener: CallbackListener | null = null;

  try {
    // Step 1: Resolve storage
    const store = await ctx.storage.resolve({ forceBackend: options.storage });

    // Step 2: Load or register the OAuth client
    const dcr = new DcrClient({ site, fetch: options.fetch, redirectPorts: ports });
    const { credentials, registered } = await getOrRegisterClient(
      store,
      dcr,
      site
    );

    // Step 3: Start the loopback listener
    listener = await createListener(ports);
    await listener.start();

    // Step 4: Build the authorization request
    const pkce = generatePkceChallenge();
    const state = generateState();
    const authorizationUrl = dcr.buildAuthorizationUrl({
      clientId: credentials.clientId,
      redirectUri: listener.redirectUri,
      state,
      codeChallenge: pkce.challenge,
    });

    onAuthorizationUrl?.(authorizationUrl);

    // Step 5: Open browser (if enabled)
    let browserOpened = false;
    if (!noBrowser) {
      try {
        log.debug("Opening browser for authorization");
        await openBrowser(authorizationUrl);
        browserOpened = true;
      } catch (error) {
        log.debug(`Failed to open browser: ${getErrorMessage(error)}`);
      }
    }
    onBrowserOpen?.(browserOpened);

    // Step 6: Wait for the redirect
    await onWaiting?.();
    const callback = await listener.waitForCallback(timeoutMs);
    const code = validateCallback(callback, state);

    // Step 7: Exchange the code
    const tokens = await dcr.exchangeCode(
      {
        code,
        state,
        redirectUri: listener.redirectUri,
        codeVerifier: pkce.verifier,
      },
      credentials
    );

    // Step 8: Save tokens
    log.debug("Saving tokens");
    await store.saveTokens(site, tokens);

    return {
      success: true,
      tokens,
      storage: ctx.storage.describe(),
      registeredClient: registered,
    };
  } catch (error) {
    return { success: false, error: getErrorMessage(error) };
  } finally {
    if (listener) {
      await stopListener(listener);
    }
  }
}

async function getOrRegisterClient(
  store: CredentialStore,
  dcr: DcrClient,
  site: string
): Promise<{ credentials: ClientCredentials; registered: boolean }> {
  const existing = await store.loadClientCredentials(site);
  if (existing) {
    log.debug(`Using registered OAuth client ${existing.clientId}`);
    return { credentials: existing, registered: false };
  }

  const credentials = await dcr.register();
  await store.saveClientCredentials(site, credentials);
  return { credentials, registered: true };
}

async function stopListener(listener: CallbackListener) {
  try {
    await listener.stop();
  } catch (error) {
    log.debug(`Failed to stop callback listener: ${getErrorMessage(error)}`);
  }
}
