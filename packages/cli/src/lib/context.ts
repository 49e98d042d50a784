/**
 * Application Context
 *
 * Centralizes loading of config and ownership of the credential storage
 * resolver so every command in a process shares one cached store. Created
 * once at startup and read by commands through `requireAppContext()`.
 */

import { StorageResolver, type StorageResolverOptions } from "./auth/storage";
import { type Config, type Env, loadConfig } from "./config";
import { log } from "./log";

/**
 * Application context loaded at startup
 */
export type AppContext = {
  /** Effective configuration (config.json + environment) */
  config: Config;
  /** Active site, e.g. "beaconhq.com" */
  site: string;
  /** Credential storage, resolved lazily on first use */
  storage: StorageResolver;
  /** CLI version, used in the User-Agent */
  version: string;
};

export type CreateAppContextOptions = {
  /** Site from --site; overrides BEACON_SITE and config.json */
  site?: string;
  env?: Env;
  version?: string;
  storage?: StorageResolverOptions;
};

/**
 * Creates the application context. Storage is not touched until a command
 * needs it.
 */
export async function createAppContext(
  options: CreateAppContextOptions = {}
): Promise<AppContext> {
  const env = options.env ?? process.env;

  log.debug("Loading app context");
  const config = await loadConfig({ env, site: options.site });
  log.debug(`Active site: ${config.site}`);

  return {
    config,
    site: config.site,
    storage: new StorageResolver({ env, ...options.storage }),
    version: options.version ?? "0.0.0",
  };
}

// =============================================================================
// Global context singleton (for commands that need it)
// =============================================================================

let globalContext: AppContext | null = null;

/**
 * Gets the global app context, throwing if startup did not initialize it.
 */
export function requireAppContext(): AppContext {
  if (!globalContext) {
    throw new Error("App context not initialized");
  }
  return globalContext;
}

/**
 * Initializes the global app context. Call this once at startup.
 */
export async function initAppContext(
  options: CreateAppContextOptions = {}
): Promise<AppContext> {
  globalContext = await createAppContext(options);
  return globalContext;
}

/** Replaces the global context; tests use this to install a prepared one */
export function setAppContext(context: AppContext | null) {
  globalContext = context;
}
