/**
 * Picks the credential store for this process.
 *
 * Precedence:
 * 1. An explicit backend passed to `resolve()`
 * 2. BEACON_TOKEN_STORAGE (`keychain` or `file`)
 * 3. The OS keychain when available, else files (with a one-time warning)
 */

import { ENV, type Env, getConfigDir } from "@/lib/config";
import { StorageConfigError, StorageUnavailableError } from "@/lib/errors";
import { log } from "@/lib/log";
import { isNodeRuntime } from "@/lib/runtime";
import { FileStore } from "./file-store";
import { KeychainStore } from "./keychain-store";
import {
  type CredentialStore,
  isStorageBackend,
  STORAGE_BACKENDS,
  type StorageBackend,
  type StoreKind,
} from "./types";
import { UnavailableStore } from "./unavailable-store";

export type StorageResolverOptions = {
  env?: Env;
  isKeychainAvailable?: () => Promise<boolean>;
  createStore?: (backend: StorageBackend) => CredentialStore;
  /** Receives the keychain fallback warning; defaults to log.warn */
  onFallback?: (message: string) => void;
  /** False on runtimes without local storage; every operation then rejects */
  localStorageSupported?: boolean;
};

export type ResolveStorageOptions = {
  forceBackend?: StorageBackend;
};

export class StorageResolver {
  private readonly env: Env;
  private readonly isKeychainAvailable: () => Promise<boolean>;
  private readonly createStore: (backend: StorageBackend) => CredentialStore;
  private readonly onFallback: (message: string) => void;
  private readonly localStorageSupported: boolean;

  private cached: CredentialStore | null = null;
  private warned = false;
  private lock: Promise<void> = Promise.resolve();
  private keychain: KeychainStore | null = null;

  constructor(options: StorageResolverOptions = {}) {
    this.env = options.env ?? process.env;
    this.createStore =
      options.createStore ?? ((backend) => this.createDefaultStore(backend));
    this.isKeychainAvailable =
      options.isKeychainAvailable ??
      (() => this.getKeychainStore().isAvailable());
    this.onFallback = options.onFallback ?? ((message) => log.warn(message));
    this.localStorageSupported =
      options.localStorageSupported ?? isNodeRuntime();
  }

  /**
   * Returns the cached store, resolving it first if needed. A forced backend
   * always re-resolves and replaces the cache.
   */
  resolve(options: ResolveStorageOptions = {}): Promise<CredentialStore> {
    return this.exclusive(() => this.resolveLocked(options));
  }

  /** Forgets the cached store and the fallback warning */
  reset() {
    this.cached = null;
    this.warned = false;
  }

  activeBackend(): StoreKind | null {
    return this.cached?.backendType ?? null;
  }

  /** e.g. "OS keychain (secure)" or "/home/me/.config/beacon" */
  describe(): string {
    if (!this.cached) {
      return "not resolved";
    }
    if (this.cached.backendType === "keychain") {
      return `${this.cached.storageLocation} (secure)`;
    }
    return this.cached.storageLocation;
  }

  // ===========================================================================
  // Resolution
  // ===========================================================================

  private async resolveLocked(
    options: ResolveStorageOptions
  ): Promise<CredentialStore> {
    if (!this.localStorageSupported) {
      this.cached ??= new UnavailableStore();
      return this.cached;
    }

    if (options.forceBackend) {
      this.cached = await this.forced(options.forceBackend);
      return this.cached;
    }

    if (this.cached) {
      return this.cached;
    }

    this.cached = await this.fromEnvironment();
    log.debug(`Using ${this.cached.backendType} credential storage`);
    return this.cached;
  }

  private async forced(backend: StorageBackend): Promise<CredentialStore> {
    if (backend === "keychain" && !(await this.isKeychainAvailable())) {
      throw new StorageUnavailableError(
        "Keychain storage was requested but the OS keychain is not available"
      );
    }
    return this.createStore(backend);
  }

  private async fromEnvironment(): Promise<CredentialStore> {
    const requested = this.env[ENV.tokenStorage]?.trim().toLowerCase();

    if (requested) {
      if (!isStorageBackend(requested)) {
        throw new StorageConfigError(
          `Invalid ${ENV.tokenStorage} value "${requested}": expected one of ${STORAGE_BACKENDS.join(", ")}`
        );
      }
      if (requested === "keychain" && !(await this.isKeychainAvailable())) {
        throw new StorageConfigError(
          `${ENV.tokenStorage}=keychain but the OS keychain is not available`
        );
      }
      return this.createStore(requested);
    }

    if (await this.isKeychainAvailable()) {
      return this.createStore("keychain");
    }

    const store = this.createStore("file");
    if (!this.warned) {
      this.warned = true;
      this.onFallback(
        `OS keychain not available, storing credentials in ${store.storageLocation}`
      );
    }
    return store;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private createDefaultStore(backend: StorageBackend): CredentialStore {
    if (backend === "keychain") {
      return this.getKeychainStore();
    }
    return new FileStore(getConfigDir(this.env));
  }

  private getKeychainStore(): KeychainStore {
    this.keychain ??= new KeychainStore();
    return this.keychain;
  }
}
