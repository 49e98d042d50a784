/**
 * OS keychain credential store.
 *
 * - macOS: Keychain
 * - Windows: Credential Manager
 * - Linux: Secret Service (libsecret)
 *
 * Tokens live under service `beacon-cli` (account `oauth:<site>`), client
 * registrations under `beacon-cli-dcr` (account `client:<site>`). Values are
 * the same JSON the file store writes.
 */

import {
  type ClientCredentials,
  serializeClientCredentials,
  serializeTokenSet,
  storedClientCredentialsSchema,
  storedTokenSetSchema,
  type TokenSet,
} from "@beaconhq/core";
import type { z } from "zod";
import { getErrorMessage, StorageUnavailableError } from "@/lib/errors";
import { log } from "@/lib/log";
import { type CredentialStore, decodeStored } from "./types";

export const KEYCHAIN_SERVICE = "beacon-cli";
export const KEYCHAIN_DCR_SERVICE = "beacon-cli-dcr";

const PROBE_ACCOUNT = "__probe__";

/** The subset of `@napi-rs/keyring` this store relies on */
export type KeyringEntry = {
  getPassword(): string | null | undefined;
  setPassword(password: string): void;
  deletePassword(): boolean | undefined | void;
};

export type KeyringModule = {
  Entry: new (service: string, account: string) => KeyringEntry;
};

export type LoadKeyring = () => Promise<KeyringModule>;

const loadNativeKeyring: LoadKeyring = () => import("@napi-rs/keyring");

/** Keyring reports a missing credential as an error on some platforms */
function isNoEntryError(error: unknown): boolean {
  return /no matching entry|not found/i.test(getErrorMessage(error));
}

export class KeychainStore implements CredentialStore {
  readonly backendType = "keychain";
  readonly storageLocation = "OS keychain";
  private keyring: Promise<KeyringModule> | null = null;

  constructor(private readonly loadKeyring: LoadKeyring = loadNativeKeyring) {}

  /**
   * True when the native module loads and a read against the keychain
   * succeeds.
   */
  async isAvailable(): Promise<boolean> {
    try {
      const keyring = await this.getKeyring();
      this.get(keyring, KEYCHAIN_SERVICE, PROBE_ACCOUNT);
      return true;
    } catch (error) {
      log.debug(`Keychain not available: ${getErrorMessage(error)}`);
      return false;
    }
  }

  // ===========================================================================
  // Tokens
  // ===========================================================================

  async saveTokens(site: string, tokens: TokenSet): Promise<void> {
    await this.write(KEYCHAIN_SERVICE, tokenAccount(site), serializeTokenSet(tokens));
  }

  async loadTokens(site: string): Promise<TokenSet | null> {
    return this.read(KEYCHAIN_SERVICE, tokenAccount(site), storedTokenSetSchema);
  }

  async deleteTokens(site: string): Promise<void> {
    await this.remove(KEYCHAIN_SERVICE, tokenAccount(site));
  }

  // ===========================================================================
  // Client registrations
  // ===========================================================================

  async saveClientCredentials(
    site: string,
    credentials: ClientCredentials
  ): Promise<void> {
    await this.write(
      KEYCHAIN_DCR_SERVICE,
      clientAccount(site),
      serializeClientCredentials(credentials)
    );
  }

  async loadClientCredentials(site: string): Promise<ClientCredentials | null> {
    return this.read(
      KEYCHAIN_DCR_SERVICE,
      clientAccount(site),
      storedClientCredentialsSchema
    );
  }

  async deleteClientCredentials(site: string): Promise<void> {
    await this.remove(KEYCHAIN_DCR_SERVICE, clientAccount(site));
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private getKeyring(): Promise<KeyringModule> {
    if (!this.keyring) {
      this.keyring = this.loadKeyring().catch((error: unknown) => {
        this.keyring = null;
        throw new StorageUnavailableError(
          `Keychain module could not be loaded: ${getErrorMessage(error)}`,
          { cause: error }
        );
      });
    }
    return this.keyring;
  }

  private get(
    keyring: KeyringModule,
    service: string,
    account: string
  ): string | null {
    try {
      return new keyring.Entry(service, account).getPassword() ?? null;
    } catch (error) {
      if (isNoEntryError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async write(
    service: string,
    account: string,
    value: unknown
  ): Promise<void> {
    const keyring = await this.getKeyring();
    new keyring.Entry(service, account).setPassword(JSON.stringify(value));
    log.debug(`Saved ${service}/${account} to keychain`);
  }

  private async read<T extends z.ZodTypeAny>(
    service: string,
    account: string,
    schema: T
  ): Promise<z.output<T> | null> {
    const keyring = await this.getKeyring();
    const raw = this.get(keyring, service, account);
    if (raw === null) {
      return null;
    }
    return decodeStored(raw, schema, `keychain entry ${service}/${account}`);
  }

  private async remove(service: string, account: string): Promise<void> {
    const keyring = await this.getKeyring();
    try {
      new keyring.Entry(service, account).deletePassword();
      log.debug(`Removed ${service}/${account} from keychain`);
    } catch (error) {
      if (!isNoEntryError(error)) {
        throw error;
      }
    }
  }
}

function tokenAccount(site: string): string {
  return `oauth:${site}`;
}

function clientAccount(site: string): string {
  return `client:${site}`;
}
