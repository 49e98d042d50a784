import type { ClientCredentials, TokenSet } from "@beaconhq/core";
import { UnsupportedEnvironmentError } from "@/lib/errors";
import type { CredentialStore } from "./types";

/**
 * Store for runtimes with neither a filesystem nor a keychain. Every
 * operation rejects.
 */
export class UnavailableStore implements CredentialStore {
  readonly backendType = "unavailable";
  readonly storageLocation = "unavailable";

  saveTokens(_site: string, _tokens: TokenSet): Promise<void> {
    return reject();
  }

  loadTokens(_site: string): Promise<TokenSet | null> {
    return reject();
  }

  deleteTokens(_site: string): Promise<void> {
    return reject();
  }

  saveClientCredentials(
    _site: string,
    _credentials: ClientCredentials
  ): Promise<void> {
    return reject();
  }

  loadClientCredentials(_site: string): Promise<ClientCredentials | null> {
    return reject();
  }

  deleteClientCredentials(_site: string): Promise<void> {
    return reject();
  }
}

function reject(): Promise<never> {
  return Promise.reject(new UnsupportedEnvironmentError("Credential storage"));
}
