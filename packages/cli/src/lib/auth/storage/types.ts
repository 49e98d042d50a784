import type { ClientCredentials, TokenSet } from "@beaconhq/core";
import type { z } from "zod";
import { getErrorMessage } from "@/lib/errors";

export type StorageBackend = "keychain" | "file";

/** Backend a store writes to; "unavailable" for the rejecting stand-in */
export type StoreKind = StorageBackend | "unavailable";

export const STORAGE_BACKENDS: readonly StorageBackend[] = ["keychain", "file"];

/**
 * Per-site persistence for OAuth tokens and client registrations.
 * Loads return null when nothing is stored.
 */
export type CredentialStore = {
  readonly backendType: StoreKind;
  readonly storageLocation: string;

  saveTokens(site: string, tokens: TokenSet): Promise<void>;
  loadTokens(site: string): Promise<TokenSet | null>;
  deleteTokens(site: string): Promise<void>;

  saveClientCredentials(
    site: string,
    credentials: ClientCredentials
  ): Promise<void>;
  loadClientCredentials(site: string): Promise<ClientCredentials | null>;
  deleteClientCredentials(site: string): Promise<void>;
};

/** Replaces every character outside `[A-Za-z0-9]` with `_` */
export function sanitizeSite(site: string): string {
  return site.replace(/[^A-Za-z0-9]/g, "_");
}

export function isStorageBackend(value: string): value is StorageBackend {
  return value === "keychain" || value === "file";
}

/**
 * Parses a stored JSON value. Corrupt or mismatched data is an error naming
 * `source`; it is never treated as absent.
 */
export function decodeStored<T extends z.ZodTypeAny>(
  raw: string,
  schema: T,
  source: string
): z.output<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse ${source}: ${getErrorMessage(error)}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid credentials in ${source}: ${issue?.message ?? "unexpected shape"}`
    );
  }
  return result.data;
}
