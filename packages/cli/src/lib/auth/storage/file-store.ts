/**
 * File-backed credential store.
 *
 * One JSON file per site and kind in the config directory, readable only by
 * the owner (directory 0700, files 0600).
 */

import {
  type ClientCredentials,
  serializeClientCredentials,
  serializeTokenSet,
  storedClientCredentialsSchema,
  storedTokenSetSchema,
  type TokenSet,
} from "@beaconhq/core";
import { chmod, mkdir, readFile, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { z } from "zod";
import { isNodeError } from "@/lib/config";
import { log } from "@/lib/log";
import { type CredentialStore, decodeStored, sanitizeSite } from "./types";

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

export class FileStore implements CredentialStore {
  readonly backendType = "file";
  readonly storageLocation: string;

  constructor(private readonly dir: string) {
    this.storageLocation = dir;
  }

  tokensPath(site: string): string {
    return join(this.dir, `tokens_${sanitizeSite(site)}.json`);
  }

  clientPath(site: string): string {
    return join(this.dir, `client_${sanitizeSite(site)}.json`);
  }

  // ===========================================================================
  // Tokens
  // ===========================================================================

  async saveTokens(site: string, tokens: TokenSet): Promise<void> {
    await this.write(this.tokensPath(site), serializeTokenSet(tokens));
  }

  async loadTokens(site: string): Promise<TokenSet | null> {
    return this.read(this.tokensPath(site), storedTokenSetSchema);
  }

  async deleteTokens(site: string): Promise<void> {
    await this.remove(this.tokensPath(site));
  }

  // ===========================================================================
  // Client registrations
  // ===========================================================================

  async saveClientCredentials(
    site: string,
    credentials: ClientCredentials
  ): Promise<void> {
    await this.write(
      this.clientPath(site),
      serializeClientCredentials(credentials)
    );
  }

  async loadClientCredentials(site: string): Promise<ClientCredentials | null> {
    return this.read(this.clientPath(site), storedClientCredentialsSchema);
  }

  async deleteClientCredentials(site: string): Promise<void> {
    await this.remove(this.clientPath(site));
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async write(path: string, value: unknown): Promise<void> {
    await mkdir(this.dir, { recursive: true, mode: DIR_MODE });
    await writeFile(path, JSON.stringify(value, null, 2), {
      encoding: "utf8",
      mode: FILE_MODE,
    });
    // mode is only applied on create
    await chmod(path, FILE_MODE);
    log.debug(`Saved ${path}`);
  }

  private async read<T extends z.ZodTypeAny>(
    path: string,
    schema: T
  ): Promise<z.output<T> | null> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
    return decodeStored(raw, schema, path);
  }

  private async remove(path: string): Promise<void> {
    await rm(path, { force: true });
    log.debug(`Removed ${path}`);
  }
}
