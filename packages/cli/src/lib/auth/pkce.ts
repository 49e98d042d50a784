/**
 * PKCE (RFC 7636) and state generation.
 *
 * Values are base64url without padding, so they only use `[A-Za-z0-9_-]`.
 * Failures of the random source propagate.
 */

import { createHash, randomBytes } from "crypto";

export const PKCE_VERIFIER_LENGTH = 128;
export const STATE_LENGTH = 32;

export type PkceChallenge = {
  verifier: string;
  challenge: string;
  method: "S256";
};

/** Random base64url string of exactly `length` characters */
function randomToken(length: number): string {
  // 3 bytes encode to 4 characters
  const byteCount = Math.ceil((length * 3) / 4);
  return randomBytes(byteCount).toString("base64url").slice(0, length);
}

export function computeChallenge(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64url");
}

export function generatePkceChallenge(): PkceChallenge {
  const verifier = randomToken(PKCE_VERIFIER_LENGTH);
  return {
    verifier,
    challenge: computeChallenge(verifier),
    method: "S256",
  };
}

export function generateState(): string {
  return randomToken(STATE_LENGTH);
}
