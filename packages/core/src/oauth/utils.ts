import {
  DCR_REDIRECT_PORTS,
  OAUTH_CALLBACK_PATH,
  TOKEN_EXPIRY_BUFFER_SECONDS,
} from "../constants";
import type { OAuthErrorBody, TokenSet } from "./types";

/** Current time in epoch seconds */
export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** Epoch seconds at which the token stops being accepted by the provider */
export function getTokenExpiresAt(tokens: TokenSet): number {
  return tokens.issuedAt + tokens.expiresIn;
}

/**
 * True once `now` is inside the safety buffer before real expiry, so a token
 * is never sent within five minutes of expiring.
 */
export function isTokenExpired(
  tokens: TokenSet,
  now: number = nowInSeconds()
): boolean {
  return now >= getTokenExpiresAt(tokens) - TOKEN_EXPIRY_BUFFER_SECONDS;
}

/** `http://127.0.0.1:<port>/oauth/callback` */
export function buildRedirectUri(port: number): string {
  return `http://127.0.0.1:${port}${OAUTH_CALLBACK_PATH}`;
}

/** Redirect URIs for every candidate loopback port */
export function getRedirectUris(
  ports: readonly number[] = DCR_REDIRECT_PORTS
): string[] {
  return ports.map(buildRedirectUri);
}

/**
 * Human-readable message for an OAuth error envelope:
 * description, then error code, then undefined.
 */
export function describeOAuthError(body: OAuthErrorBody): string | undefined {
  if (body.error_description) {
    return body.error_description;
  }
  if (body.error) {
    return body.error;
  }
  return;
}
