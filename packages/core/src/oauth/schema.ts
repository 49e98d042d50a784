/**
 * Zod schemas for OAuth wire payloads and persisted credentials.
 *
 * Persisted credentials use the same snake_case layout as the wire format so
 * other tools reading `tokens_<site>.json` see familiar field names.
 */

import { z } from "zod";
import type { ClientCredentials, TokenSet } from "./types";

// =============================================================================
// Wire payloads
// =============================================================================

export const oauthErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

/**
 * Registered client metadata. Servers may omit echoed fields, in which case
 * the requested values stand.
 */
export const registrationResponseSchema = z.object({
  client_id: z.string().min(1, "client_id is required"),
  client_name: z.string().optional(),
  redirect_uris: z.array(z.string()).optional(),
});

export type RegistrationResponse = z.infer<typeof registrationResponseSchema>;

// =============================================================================
// Persisted credentials
// =============================================================================

export const storedTokenSetSchema = z
  .object({
    access_token: z.string(),
    refresh_token: z.string().default(""),
    token_type: z.string().default("Bearer"),
    expires_in: z.number(),
    issued_at: z.number(),
    scope: z.string().default(""),
    client_id: z.string().optional(),
  })
  .transform(
    (stored): TokenSet => ({
      accessToken: stored.access_token,
      refreshToken: stored.refresh_token,
      tokenType: stored.token_type,
      expiresIn: stored.expires_in,
      issuedAt: stored.issued_at,
      scope: stored.scope,
      ...(stored.client_id !== undefined ? { clientId: stored.client_id } : {}),
    })
  );

export const storedClientCredentialsSchema = z
  .object({
    client_id: z.string(),
    client_name: z.string(),
    redirect_uris: z.array(z.string()),
    registered_at: z.number(),
    site: z.string(),
  })
  .transform(
    (stored): ClientCredentials => ({
      clientId: stored.client_id,
      clientName: stored.client_name,
      redirectUris: stored.redirect_uris,
      registeredAt: stored.registered_at,
      site: stored.site,
    })
  );

export function serializeTokenSet(tokens: TokenSet) {
  return {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    token_type: tokens.tokenType,
    expires_in: tokens.expiresIn,
    issued_at: tokens.issuedAt,
    scope: tokens.scope,
    ...(tokens.clientId !== undefined ? { client_id: tokens.clientId } : {}),
  };
}

export function serializeClientCredentials(credentials: ClientCredentials) {
  return {
    client_id: credentials.clientId,
    client_name: credentials.clientName,
    redirect_uris: credentials.redirectUris,
    registered_at: credentials.registeredAt,
    site: credentials.site,
  };
}
