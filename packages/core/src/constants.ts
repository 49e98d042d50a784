/**
 * Shared constants for the Beacon API and its OAuth2 server.
 */

/** Tenant used when none is configured */
export const DEFAULT_SITE = "beaconhq.com";

/** Name sent when registering the CLI as an OAuth client */
export const DCR_CLIENT_NAME = "beacon-cli";

/**
 * Loopback ports the CLI may listen on for the OAuth redirect, in the order
 * they are tried. Every one of them is registered with the provider, so the
 * bound port can change between runs without re-registering.
 */
export const DCR_REDIRECT_PORTS = [8000, 8080, 8888, 9000] as const;

/** Path served by the loopback listener */
export const OAUTH_CALLBACK_PATH = "/oauth/callback";

/** Grant types requested at registration */
export const OAUTH_GRANT_TYPES = ["authorization_code", "refresh_token"] as const;

/** Tokens are treated as expired this many seconds before their real expiry */
export const TOKEN_EXPIRY_BUFFER_SECONDS = 300;

/**
 * OAuth endpoint paths.
 *
 * - `register` and `token` are served from the API host (`api.<site>`)
 * - `authorize` is served from the app host (`app.<site>`)
 */
export const OAUTH_ENDPOINTS = {
  /** Dynamic Client Registration (RFC 7591) */
  register: "/api/v2/oauth2/register",
  /** Token endpoint for code exchange and refresh */
  token: "/oauth2/v1/token",
  /** Browser authorization endpoint */
  authorize: "/oauth2/v1/authorize",
} as const;

/** Scopes requested by `beacon auth login` */
export const DEFAULT_SCOPES = [
  "dashboards_read",
  "dashboards_write",
  "monitors_read",
  "monitors_write",
  "monitors_downtime",
  "apm_read",
  "slos_read",
  "slos_write",
  "incident_read",
  "incident_write",
  "synthetics_read",
  "synthetics_write",
  "hosts_read",
  "user_self_profile_read",
  "events_read",
  "logs_read_data",
  "metrics_read",
  "timeseries_query",
  "usage_read",
] as const;
