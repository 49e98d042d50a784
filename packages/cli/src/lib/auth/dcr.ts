/**
 * OAuth client for the Beacon authorization server.
 *
 * Uses openid-client for every exchange with the server:
 * - Dynamic Client Registration (RFC 7591), public client, no secret
 * - Authorization code grant with PKCE, and the refresh grant
 * - Authorization URL construction
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7591
 * @see https://datatracker.ietf.org/doc/html/rfc7636
 * @see https://github.com/panva/openid-client
 */

import {
  type ClientCredentials,
  DCR_CLIENT_NAME,
  DEFAULT_SCOPES,
  describeOAuthError,
  getApiUrl,
  getAppUrl,
  getRedirectUris,
  nowInSeconds,
  OAUTH_ENDPOINTS,
  OAUTH_GRANT_TYPES,
  oauthErrorSchema,
  registrationResponseSchema,
  type TokenSet,
} from "@beaconhq/core";
import * as client from "openid-client";
import type { CallbackResult } from "@/lib/auth/callback-server";
import {
  type BeaconError,
  getErrorMessage,
  OAuthCallbackError,
  OAuthProtocolError,
  OAuthStateError,
  OAuthTransportError,
} from "@/lib/errors";
import { log } from "@/lib/log";
import { buildUrl } from "@/lib/url";

export const OAUTH_REQUEST_TIMEOUT_SECONDS = 30;

/** RFC 8414 metadata location, relative to the issuer */
const SERVER_METADATA_PATH = "/.well-known/oauth-authorization-server";

export type FetchFn = typeof globalThis.fetch;

export type DcrClientOptions = {
  site: string;
  fetch?: FetchFn;
  /** Clock in epoch seconds */
  now?: () => number;
  /** Ports whose redirect URIs are registered */
  redirectPorts?: readonly number[];
};

export type AuthorizationUrlParams = {
  clientId: string;
  redirectUri: string;
  state: string;
  codeChallenge: string;
  scopes?: readonly string[];
};

/** What the loopback listener received, plus the PKCE verifier it answers */
export type CodeExchange = {
  code: string;
  state: string;
  redirectUri: string;
  codeVerifier: string;
};

export class DcrClient {
  readonly site: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly redirectPorts?: readonly number[];
  private readonly serverMetadata: client.ServerMetadata;

  constructor(options: DcrClientOptions) {
    this.site = options.site;
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.now = options.now ?? nowInSeconds;
    this.redirectPorts = options.redirectPorts;

    const apiUrl = getApiUrl(this.site);
    this.serverMetadata = {
      issuer: apiUrl,
      authorization_endpoint: buildUrl(
        getAppUrl(this.site),
        OAUTH_ENDPOINTS.authorize
      ),
      token_endpoint: buildUrl(apiUrl, OAUTH_ENDPOINTS.token),
      registration_endpoint: buildUrl(apiUrl, OAUTH_ENDPOINTS.register),
    };
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Registers the CLI as a public client. Every candidate redirect URI is
   * registered, whatever port ends up bound.
   */
  async register(): Promise<ClientCredentials> {
    const redirectUris = getRedirectUris(this.redirectPorts);
    log.debug(
      `Registering OAuth client at ${this.serverMetadata.registration_endpoint}`
    );

    let registered: client.Configuration;
    try {
      registered = await client.dynamicClientRegistration(
        new URL(this.serverMetadata.issuer),
        {
          client_name: DCR_CLIENT_NAME,
          redirect_uris: redirectUris,
          grant_types: [...OAUTH_GRANT_TYPES],
        },
        client.None(),
        {
          algorithm: "oauth2",
          timeout: OAUTH_REQUEST_TIMEOUT_SECONDS,
          [client.customFetch]: this.customFetch,
        }
      );
    } catch (error) {
      throw await toOAuthError(error, "registration", this.host);
    }

    const parsed = registrationResponseSchema.safeParse(
      registered.clientMetadata()
    );
    if (!parsed.success) {
      throw new OAuthProtocolError(
        `invalid registration response: ${parsed.error.issues[0]?.message ?? "unexpected body"}`,
        { status: 201 }
      );
    }
    log.debug(`Registered OAuth client ${parsed.data.client_id}`);

    return {
      clientId: parsed.data.client_id,
      clientName: parsed.data.client_name ?? DCR_CLIENT_NAME,
      redirectUris: parsed.data.redirect_uris ?? redirectUris,
      registeredAt: this.now(),
      site: this.site,
    };
  }

  // ===========================================================================
  // Token endpoint
  // ===========================================================================

  async exchangeCode(
    exchange: CodeExchange,
    credentials: ClientCredentials
  ): Promise<TokenSet> {
    log.debug("Exchanging authorization code for tokens");

    const callbackUrl = new URL(exchange.redirectUri);
    callbackUrl.searchParams.set("code", exchange.code);
    callbackUrl.searchParams.set("state", exchange.state);

    try {
      const response = await client.authorizationCodeGrant(
        this.configuration(credentials.clientId),
        callbackUrl,
        {
          pkceCodeVerifier: exchange.codeVerifier,
          expectedState: exchange.state,
        }
      );
      return toTokenSet(response, this.now(), credentials.clientId);
    } catch (error) {
      throw await toOAuthError(error, "token", this.host);
    }
  }

  /**
   * The returned set has an empty refresh token when the server did not
   * rotate it; callers keep the previous one.
   */
  async refreshToken(
    refreshToken: string,
    credentials: ClientCredentials
  ): Promise<TokenSet> {
    log.debug("Refreshing access token");
    try {
      const response = await client.refreshTokenGrant(
        this.configuration(credentials.clientId),
        refreshToken
      );
      return toTokenSet(response, this.now(), credentials.clientId);
    } catch (error) {
      throw await toOAuthError(error, "token", this.host);
    }
  }

  // ===========================================================================
  // Authorization
  // ===========================================================================

  buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const url = client.buildAuthorizationUrl(
      this.configuration(params.clientId),
      {
        response_type: "code",
        redirect_uri: params.redirectUri,
        state: params.state,
        scope: (params.scopes ?? DEFAULT_SCOPES).join(" "),
        code_challenge: params.codeChallenge,
        code_challenge_method: "S256",
      }
    );
    return url.toString();
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private get host(): string {
    return new URL(this.serverMetadata.issuer).host;
  }

  private get metadataUrl(): string {
    return buildUrl(this.serverMetadata.issuer, SERVER_METADATA_PATH);
  }

  private configuration(clientId: string): client.Configuration {
    const config = new client.Configuration(
      this.serverMetadata,
      clientId,
      undefined,
      client.None()
    );
    config[client.customFetch] = this.customFetch;
    config.timeout = OAUTH_REQUEST_TIMEOUT_SECONDS;
    return config;
  }

  /**
   * The server publishes no metadata document, so the metadata lookup that
   * precedes registration is answered with the fixed endpoints.
   */
  private readonly customFetch: client.CustomFetch = async (url, options) => {
    if (url === this.metadataUrl) {
      return Response.json(this.serverMetadata);
    }
    const response = await this.fetchFn(url, options);
    log.debug(`${options.method} ${url} returned HTTP ${response.status}`);
    return response;
  };
}

/**
 * Checks a loopback callback against the state sent with the authorization
 * request and returns the authorization code.
 */
export function validateCallback(
  result: CallbackResult,
  expectedState: string
): string {
  if (result.error) {
    throw new OAuthCallbackError(result.error, result.errorDescription);
  }
  if (!result.code) {
    throw new OAuthStateError("no authorization code in callback");
  }
  if (!result.state) {
    throw new OAuthStateError("no state parameter in callback");
  }
  if (result.state !== expectedState) {
    throw new OAuthStateError(
      "state mismatch in callback, possible CSRF attack"
    );
  }
  return result.code;
}

// =============================================================================
// Helpers
// =============================================================================

/** A missing `expires_in` counts as already expired, so refresh takes over */
function toTokenSet(
  response: client.TokenEndpointResponse,
  issuedAt: number,
  clientId: string
): TokenSet {
  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token ?? "",
    tokenType: canonicalTokenType(response.token_type),
    expiresIn: response.expires_in ?? 0,
    issuedAt,
    scope: response.scope ?? "",
    clientId,
  };
}

/** Token types are case-insensitive; bearer tokens are stored as "Bearer" */
function canonicalTokenType(tokenType: string): string {
  return tokenType.toLowerCase() === "bearer" ? "Bearer" : tokenType;
}

/**
 * Error for a non-success response: `error_description`, then `error`,
 * then the raw status and body.
 */
function protocolError(
  status: number,
  text: string,
  options?: ErrorOptions
): OAuthProtocolError {
  const envelope = oauthErrorSchema.safeParse(safeJson(text));
  const body = envelope.success ? envelope.data : {};
  const message = describeOAuthError(body) ?? `HTTP ${status}: ${text}`;

  return new OAuthProtocolError(
    message,
    {
      status,
      error: body.error,
      errorDescription: body.error_description,
    },
    options
  );
}

/**
 * Maps openid-client failures onto the CLI's error types:
 * - `ResponseBodyError`: OAuth error envelope from the server
 * - `ClientError` carrying the `Response`: unexpected status or body
 * - other `ClientError`: a response that fails validation
 * - anything else, timeouts included: the request never completed
 */
async function toOAuthError(
  error: unknown,
  label: string,
  host: string
): Promise<BeaconError> {
  if (error instanceof client.ResponseBodyError) {
    return new OAuthProtocolError(
      describeOAuthError(error) ?? `HTTP ${error.status}`,
      {
        status: error.status,
        error: error.error,
        errorDescription: error.error_description,
      },
      { cause: error }
    );
  }

  if (error instanceof client.ClientError && !isTimeout(error.cause)) {
    if (error.cause instanceof Response) {
      const text = await readText(error.cause);
      return protocolError(error.cause.status, text, { cause: error });
    }
    return new OAuthProtocolError(
      `invalid ${label} response: ${error.message}`,
      { status: 0 },
      { cause: error }
    );
  }

  return new OAuthTransportError(
    `${label} request to ${host} failed: ${getErrorMessage(error)}`,
    { cause: error }
  );
}

function isTimeout(cause: unknown): boolean {
  return (
    cause instanceof Error &&
    (cause.name === "TimeoutError" || cause.name === "AbortError")
  );
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    log.debug(`Could not read error body: ${getErrorMessage(error)}`);
    return "";
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
