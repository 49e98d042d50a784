/**
 * OAuth2 credential types shared by every Beacon client.
 */

/**
 * Tokens returned by the token endpoint, stamped with the time they were issued.
 * Replaced wholesale on refresh.
 */
export type TokenSet = {
  accessToken: string;
  /** Empty when the provider did not issue one */
  refreshToken: string;
  tokenType: string;
  /** Lifetime in seconds, counted from `issuedAt` */
  expiresIn: number;
  /** Epoch seconds */
  issuedAt: number;
  scope: string;
  clientId?: string;
};

/**
 * Identity obtained through Dynamic Client Registration. One per site;
 * never mutated, only replaced by registering again.
 */
export type ClientCredentials = {
  clientId: string;
  clientName: string;
  redirectUris: string[];
  /** Epoch seconds */
  registeredAt: number;
  site: string;
};

/** Error envelope returned by the OAuth server (RFC 6749 §5.2) */
export type OAuthErrorBody = {
  error?: string;
  error_description?: string;
};
