/**
 * Error utilities
 */

/**
 * Safely extract an error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type BeaconErrorCode =
  | "oauth_transport"
  | "oauth_protocol"
  | "oauth_state"
  | "oauth_callback"
  | "callback_timeout"
  | "storage_config"
  | "storage_unavailable"
  | "unsupported_environment"
  | "auth_required"
  | "endpoint_auth"
  | "api_request";

/**
 * Base class for errors the CLI reports to the user as-is.
 */
export class BeaconError extends Error {
  readonly code: BeaconErrorCode;

  constructor(code: BeaconErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network failure talking to an OAuth endpoint */
export class OAuthTransportError extends BeaconError {
  constructor(message: string, options?: ErrorOptions) {
    super("oauth_transport", message, options);
  }
}

export type OAuthProtocolErrorDetails = {
  status: number;
  error?: string;
  errorDescription?: string;
};

/** Non-success response from the registration or token endpoint */
export class OAuthProtocolError extends BeaconError {
  readonly status: number;
  readonly error?: string;
  readonly errorDescription?: string;

  constructor(
    message: string,
    details: OAuthProtocolErrorDetails,
    options?: ErrorOptions
  ) {
    super("oauth_protocol", message, options);
    this.status = details.status;
    this.error = details.error;
    this.errorDescription = details.errorDescription;
  }
}

/** Missing code or state, or a state mismatch (possible CSRF) */
export class OAuthStateError extends BeaconError {
  constructor(message: string) {
    super("oauth_state", message);
  }
}

/** The authorization server redirected back with an error */
export class OAuthCallbackError extends BeaconError {
  readonly error: string;
  readonly errorDescription?: string;

  constructor(error: string, errorDescription?: string) {
    super(
      "oauth_callback",
      errorDescription
        ? `OAuth error: ${error} - ${errorDescription}`
        : `OAuth error: ${error}`
    );
    this.error = error;
    this.errorDescription = errorDescription;
  }
}

export class CallbackTimeoutError extends BeaconError {
  readonly timedOut = true;

  constructor(timeoutMs: number) {
    super(
      "callback_timeout",
      `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for the OAuth callback`
    );
  }
}

/** Invalid BEACON_TOKEN_STORAGE value or an unsatisfiable backend request */
export class StorageConfigError extends BeaconError {
  constructor(message: string) {
    super("storage_config", message);
  }
}

export class StorageUnavailableError extends BeaconError {
  constructor(message: string, options?: ErrorOptions) {
    super("storage_unavailable", message, options);
  }
}

export class UnsupportedEnvironmentError extends BeaconError {
  constructor(feature: string) {
    super(
      "unsupported_environment",
      `${feature} is not supported in this environment`
    );
  }
}

export const AUTH_REQUIRED_MESSAGE =
  "authentication required: run 'beacon auth login' for OAuth2 or set BEACON_API_KEY and BEACON_APP_KEY";

export class AuthRequiredError extends BeaconError {
  constructor() {
    super("auth_required", AUTH_REQUIRED_MESSAGE);
  }
}

/** An endpoint rejects OAuth and no API keys are configured */
export class EndpointAuthError extends BeaconError {
  readonly method: string;
  readonly path: string;

  constructor(method: string, path: string, reason: string) {
    super(
      "endpoint_auth",
      `${method} ${path} does not support OAuth authentication (${reason}). ` +
        "Set BEACON_API_KEY and BEACON_APP_KEY to call this endpoint."
    );
    this.method = method;
    this.path = path;
  }
}

/** Failed or rejected request to the Beacon API */
export class ApiRequestError extends BeaconError {
  /** HTTP status, or undefined when no response arrived */
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super("api_request", message, options);
    this.status = status;
  }
}
