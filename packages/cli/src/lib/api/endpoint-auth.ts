import { findEndpointRequirement } from "@beaconhq/core";
import { type Config, hasApiKeys } from "@/lib/config";
import { EndpointAuthError } from "@/lib/errors";
import { log } from "@/lib/log";
import type { AuthContext } from "./auth-resolver";

/**
 * Returns the credentials to call `method path` with.
 *
 * OAuth credentials aimed at an endpoint that rejects bearer tokens are
 * swapped for the configured API keys; without keys the call is refused.
 */
export function validateEndpointAuth(
  auth: AuthContext,
  config: Config,
  method: string,
  path: string
): AuthContext {
  if (auth.type !== "oauth") {
    return auth;
  }

  const requirement = findEndpointRequirement(method, path);
  if (!requirement || requirement.supportsOAuth) {
    return auth;
  }

  if (hasApiKeys(config)) {
    log.debug(
      `${method.toUpperCase()} ${path} does not accept OAuth, using API keys`
    );
    return { type: "api-keys", apiKey: config.apiKey, appKey: config.appKey };
  }

  throw new EndpointAuthError(method.toUpperCase(), path, requirement.reason);
}
