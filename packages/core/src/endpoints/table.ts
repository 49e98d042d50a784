import type { EndpointAuthRequirement } from "./types";

const LOGS_REASON = "Logs API does not accept OAuth access tokens";
const LOGS_CONFIG_REASON = "Logs configuration API does not accept OAuth access tokens";
const RUM_REASON = "RUM API does not accept OAuth access tokens";
const KEYS_REASON = "Key management requires API key authentication";
const ERROR_TRACKING_REASON = "Error Tracking API requires API keys";

/**
 * Endpoints known to reject bearer-token authentication.
 * Everything not listed here accepts OAuth.
 */
export const ENDPOINTS_WITHOUT_OAUTH: readonly EndpointAuthRequirement[] = [
  // Logs
  { path: "/api/v2/logs/events", method: "POST", supportsOAuth: false, reason: LOGS_REASON },
  { path: "/api/v2/logs/events/search", method: "POST", supportsOAuth: false, reason: LOGS_REASON },
  { path: "/api/v2/logs/analytics/aggregate", method: "POST", supportsOAuth: false, reason: LOGS_REASON },
  { path: "/api/v2/logs/config/archives", method: "GET", supportsOAuth: false, reason: LOGS_CONFIG_REASON },
  { path: "/api/v2/logs/config/archives/", method: "GET", supportsOAuth: false, reason: LOGS_CONFIG_REASON },
  { path: "/api/v2/logs/config/archives/", method: "DELETE", supportsOAuth: false, reason: LOGS_CONFIG_REASON },
  { path: "/api/v2/logs/config/metrics", method: "GET", supportsOAuth: false, reason: LOGS_CONFIG_REASON },
  { path: "/api/v2/logs/config/metrics/", method: "GET", supportsOAuth: false, reason: LOGS_CONFIG_REASON },

  // RUM
  { path: "/api/v2/rum/applications", method: "GET", supportsOAuth: false, reason: RUM_REASON },
  { path: "/api/v2/rum/applications/", method: "GET", supportsOAuth: false, reason: RUM_REASON },
  { path: "/api/v2/rum/applications", method: "POST", supportsOAuth: false, reason: RUM_REASON },
  { path: "/api/v2/rum/applications/", method: "PATCH", supportsOAuth: false, reason: RUM_REASON },
  { path: "/api/v2/rum/applications/", method: "DELETE", supportsOAuth: false, reason: RUM_REASON },
  { path: "/api/v2/rum/events/search", method: "POST", supportsOAuth: false, reason: RUM_REASON },

  // API and application keys
  { path: "/api/v2/api_keys", method: "GET", supportsOAuth: false, reason: KEYS_REASON },
  { path: "/api/v2/api_keys/", method: "GET", supportsOAuth: false, reason: KEYS_REASON },
  { path: "/api/v2/api_keys", method: "POST", supportsOAuth: false, reason: KEYS_REASON },
  { path: "/api/v2/api_keys/", method: "DELETE", supportsOAuth: false, reason: KEYS_REASON },
  { path: "/api/v2/app_keys", method: "GET", supportsOAuth: false, reason: KEYS_REASON },
  { path: "/api/v2/app_keys/", method: "GET", supportsOAuth: false, reason: KEYS_REASON },
  { path: "/api/v2/app_keys/", method: "DELETE", supportsOAuth: false, reason: KEYS_REASON },

  // Error Tracking
  { path: "/api/v2/error_tracking/issues/search", method: "POST", supportsOAuth: false, reason: ERROR_TRACKING_REASON },
  { path: "/api/v2/error_tracking/issues/", method: "GET", supportsOAuth: false, reason: ERROR_TRACKING_REASON },
];
