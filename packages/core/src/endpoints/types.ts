/** HTTP methods the API client issues */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * Authentication requirement for an API endpoint.
 *
 * A `path` ending in `/` matches every path under it (IDs follow the slash);
 * any other path must match exactly.
 */
export type EndpointAuthRequirement = {
  path: string;
  method: HttpMethod;
  supportsOAuth: boolean;
  reason: string;
};
