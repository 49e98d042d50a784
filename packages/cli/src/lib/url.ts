/**
 * URL Utilities
 */

/**
 * Builds a full URL from a base URL and path.
 * Handles trailing slashes correctly.
 *
 * @param base - Base URL (e.g., "https://api.beaconhq.com")
 * @param path - Path to append (e.g., OAUTH_ENDPOINTS.token)
 */
export function buildUrl(base: string, path: string): string {
  return new URL(path, base).toString();
}

/**
 * Appends query parameters to a path, skipping undefined values.
 */
export function withQuery(
  path: string,
  query: Record<string, string | undefined>
): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, value);
    }
  }
  const search = params.toString();
  if (!search) return path;
  return `${path}${path.includes("?") ? "&" : "?"}${search}`;
}
