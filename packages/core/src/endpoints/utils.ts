import { ENDPOINTS_WITHOUT_OAUTH } from "./table";
import type { EndpointAuthRequirement } from "./types";

function matchesPath(pattern: string, path: string): boolean {
  if (pattern.endsWith("/")) {
    return path.startsWith(pattern.slice(0, -1));
  }
  return pattern === path;
}

/**
 * Finds the auth requirement for a request, or undefined when the endpoint
 * has no special requirement.
 */
export function findEndpointRequirement(
  method: string,
  path: string,
  table: readonly EndpointAuthRequirement[] = ENDPOINTS_WITHOUT_OAUTH
): EndpointAuthRequirement | undefined {
  const normalizedMethod = method.toUpperCase();
  const pathname = path.split("?")[0] ?? path;

  return table.find(
    (entry) =>
      entry.method === normalizedMethod && matchesPath(entry.path, pathname)
  );
}
