/**
 * CLI API Command
 *
 * Sends an authenticated request to the Beacon API and returns the parsed
 * response.
 */

import type { HttpMethod } from "@beaconhq/core";
import { ApiClient, type ApiResponse } from "@/lib/api/client";
import { DcrClient, type FetchFn } from "@/lib/auth/dcr";
import { requireAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";

const METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "PATCH", "DELETE"];

export type ApiCommandOptions = {
  method: string;
  path: string;
  /** Raw JSON request body */
  data?: string;
  /** `key=value` query parameters */
  query?: string[];
  /** Ignore OAuth tokens and use the API key pair */
  useApiKeys?: boolean;
  fetch?: FetchFn;
};

export type ApiCommandResult = ApiResponse;

export async function api(
  options: ApiCommandOptions
): Promise<ApiCommandResult> {
  const ctx = requireAppContext();
  const method = parseMethod(options.method);
  const path = options.path.startsWith("/") ? options.path : `/${options.path}`;
  const body = options.data === undefined ? undefined : parseBody(options.data);

  const client = await ApiClient.create(ctx.config, {
    storage: ctx.storage,
    version: ctx.version,
    forceApiKeys: options.useApiKeys,
    fetch: options.fetch,
    createDcrClient: (site) => new DcrClient({ site, fetch: options.fetch }),
  });

  return client.request(method, path, {
    body,
    query: parseQuery(options.query ?? []),
  });
}

export function parseMethod(input: string): HttpMethod {
  const upper = input.toUpperCase();
  const method = METHODS.find((m) => m === upper);
  if (!method) {
    throw new Error(
      `Unsupported method "${input}". Use one of: ${METHODS.join(", ")}`
    );
  }
  return method;
}

export function parseQuery(pairs: string[]): Record<string, string> {
  const query: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf("=");
    if (index <= 0) {
      throw new Error(`Invalid query parameter "${pair}". Use key=value`);
    }
    query[pair.slice(0, index)] = pair.slice(index + 1);
  }
  return query;
}

function parseBody(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new Error(
      `Request body is not valid JSON: ${getErrorMessage(error)}`
    );
  }
}
