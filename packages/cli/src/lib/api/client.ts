/**
 * Authenticated client for the Beacon REST API.
 */

import { getApiUrl, type HttpMethod } from "@beaconhq/core";
import { z } from "zod";
import type { FetchFn } from "@/lib/auth/dcr";
import type { Config } from "@/lib/config";
import { ApiRequestError, getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";
import { buildUrl, withQuery } from "@/lib/url";
import {
  type AuthContext,
  type ResolveAuthOptions,
  resolveAuth,
} from "./auth-resolver";
import { validateEndpointAuth } from "./endpoint-auth";

export const API_REQUEST_TIMEOUT_MS = 30_000;

export type ApiClientOptions = Omit<ResolveAuthOptions, "config"> & {
  /** CLI version for the User-Agent */
  version: string;
  fetch?: FetchFn;
};

export type ApiRequestOptions = {
  body?: unknown;
  query?: Record<string, string | undefined>;
};

export type ApiResponse = {
  status: number;
  /** Parsed JSON body, or null for an empty body */
  data: unknown;
  /** Credentials the request was sent with, after endpoint substitution */
  authType: AuthContext["type"];
};

const apiErrorSchema = z.object({
  errors: z.array(z.string()).min(1),
});

export class ApiClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;

  private constructor(
    private readonly config: Config,
    readonly auth: AuthContext,
    options: ApiClientOptions
  ) {
    this.baseUrl = getApiUrl(config.site);
    this.userAgent = `beacon-cli/${options.version}`;
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  /**
   * Resolves credentials (refreshing stored tokens if needed) and returns a
   * client bound to them.
   */
  static async create(
    config: Config,
    options: ApiClientOptions
  ): Promise<ApiClient> {
    const auth = await resolveAuth({ ...options, config });
    return new ApiClient(config, auth, options);
  }

  async request(
    method: HttpMethod,
    path: string,
    options: ApiRequestOptions = {}
  ): Promise<ApiResponse> {
    const auth = validateEndpointAuth(this.auth, this.config, method, path);
    const url = buildUrl(this.baseUrl, withQuery(path, options.query ?? {}));

    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": this.userAgent,
      ...authHeaders(auth),
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    log.debug(`${method} ${url} (${auth.type})`);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(API_REQUEST_TIMEOUT_MS),
      });
      text = await response.text();
    } catch (error) {
      throw new ApiRequestError(
        `Request to ${new URL(url).host} failed: ${getErrorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }

    log.debug(`Response: ${response.status}`);
    const data = parseJson(text);

    if (!response.ok) {
      throw new ApiRequestError(
        formatApiError(response.status, data, text),
        response.status
      );
    }

    return { status: response.status, data, authType: auth.type };
  }
}

function authHeaders(auth: AuthContext): Record<string, string> {
  if (auth.type === "oauth") {
    return { Authorization: `Bearer ${auth.accessToken}` };
  }
  return {
    "BEACON-API-KEY": auth.apiKey,
    "BEACON-APPLICATION-KEY": auth.appKey,
  };
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function formatApiError(status: number, data: unknown, text: string): string {
  const envelope = apiErrorSchema.safeParse(data);
  if (envelope.success) {
    return `HTTP ${status}: ${envelope.data.errors.join("; ")}`;
  }
  return text ? `HTTP ${status}: ${text}` : `HTTP ${status}`;
}
