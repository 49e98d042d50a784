import type { FetchFn } from "@/lib/auth/dcr";

type FetchInput = Parameters<FetchFn>[0];
type FetchInit = Parameters<FetchFn>[1];

export function getFetchUrl(input: FetchInput): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function getFetchMethod(input: FetchInput, init?: FetchInit): string {
  return init?.method ?? (input instanceof Request ? input.method : "GET");
}

export function formatFetchCall(input: FetchInput, init?: FetchInit): string {
  return `${getFetchMethod(input, init)} ${getFetchUrl(input)}`;
}

export type RecordedCall = {
  method: string;
  url: string;
  headers: Headers;
  body: string | undefined;
};

export type MockReply = {
  status: number;
  /** Objects are sent as JSON, strings as-is */
  body?: unknown;
};

/** Handlers keyed by "METHOD url" */
export type FetchHandlers = Record<
  string,
  MockReply | ((call: RecordedCall) => MockReply)
>;

export type FetchMock = {
  fetch: FetchFn;
  calls: RecordedCall[];
};

/**
 * In-process fetch stand-in. Unmatched requests reject like a network
 * failure, naming the request.
 */
export function createFetchMock(handlers: FetchHandlers): FetchMock {
  const calls: RecordedCall[] = [];

  const fetch: FetchFn = async (input, init) => {
    const call: RecordedCall = {
      method: getFetchMethod(input, init),
      url: getFetchUrl(input),
      headers: new Headers(init?.headers),
      body: readBody(init?.body),
    };
    calls.push(call);

    const handler = handlers[`${call.method} ${call.url}`];
    if (!handler) {
      throw new Error(`Unmocked fetch: ${formatFetchCall(input, init)}`);
    }

    const reply = typeof handler === "function" ? handler(call) : handler;
    return toResponse(reply);
  };

  return { fetch, calls };
}

/** A fetch that always fails with `message`, like an unreachable host */
export function failingFetch(message: string): FetchFn {
  return async (input, init) => {
    throw new Error(`${message} (${formatFetchCall(input, init)})`);
  };
}

/** Form bodies are recorded in their encoded form */
function readBody(body: NonNullable<FetchInit>["body"]): string | undefined {
  if (typeof body === "string") return body;
  if (body instanceof URLSearchParams) return body.toString();
  return undefined;
}

function toResponse(reply: MockReply): Response {
  if (reply.body === undefined) {
    return new Response(null, { status: reply.status });
  }
  const text =
    typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
  return new Response(text, {
    status: reply.status,
    headers: { "Content-Type": "application/json" },
  });
}
