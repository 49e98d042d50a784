/**
 * Loopback HTTP listener for the OAuth redirect (RFC 8252 §7.3).
 *
 * Binds 127.0.0.1 on the first free candidate port and hands the first
 * callback it receives to whoever waits for it. Later callbacks still get
 * a page but are dropped.
 */

import {
  buildRedirectUri,
  DCR_REDIRECT_PORTS,
  OAUTH_CALLBACK_PATH,
} from "@beaconhq/core";
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "http";
import { renderErrorPage, renderSuccessPage } from "@/lib/auth/callback-pages";
import {
  CallbackTimeoutError,
  getErrorMessage,
  UnsupportedEnvironmentError,
} from "@/lib/errors";
import { log } from "@/lib/log";
import { isNodeRuntime } from "@/lib/runtime";

const LOOPBACK_HOST = "127.0.0.1";
const STOP_GRACE_MS = 5000;

/** Query parameters of a redirect; absent ones are undefined */
export type CallbackResult = {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
};

export type CallbackListener = {
  readonly port: number;
  readonly redirectUri: string;
  start(): Promise<void>;
  waitForCallback(timeoutMs: number): Promise<CallbackResult>;
  stop(): Promise<void>;
};

export type CallbackServerOptions = {
  /** Candidate ports, tried in order. 0 picks an ephemeral port. */
  ports?: readonly number[];
};

// =============================================================================
// Mailbox
// =============================================================================

/**
 * Single-slot hand-off between the request handler and the waiter.
 */
export class Mailbox<T> {
  private slot: { value: T } | null = null;
  private waiter: ((value: T) => void) | null = null;

  /** Returns false when a value is already waiting */
  offer(value: T): boolean {
    if (this.slot) {
      return false;
    }
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(value);
      return true;
    }
    this.slot = { value };
    return true;
  }

  /** Delivers the next value to `receive`; the returned function cancels */
  take(receive: (value: T) => void): () => void {
    if (this.slot) {
      const { value } = this.slot;
      this.slot = null;
      receive(value);
      return () => undefined;
    }
    this.waiter = receive;
    return () => {
      if (this.waiter === receive) {
        this.waiter = null;
      }
    };
  }
}

// =============================================================================
// Server
// =============================================================================

export class CallbackServer implements CallbackListener {
  readonly port: number;
  readonly redirectUri: string;
  private readonly mailbox = new Mailbox<CallbackResult>();
  private server: Server | null = null;
  private stopped = false;

  private constructor(port: number) {
    this.port = port;
    this.redirectUri = buildRedirectUri(port);
  }

  /**
   * Picks the first candidate port that can be bound.
   */
  static async create(
    options: CallbackServerOptions = {}
  ): Promise<CallbackServer> {
    const ports = options.ports ?? DCR_REDIRECT_PORTS;
    let lastError: unknown;

    for (const candidate of ports) {
      const trial = createServer();
      try {
        const port = await listen(trial, candidate);
        await close(trial);
        log.debug(`Callback listener will use port ${port}`);
        return new CallbackServer(port);
      } catch (error) {
        log.debug(`Port ${candidate} unavailable: ${getErrorMessage(error)}`);
        lastError = error;
      }
    }

    throw new Error(
      `No available port for the OAuth callback (tried ${ports.join(", ")})`,
      { cause: lastError }
    );
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const server = createServer((req, res) => this.handle(req, res));
    await listen(server, this.port);
    this.server = server;
    log.debug(`Listening for OAuth callback on ${this.redirectUri}`);
  }

  waitForCallback(timeoutMs: number): Promise<CallbackResult> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        cancel();
        reject(new CallbackTimeoutError(timeoutMs));
      }, timeoutMs);

      const cancel = this.mailbox.take((result) => {
        clearTimeout(timer);
        resolve(result);
      });
    });
  }

  /**
   * Stops accepting connections and waits for in-flight ones, forcing them
   * closed after a grace period. Safe to call more than once.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server || this.stopped) {
      return;
    }
    this.stopped = true;

    const force = setTimeout(() => server.closeAllConnections(), STOP_GRACE_MS);
    force.unref();

    const closed = close(server);
    server.closeIdleConnections();
    try {
      await closed;
    } finally {
      clearTimeout(force);
    }
    log.debug("Callback listener stopped");
  }

  private handle(req: IncomingMessage, res: ServerResponse) {
    const url = new URL(req.url ?? "/", `http://${LOOPBACK_HOST}`);

    if (req.method !== "GET" || url.pathname !== OAUTH_CALLBACK_PATH) {
      res.writeHead(404, {
        "Content-Type": "text/plain; charset=utf-8",
        Connection: "close",
      });
      res.end("Not found");
      return;
    }

    const param = (name: string) => url.searchParams.get(name) ?? undefined;
    const result: CallbackResult = {
      code: param("code"),
      state: param("state"),
      error: param("error"),
      errorDescription: param("error_description"),
    };

    if (!this.mailbox.offer(result)) {
      log.debug("Ignoring extra OAuth callback");
    }

    const failed = result.error !== undefined || result.code === undefined;
    const status = failed ? 400 : 200;
    const html = failed
      ? renderErrorPage(
          result.error ?? "missing_code",
          result.errorDescription ??
            (result.error ? undefined : "No authorization code was returned.")
        )
      : renderSuccessPage();

    res.writeHead(status, {
      "Content-Type": "text/html; charset=utf-8",
      Connection: "close",
    });
    res.end(html);
  }
}

/**
 * Stand-in for runtimes that cannot open a loopback socket.
 */
export class UnavailableCallbackServer implements CallbackListener {
  readonly port = 0;
  readonly redirectUri = "";

  start(): Promise<void> {
    return Promise.reject(unsupported());
  }

  waitForCallback(_timeoutMs: number): Promise<CallbackResult> {
    return Promise.reject(unsupported());
  }

  stop(): Promise<void> {
    return Promise.reject(unsupported());
  }
}

function unsupported() {
  return new UnsupportedEnvironmentError("OAuth callback listener");
}

/** The real listener where loopback sockets exist, the stand-in elsewhere */
export async function createCallbackListener(
  options: CallbackServerOptions = {}
): Promise<CallbackListener> {
  if (!isNodeRuntime()) {
    return new UnavailableCallbackServer();
  }
  return CallbackServer.create(options);
}

// =============================================================================
// Helpers
// =============================================================================

function listen(server: Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      const address = server.address();
      resolve(typeof address === "object" && address ? address.port : port);
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, LOOPBACK_HOST);
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
