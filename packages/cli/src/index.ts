#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "module";
import { api } from "@/commands/api";
import { login } from "@/commands/auth/login";
import { logout } from "@/commands/auth/logout";
import { refresh } from "@/commands/auth/refresh";
import { status } from "@/commands/auth/status";
import { isStorageBackend, type StorageBackend } from "@/lib/auth/storage";
import { initAppContext } from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";
import { ui } from "@/lib/ui";

const require = createRequire(import.meta.url);
const packageJson = require("../package.json") as { version: string };

const program = new Command();

program
  .name("beacon")
  .description("Command-line client for the Beacon monitoring API")
  .version(packageJson.version)
  .option("-v, --verbose", "Enable verbose/debug output")
  .option("--site <site>", "Beacon site, e.g. eu.beaconhq.com")
  .configureOutput({
    outputError: (str, write) => write(ui.error(str.trim())),
  })
  .hook("preAction", async () => {
    const opts = program.opts<{ verbose?: boolean; site?: string }>();
    if (opts.verbose) {
      log.setVerbose(true);
    }

    await initAppContext({ site: opts.site, version: packageJson.version });
  })
  .showHelpAfterError();

// =============================================================================
// auth - OAuth2 authentication
// =============================================================================

const auth = program
  .command("auth")
  .description("Manage OAuth2 authentication");

auth
  .command("login")
  .description("Authenticate in the browser with OAuth2 (PKCE)")
  .option("--no-browser", "Print the authorization URL instead of opening it")
  .option(
    "--storage <backend>",
    "Credential storage backend (keychain, file)",
    parseStorageBackend
  )
  .option(
    "--timeout <seconds>",
    "Seconds to wait for the browser redirect",
    parsePositiveInt
  )
  .action(
    handle(
      async (options: {
        browser: boolean;
        storage?: StorageBackend;
        timeout?: number;
      }) => {
        let spinner = await log.spinner("Preparing login...");

        const result = await login({
          noBrowser: options.browser === false,
          storage: options.storage,
          timeoutMs:
            options.timeout === undefined ? undefined : options.timeout * 1000,
          onAuthorizationUrl: (url) => {
            spinner.stop();
            log.print("");
            log.print(`${ui.indent()}${ui.muted("URL")}  ${ui.link(url)}`);
            log.print("");
          },
          onBrowserOpen: (opened) => {
            if (opened) {
              log.print(
                ui.hint(`${ui.indent()}Browser opened. Approve access there.`)
              );
            } else {
              log.print(
                ui.hint(`${ui.indent()}Open the URL above in your browser.`)
              );
            }
            log.print("");
          },
          onWaiting: async () => {
            spinner = await log.spinner("Waiting for authorization...");
          },
        });

        if (!result.success) {
          spinner.fail(result.error || "Login failed");
          process.exitCode = 1;
          return;
        }

        spinner.success("Logged in");
        if (result.tokens) {
          log.print(
            ui.keyValue("Expires in", ui.duration(result.tokens.expiresIn))
          );
        }
        if (result.storage) {
          log.print(ui.keyValue("Storage", result.storage));
        }
      }
    )
  );

auth
  .command("logout")
  .description("Remove stored tokens and client registration")
  .action(
    handle(async () => {
      const result = await logout();

      if (!result.hadTokens) {
        log.info(`Already logged out of ${result.site}`);
        return;
      }

      log.success(`Logged out of ${result.site}`);
    })
  );

auth
  .command("status")
  .description("Show the stored OAuth token for the active site")
  .option("--json", "Output as JSON")
  .action(
    handle(async (options: { json?: boolean }) => {
      const result = await status();

      if (options.json) {
        log.print(JSON.stringify(result, null, 2));
        return;
      }

      const indicator =
        result.status === "valid" ? ui.symbols.active : ui.symbols.inactive;
      log.print(ui.keyValue("Site", result.site));
      log.print(ui.keyValue("Status", `${indicator} ${result.status}`));
      if (result.expiresAt) {
        const remaining =
          result.status === "valid" && result.expiresIn !== undefined
            ? ` ${ui.muted(`(in ${ui.duration(result.expiresIn)})`)}`
            : "";
        log.print(ui.keyValue("Expires", `${result.expiresAt}${remaining}`));
      }
      if (result.tokenType) {
        log.print(ui.keyValue("Token type", result.tokenType));
      }
      log.print(ui.keyValue("Refresh", result.hasRefresh ? "yes" : "no"));
      log.print(ui.keyValue("Storage", result.storage));

      if (result.envTokenOverride) {
        log.warn("BEACON_ACCESS_TOKEN is set and takes precedence");
      }
      if (result.status === "missing") {
        log.info(`Run ${ui.command("beacon auth login")} to authenticate.`);
      }
    })
  );

auth
  .command("refresh")
  .description("Refresh the stored access token")
  .action(
    handle(async () => {
      const spinner = await log.spinner("Refreshing token...");
      const result = await refresh();

      if (!result.success) {
        spinner.fail(result.error || "Refresh failed");
        process.exitCode = 1;
        return;
      }

      spinner.success("Token refreshed");
      if (result.tokens) {
        log.print(
          ui.keyValue("Expires in", ui.duration(result.tokens.expiresIn))
        );
      }
    })
  );

// =============================================================================
// api - Raw authenticated request
// =============================================================================

program
  .command("api")
  .description("Send an authenticated request to the Beacon API")
  .argument("<method>", "HTTP method (GET, POST, PUT, PATCH, DELETE)")
  .argument("<path>", "API path, e.g. /api/v1/validate")
  .option("-d, --data <json>", "JSON request body")
  .option(
    "-q, --query <key=value>",
    "Query parameter. Repeatable.",
    (value: string, previous?: string[]) =>
      previous ? [...previous, value] : [value]
  )
  .option("--api-keys", "Use BEACON_API_KEY/BEACON_APP_KEY even when logged in")
  .action(
    handle(
      async (
        method: string,
        path: string,
        options: { data?: string; query?: string[]; apiKeys?: boolean }
      ) => {
        const result = await api({
          method,
          path,
          data: options.data,
          query: options.query,
          useApiKeys: Boolean(options.apiKeys),
        });

        log.debug(`HTTP ${result.status} via ${result.authType}`);
        if (result.data !== null) {
          log.print(
            typeof result.data === "string"
              ? result.data
              : JSON.stringify(result.data, null, 2)
          );
        }
      }
    )
  );

// =============================================================================
// Parse and run
// =============================================================================

program
  .parseAsync(process.argv)
  .then(() => {
    // Explicitly exit so lingering keep-alive sockets never hold the process open
    process.exit(process.exitCode ?? 0);
  })
  .catch((err) => {
    log.error(getErrorMessage(err));
    process.exit(1);
  });

// =============================================================================
// Helpers
// =============================================================================

function handle<TArgs extends unknown[]>(
  fn: (...args: TArgs) => Promise<void>
) {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (err) {
      log.error(getErrorMessage(err));
      process.exitCode = 1;
    }
  };
}

function parseStorageBackend(value: string): StorageBackend {
  const normalized = value.trim().toLowerCase();
  if (!isStorageBackend(normalized)) {
    throw new InvalidArgumentError("Expected keychain or file.");
  }
  return normalized;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
