/**
 * CLI Logging
 *
 * stdout carries results only, so output can be piped. Status, warnings,
 * errors and debug lines go to stderr. Debug lines appear with --verbose or
 * BEACON_DEBUG=1.
 *
 * Access tokens, refresh tokens and API keys never go through here.
 */

import ora from "ora";
import { ui } from "@/lib/ui";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let threshold: LogLevel = process.env.BEACON_DEBUG === "1" ? "debug" : "info";

function enabled(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}

function status(level: LogLevel, line: string) {
  if (enabled(level)) {
    console.error(line);
  }
}

// =============================================================================
// Spinner
// =============================================================================

export type Spinner = {
  stop: () => void;
  success: (message: string) => void;
  fail: (message: string) => void;
};

/**
 * Animated on an interactive stderr; elsewhere (pipes, CI) the messages are
 * printed as plain status lines.
 */
async function spinner(message: string): Promise<Spinner> {
  if (!process.stderr.isTTY || process.env.CI !== undefined) {
    log.info(message);
    return {
      stop: () => undefined,
      success: log.success,
      fail: log.error,
    };
  }

  const s = ora({ text: message, color: "cyan", stream: process.stderr }).start();
  return {
    stop: () => s.stop(),
    success: (msg) => s.succeed(msg),
    fail: (msg) => s.fail(msg),
  };
}

// =============================================================================
// Export
// =============================================================================

export const log = {
  setVerbose(verbose: boolean) {
    threshold = verbose ? "debug" : "info";
  },

  /** Results, to stdout */
  print(message: string) {
    console.log(message);
  },

  debug(message: string) {
    status("debug", ui.theme.dim(`[debug] ${message}`));
  },

  info(message: string) {
    status("info", message);
  },

  success(message: string) {
    status("info", ui.success(message));
  },

  warn(message: string) {
    status("warn", ui.warning(message));
  },

  error(message: string) {
    status("error", ui.error(message));
  },

  spinner,
};
