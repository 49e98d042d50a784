/**
 * CLI UI Design System
 *
 * Minimal output styling:
 * - Status lines prefixed with a single symbol
 * - Labeled key/value blocks for state
 * - Commands and URLs highlighted, everything else plain
 */

import chalk from "chalk";

// =============================================================================
// Theme
// =============================================================================

export const theme = {
  brand: chalk.white.bold,

  // Text hierarchy
  title: chalk.white.bold,
  muted: chalk.gray,
  dim: chalk.dim,

  // Status colors
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  // Code/commands
  command: chalk.cyan,
} as const;

// =============================================================================
// Symbols
// =============================================================================

export const symbols = {
  success: theme.success("✓"),
  error: theme.error("✗"),
  warning: theme.warning("!"),

  bullet: theme.muted("•"),
  arrow: theme.muted("→"),

  active: theme.success("●"),
  inactive: theme.muted("○"),
} as const;

// =============================================================================
// Formatters
// =============================================================================

/** Format a CLI command */
export function command(cmd: string): string {
  return theme.command(cmd);
}

export function muted(text: string): string {
  return theme.muted(text);
}

/** Format a link/URL */
export function link(url: string): string {
  return chalk.underline.cyan(url);
}

/** Format a hint/help text */
export function hint(text: string): string {
  return theme.dim(text);
}

// =============================================================================
// Layout Helpers
// =============================================================================

export function indent(level = 1): string {
  return "  ".repeat(level);
}

/** Pad string to width, ignoring ANSI codes */
export function pad(text: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(text).length);
  return text + " ".repeat(padding);
}

/**
 * Key-value pair for labeled data
 * e.g., "Site         beaconhq.com"
 */
export function keyValue(key: string, value: string, keyWidth = 12): string {
  return `${theme.muted(pad(key, keyWidth))} ${value}`;
}

// =============================================================================
// Status Messages
// =============================================================================

export function success(message: string): string {
  return `${symbols.success} ${message}`;
}

export function error(message: string): string {
  return `${symbols.error} ${theme.error(message)}`;
}

export function warning(message: string): string {
  return `${symbols.warning} ${message}`;
}

// =============================================================================
// Special Formats
// =============================================================================

/**
 * Format a number of seconds as a short duration
 * e.g., 3725 → "1h 2m", 45 → "45s"
 */
export function duration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (hours > 0) return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  if (minutes > 0) return `${minutes}m`;
  return `${seconds}s`;
}

// =============================================================================
// Utility Functions
// =============================================================================

/** Strip ANSI codes for width calculations */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ignore
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

// =============================================================================
// Export
// =============================================================================

export const ui = {
  theme,
  symbols,

  // Formatters
  command,
  muted,
  link,
  hint,

  // Layout
  indent,
  pad,
  keyValue,

  // Status
  success,
  error,
  warning,

  // Special
  duration,

  // Utils
  stripAnsi,
};

export default ui;
