import { DEFAULT_SITE } from "@beaconhq/core";
import { readFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { getErrorMessage } from "./errors";
import { log } from "./log";

/** Directory for CLI configuration and file-backed credentials */
const CONFIG_DIRNAME = join(".config", "beacon");
const CONFIG_FILENAME = "config.json";

export const ENV = {
  configDir: "BEACON_CONFIG_DIR",
  site: "BEACON_SITE",
  apiKey: "BEACON_API_KEY",
  appKey: "BEACON_APP_KEY",
  accessToken: "BEACON_ACCESS_TOKEN",
  tokenStorage: "BEACON_TOKEN_STORAGE",
} as const;

const fileConfigSchema = z
  .object({
    site: z.string().trim().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    appKey: z.string().min(1).optional(),
  })
  .strict();

/** Contents of config.json */
export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Effective configuration: config.json overlaid with the environment.
 */
export type Config = {
  site: string;
  apiKey?: string;
  appKey?: string;
  /** Pre-issued bearer token; bypasses stored OAuth tokens */
  accessToken?: string;
};

export type Env = Record<string, string | undefined>;

export type LoadConfigOptions = {
  env?: Env;
  /** Site from the command line; wins over everything else */
  site?: string;
};

export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<Config> {
  const env = options.env ?? process.env;
  const fileConfig = await loadFileConfig(env);

  return {
    site:
      nonEmpty(options.site) ??
      nonEmpty(env[ENV.site]) ??
      fileConfig.site ??
      DEFAULT_SITE,
    apiKey: nonEmpty(env[ENV.apiKey]) ?? fileConfig.apiKey,
    appKey: nonEmpty(env[ENV.appKey]) ?? fileConfig.appKey,
    accessToken: nonEmpty(env[ENV.accessToken]),
  };
}

/**
 * Reads config.json. A missing file is an empty config; a malformed one is
 * an error naming the path.
 */
export async function loadFileConfig(
  env: Env = process.env
): Promise<FileConfig> {
  const configPath = getConfigPath(env);
  log.debug(`Loading config from ${configPath}`);

  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      log.debug("Config file not found, using defaults");
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse ${configPath}: ${getErrorMessage(error)}`);
  }

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at "${issue.path.join(".")}"` : "";
    throw new Error(
      `Invalid config in ${configPath}${where}: ${issue?.message ?? "unknown error"}`
    );
  }
  return result.data;
}

export function getConfigPath(env: Env = process.env) {
  return join(getConfigDir(env), CONFIG_FILENAME);
}

export function getConfigDir(env: Env = process.env) {
  const customDir = env[ENV.configDir];
  if (customDir && customDir.trim().length > 0) {
    return customDir;
  }
  return join(homedir(), CONFIG_DIRNAME);
}

/** True when both halves of the API key pair are configured */
export function hasApiKeys(
  config: Config
): config is Config & { apiKey: string; appKey: string } {
  return Boolean(config.apiKey && config.appKey);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

type NodeError = Error & { code?: string };

export function isNodeError(error: unknown): error is NodeError {
  return error instanceof Error && "code" in error;
}
