import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { DownloadError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/dltrack/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "dltrack", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  endpoint: "/tmp/dltrack-backend.sock",
  remote: false,
  waitTimeoutMs: 30000,
  logLevel: "warn",
  logJson: false,
} as const;

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    backend: z
      .object({
        /** Unix socket path or host:port */
        endpoint: z.string().min(1).optional(),
        /** Browser runs on another machine; artifacts are not on local disk */
        remote: z.boolean().optional(),
      })
      .strict()
      .optional(),
    downloads: z
      .object({
        /** 0 waits forever */
        waitTimeoutMs: z.number().int().min(0).max(3_600_000).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  endpoint: string;
  remote: boolean;
  waitTimeoutMs: number;
  logLevel: z.infer<typeof LogLevelSchema>;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist; throws CONFIG_INVALID otherwise.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${errorMessage(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  return result.data;
}

function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.backend?.endpoint !== undefined) {
    target.endpoint = source.backend.endpoint;
  }
  if (source.backend?.remote !== undefined) {
    target.remote = source.backend.remote;
  }
  if (source.downloads?.waitTimeoutMs !== undefined) {
    target.waitTimeoutMs = source.downloads.waitTimeoutMs;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Read DLTRACK_* overrides. Unknown or malformed values are rejected.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {};

  if (env.DLTRACK_ENDPOINT) {
    overrides.endpoint = env.DLTRACK_ENDPOINT;
  }
  if (env.DLTRACK_REMOTE !== undefined && env.DLTRACK_REMOTE !== "") {
    overrides.remote = env.DLTRACK_REMOTE === "1" || env.DLTRACK_REMOTE === "true";
  }
  if (env.DLTRACK_LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.DLTRACK_LOG_LEVEL);
    if (!level.success) {
      throw new DownloadError(
        "CONFIG_INVALID",
        `DLTRACK_LOG_LEVEL must be one of ${LogLevelSchema.options.join(", ")}`
      );
    }
    overrides.logLevel = level.data;
  }

  return overrides;
}

function filterUndefined(obj: Partial<ResolvedConfig>): Partial<ResolvedConfig> {
  const result: Partial<ResolvedConfig> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Merge configuration sources with precedence:
 * CLI args > environment > user config > system config > defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envOptions: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    endpoint: CONFIG_DEFAULTS.endpoint,
    remote: CONFIG_DEFAULTS.remote,
    waitTimeoutMs: CONFIG_DEFAULTS.waitTimeoutMs,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }
  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(envOptions));
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - config file given with --config; replaces the system and user files
 */
export function loadConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): { config: ResolvedConfig; sources: string[] } {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw invalidConfig(explicitPath, ["file does not exist"]);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, configFromEnv(env));

  return { config, sources };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
