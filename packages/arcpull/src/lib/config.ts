import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/arcpull/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "arcpull",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  outputDir: "./downloads",
  concurrency: 4,
  chunkSize: 8192,
  minArchiveBytes: 50_000,
  maxAttempts: 3,
  persistEveryChunks: 100,
  requestTimeoutMs: 30_000,
  authBundle: "./headers.json",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Schema for transfer tuning */
const DownloadSchema = z.object({
  outputDir: z.string().min(1).optional(),
  concurrency: z.number().int().min(1).max(32).optional(),
  chunkSize: z.number().int().min(1024).max(16 * 1024 * 1024).optional(),
  minArchiveBytes: z.number().int().min(0).optional(),
  maxAttempts: z.number().int().min(1).max(10).optional(),
  persistEveryChunks: z.number().int().min(1).max(100_000).optional(),
  requestTimeoutMs: z.number().int().min(1000).max(600_000).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  download: DownloadSchema.optional(),
  auth: z
    .object({
      bundle: z.string().min(1).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  outputDir: string;
  concurrency: number;
  chunkSize: number;
  minArchiveBytes: number;
  maxAttempts: number;
  persistEveryChunks: number;
  requestTimeoutMs: number;
  authBundle: string;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a CLIError listing each issue if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${(err as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${(err as Error).message}`]);
  }

  // Handle empty files
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

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const download = source.download ?? {};
  if (download.outputDir !== undefined) target.outputDir = download.outputDir;
  if (download.concurrency !== undefined) target.concurrency = download.concurrency;
  if (download.chunkSize !== undefined) target.chunkSize = download.chunkSize;
  if (download.minArchiveBytes !== undefined) {
    target.minArchiveBytes = download.minArchiveBytes;
  }
  if (download.maxAttempts !== undefined) target.maxAttempts = download.maxAttempts;
  if (download.persistEveryChunks !== undefined) {
    target.persistEveryChunks = download.persistEveryChunks;
  }
  if (download.requestTimeoutMs !== undefined) {
    target.requestTimeoutMs = download.requestTimeoutMs;
  }
  if (source.auth?.bundle !== undefined) {
    target.authBundle = source.auth.bundle;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  // Start with defaults
  const config: ResolvedConfig = {
    ...CONFIG_DEFAULTS,
    logLevel: "info",
    logJson: false,
  };

  // Apply system config (lowest precedence after defaults)
  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  // Apply user config (higher precedence)
  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  // Apply CLI options (highest precedence); undefined means "not given"
  return {
    outputDir: cliOptions.outputDir ?? config.outputDir,
    concurrency: cliOptions.concurrency ?? config.concurrency,
    chunkSize: cliOptions.chunkSize ?? config.chunkSize,
    minArchiveBytes: cliOptions.minArchiveBytes ?? config.minArchiveBytes,
    maxAttempts: cliOptions.maxAttempts ?? config.maxAttempts,
    persistEveryChunks: cliOptions.persistEveryChunks ?? config.persistEveryChunks,
    requestTimeoutMs: cliOptions.requestTimeoutMs ?? config.requestTimeoutMs,
    authBundle: cliOptions.authBundle ?? config.authBundle,
    logLevel: cliOptions.logLevel ?? config.logLevel,
    logJson: cliOptions.logJson ?? config.logJson,
  };
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    // Normal precedence: system, then user
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
