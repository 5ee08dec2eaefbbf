import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { formatError } from "../lib/errors/renderer.js";
import { isCLIError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# arcpull configuration
# Place at ~/.config/arcpull/config.yaml (user) or /etc/arcpull/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/arcpull/config.yaml) or --config <path>
# 3. System config (/etc/arcpull/config.yaml)
# 4. Built-in defaults

download:
  # Where archives and download_progress.json are written (--output-dir)
  outputDir: ./downloads

  # Concurrent transfers, 1-32 (--max-workers)
  concurrency: 4

  # Bytes written per chunk (--chunk-size)
  chunkSize: 8192

  # Files smaller than this are never accepted as archives (--min-size)
  minArchiveBytes: 50000

  # Failed URLs are retried on later runs until this many attempts (1-10)
  maxAttempts: 3

  # Save progress every N chunks
  persistEveryChunks: 100

  # Abort a transfer when no data arrives for this long (ms)
  requestTimeoutMs: 30000

auth:
  # Cookies and headers sent with every request (--auth)
  # Create one with: arcpull auth import-curl request.txt
  bundle: ./headers.json

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs (one object per line)
  json: false
`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const LOCATIONS = [
  { label: "User config", path: USER_CONFIG_PATH },
  { label: "System config", path: SYSTEM_CONFIG_PATH },
] as const;

function settingLine(key: string, value: string | number | boolean): string {
  return `  ${`${key}:`.padEnd(20)}${value}`;
}

function settingSections(config: ResolvedConfig): Array<[string, Array<[string, string | number | boolean]>]> {
  return [
    [
      "Download",
      [
        ["outputDir", config.outputDir],
        ["concurrency", config.concurrency],
        ["chunkSize", config.chunkSize],
        ["minArchiveBytes", config.minArchiveBytes],
        ["maxAttempts", config.maxAttempts],
        ["persistEveryChunks", config.persistEveryChunks],
        ["requestTimeoutMs", config.requestTimeoutMs],
      ],
    ],
    ["Auth", [["bundle", config.authBundle]]],
    [
      "Logging",
      [
        ["level", config.logLevel],
        ["json", config.logJson],
      ],
    ],
  ];
}

/** Check one file; prints the outcome and returns whether it is valid */
function checkConfigFile(path: string): boolean {
  console.log(chalk.cyan(`Checking ${path}...`));
  try {
    loadConfigFile(path);
    console.log(chalk.green("  ✓ Valid"));
    return true;
  } catch (error) {
    if (isCLIError(error)) {
      for (const line of formatError(error)) console.error(line);
    } else {
      console.error(chalk.red(`  ✗ Invalid: ${(error as Error).message}`));
    }
    return false;
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage arcpull configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Edit it, or delete it to start over."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${(error as Error).message}`));
        if (options.global) console.error(chalk.gray("System config may require sudo."));
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      if (options.config) {
        if (!existsSync(options.config)) {
          console.error(chalk.red(`File not found: ${options.config}`));
          process.exitCode = 1;
        } else if (!checkConfigFile(options.config)) {
          process.exitCode = 1;
        }
        return;
      }

      const present = [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH].filter((path) => existsSync(path));
      if (present.length === 0) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'arcpull config init' to create one."));
        return;
      }

      const results = present.map(checkConfigFile);
      if (results.every(Boolean)) {
        console.log(chalk.green("\nAll configuration files are valid."));
      } else {
        process.exitCode = 1;
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      let loaded: ReturnType<typeof loadConfig>;
      try {
        loaded = loadConfig(options.config);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${(error as Error).message}`));
        process.exitCode = 1;
        return;
      }

      const { sources } = loaded;
      console.log(chalk.cyan("Effective Configuration:"));
      console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));

      for (const [title, settings] of settingSections(loaded.config)) {
        console.log();
        console.log(chalk.bold(`${title}:`));
        for (const [key, value] of settings) console.log(settingLine(key, value));
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      for (const { label, path } of LOCATIONS) {
        console.log();
        console.log(chalk.bold(`${label}:`));
        console.log(`  ${path}`);
        console.log(`  ${existsSync(path) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      }
    });
}
