import { Command } from "commander";
import { existsSync } from "fs";
import { resolve } from "path";
import chalk from "chalk";
import { loadConfig } from "../lib/config.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type StatusJson } from "../lib/json-output.js";
import { createLedger } from "../lib/ledger.js";
import { createNoopLogger } from "../lib/logger.js";
import { formatReport, summarize } from "../lib/report.js";

interface StatusOptions {
  outputDir?: string;
  config?: string;
}

/**
 * Report on a download directory from its progress file alone. No network.
 */
export async function showStatus(options: StatusOptions): Promise<void> {
  const { config } = loadConfig(options.config, { outputDir: options.outputDir });
  const ledger = createLedger({ outputDir: resolve(config.outputDir), logger: createNoopLogger() });
  const exists = existsSync(ledger.path);
  const summary = summarize(await ledger.entries());

  const json: StatusJson = { ledgerPath: ledger.path, exists, summary };
  if (maybeOutputJson(json)) return;

  if (!exists) {
    console.log(chalk.yellow(`No progress file at ${ledger.path}`));
    console.log(chalk.gray("Run 'arcpull download <urls-file>' to start."));
    return;
  }

  console.log(chalk.gray(`Progress file: ${ledger.path}`));
  console.log(formatReport(summary, { maxAttempts: config.maxAttempts }));
}

export function registerStatusCommands(program: Command): void {
  program
    .command("status")
    .description("Summarize a download directory from its progress file")
    .option("-o, --output-dir <dir>", "Directory holding the progress file")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action(async (options: StatusOptions) => {
      try {
        await showStatus(options);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
