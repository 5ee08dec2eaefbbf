import { Command } from "commander";
import { unlink } from "fs/promises";
import { join, resolve } from "path";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { createArchiveValidator, type ArchiveValidator } from "../lib/archive-validator.js";
import { isNonInteractive, shouldAutoConfirm } from "../lib/cli-context.js";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { DOWNLOAD_STATUSES, type DownloadRecord, type DownloadStatus } from "../lib/download-record.js";
import { confirmationRequired, invalidOption, missingArgument } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type LedgerResetJson } from "../lib/json-output.js";
import { createLedger, type Ledger } from "../lib/ledger.js";
import { createNoopLogger } from "../lib/logger.js";
import { formatBytes } from "../lib/report.js";
import type { PromptService } from "../lib/ports/index.js";
import { interactivePrompts } from "../lib/adapters/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface LedgerLocationOptions {
  outputDir?: string;
  config?: string;
}

interface ResetOptions extends LedgerLocationOptions {
  failed?: boolean;
  forget?: boolean;
}

interface ListOptions extends LedgerLocationOptions {
  status?: string;
}

export interface LedgerCommandDeps {
  prompts?: PromptService;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface OpenedLedger {
  ledger: Ledger;
  outputDir: string;
  config: ResolvedConfig;
}

function openLedger(options: LedgerLocationOptions): OpenedLedger {
  const { config } = loadConfig(options.config, { outputDir: options.outputDir });
  const outputDir = resolve(config.outputDir);
  return { ledger: createLedger({ outputDir, logger: createNoopLogger() }), outputDir, config };
}

/**
 * Delete what a forgotten entry left on disk unless it is a finished
 * archive. A fresh record would otherwise resume from the leftover bytes.
 */
async function discardLeftover(path: string, validator: ArchiveValidator): Promise<boolean> {
  if (await validator.isValid(path)) return false;
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    throw error;
  }
}

function isStatus(value: string): value is DownloadStatus {
  return DOWNLOAD_STATUSES.some((status) => status === value);
}

/** The record a reset leaves behind: eligible again, retry count cleared */
export function resetRecord(record: DownloadRecord): DownloadRecord {
  const next: DownloadRecord = { ...record, status: "pending", retryCount: 0 };
  delete next.errorMessage;
  delete next.completedAt;
  return next;
}

/**
 * Ask before changing the ledger. --yes skips the question; without a
 * terminal and without --yes the change is refused.
 */
async function confirm(prompts: PromptService, message: string, action: string): Promise<boolean> {
  if (shouldAutoConfirm()) return true;
  if (isNonInteractive()) throw confirmationRequired(action);
  return prompts.confirm(message, false);
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export async function resetEntries(
  urls: string[],
  options: ResetOptions,
  prompts: PromptService
): Promise<LedgerResetJson | undefined> {
  if (urls.length === 0 && !options.failed) {
    throw missingArgument("URLs or --failed", "ledger reset", "arcpull ledger reset --failed");
  }

  const { ledger, outputDir, config } = openLedger(options);
  const records = await ledger.entries();
  const byUrl = new Map(records.map((r) => [r.url, r]));

  const targets = new Set<string>(urls.filter((url) => byUrl.has(url)));
  if (options.failed) {
    for (const record of records) {
      if (record.status === "failed") targets.add(record.url);
    }
  }
  const notFound = urls.filter((url) => !byUrl.has(url));

  if (targets.size === 0) {
    return { reset: [], removed: [], notFound, discarded: [] };
  }

  const verb = options.forget ? "forget" : "reset";
  const noun = `${targets.size} entr${targets.size === 1 ? "y" : "ies"}`;
  const confirmed = await confirm(prompts, `${verb === "forget" ? "Forget" : "Reset"} ${noun}?`, `${verb} ${noun}`);
  if (!confirmed) return undefined;

  const validator = createArchiveValidator({ minBytes: config.minArchiveBytes });
  const result: LedgerResetJson = { reset: [], removed: [], notFound, discarded: [] };
  for (const url of targets) {
    const record = byUrl.get(url);
    if (!record) continue;
    if (options.forget) {
      await ledger.remove(url);
      result.removed.push(url);
      if (await discardLeftover(join(outputDir, record.filename), validator)) {
        result.discarded.push(record.filename);
      }
    } else {
      await ledger.upsert(resetRecord(record));
      result.reset.push(url);
    }
  }
  await ledger.snapshot();
  return result;
}

export async function listEntries(options: ListOptions): Promise<DownloadRecord[]> {
  if (options.status !== undefined && !isStatus(options.status)) {
    throw invalidOption("status", `expected one of ${DOWNLOAD_STATUSES.join(", ")}`);
  }
  const wanted = options.status;
  const records = await openLedger(options).ledger.entries();
  return wanted === undefined ? records : records.filter((r) => r.status === wanted);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerLedgerCommands(program: Command, deps: LedgerCommandDeps = {}): void {
  const prompts = deps.prompts ?? interactivePrompts;

  const ledger = program
    .command("ledger")
    .description("Inspect and edit the progress file");

  ledger
    .command("list")
    .description("List progress entries")
    .option("-s, --status <status>", "Only entries with this status")
    .option("-o, --output-dir <dir>", "Directory holding the progress file")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action(async (options: ListOptions) => {
      try {
        const records = await listEntries(options);
        if (maybeOutputJson(records)) return;

        if (records.length === 0) {
          console.log(chalk.gray("No entries."));
          return;
        }

        const table = new CliTable3({
          head: [chalk.cyan("File"), chalk.cyan("Status"), chalk.cyan("Size"), chalk.cyan("Attempts")],
        });
        for (const record of records) {
          const size = record.totalBytes > 0
            ? `${formatBytes(record.bytesDownloaded)} / ${formatBytes(record.totalBytes)}`
            : formatBytes(record.bytesDownloaded);
          table.push([record.filename, record.status, size, String(record.retryCount)]);
        }
        console.log(table.toString());
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  ledger
    .command("reset")
    .description("Make entries eligible for download again")
    .argument("[urls...]", "URLs to reset")
    .option("--failed", "Reset every failed entry")
    .option("--forget", "Remove the entries instead of resetting them")
    .option("-o, --output-dir <dir>", "Directory holding the progress file")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action(async (urls: string[], options: ResetOptions) => {
      try {
        const result = await resetEntries(urls, options, prompts);
        if (!result) {
          console.log(chalk.gray("Cancelled."));
          return;
        }
        if (maybeOutputJson(result)) return;

        for (const url of result.notFound) {
          console.error(chalk.yellow(`Not in progress file: ${url}`));
        }
        for (const filename of result.discarded) {
          console.log(chalk.gray(`Deleted leftover file ${filename}`));
        }
        const changed = result.reset.length + result.removed.length;
        if (changed === 0) {
          console.log(chalk.gray("Nothing to reset."));
        } else if (result.removed.length > 0) {
          console.log(chalk.green(`✓ Forgot ${result.removed.length} entr${result.removed.length === 1 ? "y" : "ies"}`));
        } else {
          console.log(chalk.green(`✓ Reset ${result.reset.length} entr${result.reset.length === 1 ? "y" : "ies"}`));
        }
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
