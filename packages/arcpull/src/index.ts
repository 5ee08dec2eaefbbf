import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommands, type DownloadDeps } from "./modules/download.js";
import { registerLedgerCommands, type LedgerCommandDeps } from "./modules/ledger-cmd.js";
import { registerStatusCommands } from "./modules/status.js";

export { createArchiveValidator, DEFAULT_MIN_ARCHIVE_BYTES } from "./lib/archive-validator.js";
export type { ArchiveInspection, ArchiveValidator, ArchiveValidatorOptions } from "./lib/archive-validator.js";
export { createTransferEngine, buildRequestHeaders, TRANSFER_DEFAULTS } from "./lib/transfer.js";
export type { TransferEngine, TransferEngineOptions, TransferOutcome } from "./lib/transfer.js";
export { createLedger, LEDGER_FILENAME } from "./lib/ledger.js";
export type { Ledger, LedgerOptions } from "./lib/ledger.js";
export { createScheduler, SCHEDULER_DEFAULTS } from "./lib/scheduler.js";
export type { RunPlan, Scheduler, SchedulerOptions, SkippedUrl } from "./lib/scheduler.js";
export { summarize, formatReport } from "./lib/report.js";
export type { ProblemEntry, RunSummary } from "./lib/report.js";
export { createRecord, DOWNLOAD_STATUSES } from "./lib/download-record.js";
export type { DownloadRecord, DownloadStatus } from "./lib/download-record.js";
export { loadAuthBundle, parseAuthBundle } from "./lib/auth-bundle.js";
export type { AuthBundle } from "./lib/auth-bundle.js";
export { parseCurlCommand } from "./lib/curl-import.js";
export { deriveFilename } from "./lib/filename.js";
export { parseUrlList, readUrlList } from "./lib/url-list.js";
export { createLogger, createNoopLogger } from "./lib/logger.js";
export type { Logger, LogLevel } from "./lib/logger.js";
export { CLIError, TransferError } from "./lib/errors/types.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageJsonSchema.parse(raw).version;
}

export type ProgramDeps = DownloadDeps & LedgerCommandDeps;

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command()
    .name("arcpull")
    .description("Resumable, concurrent downloader for time-limited archive links")
    .version(readVersion())
    .option("--json", "Print machine-readable JSON")
    .option("-q, --quiet", "Only print warnings, errors and the final report")
    .option("-y, --yes", "Answer yes to confirmation prompts")
    .option("--no-input", "Never prompt; fail instead");

  registerDownloadCommands(program, { fetch: deps.fetch, signalHandler: deps.signalHandler, clock: deps.clock });
  registerStatusCommands(program);
  registerLedgerCommands(program, { prompts: deps.prompts });
  registerAuthCommands(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}
