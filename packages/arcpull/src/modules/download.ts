import { Command } from "commander";
import { access, mkdir } from "fs/promises";
import { constants } from "fs";
import { resolve } from "path";
import { createArchiveValidator } from "../lib/archive-validator.js";
import { emptyAuthBundle, loadAuthBundle } from "../lib/auth-bundle.js";
import { isJsonMode, isQuietMode } from "../lib/cli-context.js";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { invalidOption, outputDirUnwritable } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type DownloadResultJson } from "../lib/json-output.js";
import { createLedger } from "../lib/ledger.js";
import { createLogger, createNoopLogger, type Logger, type LogLevel } from "../lib/logger.js";
import { formatReport, type RunSummary } from "../lib/report.js";
import { createScheduler, type SkippedUrl } from "../lib/scheduler.js";
import { withSpinner } from "../lib/spinner.js";
import { createTransferEngine, type TransferOutcome } from "../lib/transfer.js";
import { readUrlList } from "../lib/url-list.js";
import type { Clock, FetchLike, SignalHandler } from "../lib/ports/index.js";
import { createProcessSignalHandler } from "../lib/adapters/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw commander options; numbers arrive as strings */
export interface DownloadOptions {
  outputDir?: string;
  maxWorkers?: string;
  chunkSize?: string;
  minSize?: string;
  auth?: string;
  config?: string;
}

export interface DownloadDeps {
  fetch?: FetchLike;
  signalHandler?: SignalHandler;
  clock?: Clock;
}

export interface DownloadRunResult {
  outputDir: string;
  ledgerPath: string;
  /** A shutdown signal arrived before every transfer started */
  interrupted: boolean;
  summary: RunSummary;
  outcomes: TransferOutcome[];
  skipped: SkippedUrl[];
  maxAttempts: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parsePositiveInt(value: string | undefined, option: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw invalidOption(option, `expected a positive integer, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < 1) {
    throw invalidOption(option, "must be at least 1");
  }
  return parsed;
}

/** Config overrides carried by the command line */
export function cliOverrides(options: DownloadOptions): Partial<ResolvedConfig> {
  return {
    outputDir: options.outputDir,
    concurrency: parsePositiveInt(options.maxWorkers, "max-workers"),
    chunkSize: parsePositiveInt(options.chunkSize, "chunk-size"),
    minArchiveBytes: parsePositiveInt(options.minSize, "min-size"),
    authBundle: options.auth,
  };
}

async function prepareOutputDir(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
    await access(path, constants.W_OK);
  } catch (error) {
    throw outputDirUnwritable(path, (error as Error).message);
  }
}

function runLogger(config: ResolvedConfig): Logger {
  if (isJsonMode()) return createNoopLogger();
  const level: LogLevel = isQuietMode() && (config.logLevel === "debug" || config.logLevel === "info")
    ? "warn"
    : config.logLevel;
  return createLogger({ level, json: config.logJson });
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

/**
 * Check every input, then download the list. Throws a CLIError for any
 * startup problem; per-URL failures end up in the summary instead.
 */
export async function runDownload(
  urlsFile: string,
  options: DownloadOptions,
  deps: DownloadDeps = {}
): Promise<DownloadRunResult> {
  const { config } = loadConfig(options.config, cliOverrides(options));
  const logger = runLogger(config);
  const outputDir = resolve(config.outputDir);

  const ledger = createLedger({ outputDir, logger });
  const { urls, auth } = await withSpinner(
    "Checking inputs",
    async () => {
      const urls = await readUrlList(urlsFile);
      await prepareOutputDir(outputDir);
      const auth = (await loadAuthBundle(config.authBundle, { required: options.auth !== undefined }))
        ?? emptyAuthBundle();
      await ledger.load();
      return { urls, auth };
    },
    ({ urls }) => `${urls.length} URL${urls.length === 1 ? "" : "s"} from ${urlsFile}`,
    "Startup checks failed"
  );

  if (urls.length === 0) {
    logger.warn("No http(s) URLs in list", { file: urlsFile });
  }
  if (Object.keys(auth.cookies).length === 0 && Object.keys(auth.headers).length === 0) {
    logger.warn("Running without credentials", { authBundle: config.authBundle });
  }

  const validator = createArchiveValidator({ minBytes: config.minArchiveBytes });
  const engine = createTransferEngine({
    outputDir,
    ledger,
    validator,
    logger,
    fetch: deps.fetch,
    clock: deps.clock,
    chunkSize: config.chunkSize,
    persistEveryChunks: config.persistEveryChunks,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const outcomes: TransferOutcome[] = [];
  let skipped: SkippedUrl[] = [];
  const scheduler = createScheduler({
    outputDir,
    ledger,
    engine,
    validator,
    logger,
    auth,
    clock: deps.clock,
    concurrency: config.concurrency,
    maxAttempts: config.maxAttempts,
    onPlan: (plan) => {
      skipped = plan.skipped;
    },
    onOutcome: (outcome) => outcomes.push(outcome),
  });

  let interrupted = false;
  const signals = deps.signalHandler ?? createProcessSignalHandler();
  signals.onShutdown(async () => {
    interrupted = true;
    logger.warn("Stopping; partial files are kept for the next run");
    await scheduler.shutdown();
  });

  let summary: RunSummary;
  try {
    summary = await scheduler.run(urls);
  } finally {
    signals.removeAll();
  }

  return {
    outputDir,
    ledgerPath: ledger.path,
    interrupted,
    summary,
    outcomes,
    skipped,
    maxAttempts: config.maxAttempts,
  };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommands(program: Command, deps: DownloadDeps = {}): void {
  program
    .command("download")
    .description("Download every archive link in a URL list, resuming where the last run stopped")
    .argument("<urls-file>", "Text file with one URL per line")
    .option("-o, --output-dir <dir>", "Directory for archives and the progress file")
    .option("-w, --max-workers <n>", "Concurrent downloads")
    .option("--chunk-size <bytes>", "Bytes written per chunk")
    .option("--min-size <bytes>", "Smallest file accepted as an archive")
    .option("--auth <file>", "Auth bundle with cookies and headers")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action(async (urlsFile: string, options: DownloadOptions) => {
      try {
        const result = await runDownload(urlsFile, options, deps);
        const { summary } = result;

        const json: DownloadResultJson = {
          outputDir: result.outputDir,
          ledgerPath: result.ledgerPath,
          interrupted: result.interrupted,
          summary,
          outcomes: result.outcomes,
          skipped: result.skipped,
        };
        if (!maybeOutputJson(json)) {
          console.log("");
          console.log(formatReport(summary, { maxAttempts: result.maxAttempts }));
        }

        if (summary.counts.failed + summary.counts.expired > 0 || result.interrupted) {
          process.exitCode = 1;
        }
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
