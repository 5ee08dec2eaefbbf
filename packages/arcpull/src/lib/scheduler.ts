import { join } from "path";
import type { ArchiveValidator } from "./archive-validator.js";
import type { AuthBundle } from "./auth-bundle.js";
import { createRecord, type DownloadRecord, type DownloadStatus } from "./download-record.js";
import { deriveFilename as defaultDeriveFilename, disambiguateFilename } from "./filename.js";
import type { Ledger } from "./ledger.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";
import { createWorkerPool, type WorkerPool } from "./queue.js";
import { summarize, type RunSummary } from "./report.js";
import type { TransferEngine, TransferOutcome } from "./transfer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SchedulerOptions {
  outputDir: string;
  ledger: Ledger;
  engine: TransferEngine;
  validator: ArchiveValidator;
  logger: Logger;
  auth: AuthBundle;
  /** Worker slots when `run` is not given a count */
  concurrency?: number;
  /** Failed URLs stop being retried after this many attempts */
  maxAttempts?: number;
  clock?: Clock;
  /** Filename for URLs seen for the first time */
  deriveFilename?: (url: string) => string;
  /** Called once `run` has planned, before any transfer starts */
  onPlan?: (plan: RunPlan) => void;
  /** Called as each transfer finishes */
  onOutcome?: (outcome: TransferOutcome) => void;
}

export interface SkippedUrl {
  url: string;
  status: DownloadStatus;
  reason: string;
}

export interface RunPlan {
  /** URLs to dispatch, in list order */
  pending: string[];
  /** URLs left alone this run */
  skipped: SkippedUrl[];
  /** `downloading` records found complete on disk */
  promoted: string[];
}

export interface Scheduler {
  /** Work out what this run will download. Creates records for new URLs */
  plan(urls: readonly string[]): Promise<RunPlan>;
  /** Download every pending URL through the worker pool */
  run(urls: readonly string[], concurrency?: number): Promise<RunSummary>;
  /** Start no more transfers and snapshot the ledger */
  shutdown(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SCHEDULER_DEFAULTS = {
  concurrency: 4,
  maxAttempts: 3,
} as const;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the scheduler that turns a URL list into transfers. Every URL it
 * dispatches ends in a definite outcome; a fault in one never stops the
 * others.
 */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const { outputDir, ledger, engine, validator, logger, auth, onPlan, onOutcome } = options;
  const defaultConcurrency = options.concurrency ?? SCHEDULER_DEFAULTS.concurrency;
  const maxAttempts = options.maxAttempts ?? SCHEDULER_DEFAULTS.maxAttempts;
  const clock = options.clock ?? systemClock;
  const deriveFilename = options.deriveFilename ?? ((url: string) => defaultDeriveFilename(url, clock.newDate()));

  let pool: WorkerPool<TransferOutcome> | undefined;
  let stopping = false;

  /**
   * Decide whether an existing record needs a transfer. May promote a
   * `downloading` record whose file turned out complete.
   */
  async function classify(record: DownloadRecord): Promise<"pending" | "promoted" | SkippedUrl> {
    const path = join(outputDir, record.filename);
    const skip = (reason: string): SkippedUrl => ({ url: record.url, status: record.status, reason });

    switch (record.status) {
      case "pending":
        return "pending";

      case "expired":
        return skip("link expired");

      case "failed":
        return record.retryCount < maxAttempts
          ? "pending"
          : skip(`attempt limit reached (${record.retryCount}/${maxAttempts})`);

      case "completed":
        return (await validator.isValid(path)) ? skip("already complete") : "pending";

      case "downloading": {
        const inspection = await validator.inspect(path);
        if (inspection.valid && record.totalBytes > 0 && inspection.sizeBytes === record.totalBytes) {
          await ledger.upsert(
            {
              ...record,
              status: "completed",
              bytesDownloaded: record.totalBytes,
              completedAt: clock.newDate().toISOString(),
            },
            { persist: false }
          );
          return "promoted";
        }
        return "pending";
      }
    }
  }

  async function plan(urls: readonly string[]): Promise<RunPlan> {
    const existing = await ledger.load();
    const result: RunPlan = { pending: [], skipped: [], promoted: [] };

    const owners = new Map<string, string>();
    for (const record of existing.values()) owners.set(record.filename, record.url);

    for (const url of new Set(urls)) {
      const record = existing.get(url);

      if (!record) {
        let filename = deriveFilename(url);
        const owner = owners.get(filename);
        if (owner !== undefined && owner !== url) {
          const taken = filename;
          filename = disambiguateFilename(filename, url);
          logger.warn("Filename already used by another URL", { url, taken, filename });
        }
        owners.set(filename, url);
        await ledger.upsert(createRecord(url, filename));
        result.pending.push(url);
        continue;
      }

      const decision = await classify(record);
      if (decision === "pending") {
        result.pending.push(url);
      } else if (decision === "promoted") {
        logger.info("Found finished download on disk", { url, filename: record.filename });
        result.promoted.push(url);
      } else {
        logger.debug("Skipping", { url, status: decision.status, reason: decision.reason });
        result.skipped.push(decision);
      }
    }

    await ledger.snapshot();
    return result;
  }

  async function runOne(url: string): Promise<TransferOutcome> {
    const record = await ledger.get(url);
    if (!record) {
      return { url, filename: "", status: "failed", bytesDownloaded: 0, errorMessage: "No progress record" };
    }
    return engine.download(record, auth);
  }

  async function run(urls: readonly string[], concurrency = defaultConcurrency): Promise<RunSummary> {
    stopping = false;
    const planned = await plan(urls);
    onPlan?.(planned);

    logger.info("Starting downloads", {
      pending: planned.pending.length,
      skipped: planned.skipped.length,
      promoted: planned.promoted.length,
      concurrency,
    });

    const workers = createWorkerPool<TransferOutcome>({
      concurrency,
      logger,
      onResult: (_url, outcome) => onOutcome?.(outcome),
    });
    pool = workers;
    // A signal may arrive while planning
    if (stopping) workers.stop();

    for (const url of planned.pending) {
      workers.submit({
        key: url,
        run: async () => {
          try {
            return await runOne(url);
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error("Transfer task crashed", { url, error: message });
            return { url, filename: "", status: "failed", bytesDownloaded: 0, errorMessage: message };
          }
        },
      });
    }

    try {
      await workers.drain();
    } finally {
      pool = undefined;
    }

    await ledger.snapshot();
    if (stopping) {
      logger.warn("Run interrupted", { notStarted: workers.stats().waiting });
    }
    return summarize(await ledger.entries());
  }

  async function shutdown(): Promise<void> {
    stopping = true;
    pool?.stop();
    await ledger.snapshot();
    logger.info("Progress saved", { path: ledger.path });
  }

  return { plan, run, shutdown };
}
