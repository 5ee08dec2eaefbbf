import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";
import pLimit from "p-limit";
import { ledgerCorrupt } from "./errors/catalog.js";
import { parseRecord, type DownloadRecord } from "./download-record.js";
import { deriveFilename as defaultDeriveFilename } from "./filename.js";
import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LedgerOptions {
  /** Directory holding the downloads and the progress file */
  outputDir: string;
  logger: Logger;
  /** Filename for loaded entries that lack one */
  deriveFilename?: (url: string) => string;
}

export interface UpsertOptions {
  /** Write a snapshot after the change */
  persist?: boolean;
}

/**
 * URL → DownloadRecord for one run, shared by every worker.
 * All methods run one at a time; records go in and come out as copies.
 */
export interface Ledger {
  /** Path of the progress file */
  readonly path: string;
  /** Read the progress file. Loads once; later calls return the same state */
  load(): Promise<ReadonlyMap<string, DownloadRecord>>;
  get(url: string): Promise<DownloadRecord | undefined>;
  upsert(record: DownloadRecord, options?: UpsertOptions): Promise<void>;
  /** All records in insertion order */
  entries(): Promise<DownloadRecord[]>;
  /** Drop a record (operator reset). Returns whether it existed */
  remove(url: string, options?: UpsertOptions): Promise<boolean>;
  /** Write the whole map to a temp file and rename it over the progress file */
  snapshot(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const LEDGER_FILENAME = "download_progress.json";

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function copy(record: DownloadRecord): DownloadRecord {
  return { ...record };
}

/**
 * Create the progress ledger for an output directory.
 */
export function createLedger(options: LedgerOptions): Ledger {
  const { outputDir, logger } = options;
  const deriveFilename = options.deriveFilename ?? ((url: string) => defaultDeriveFilename(url));
  const path = join(outputDir, LEDGER_FILENAME);
  const tempPath = `${path}.tmp`;

  const records = new Map<string, DownloadRecord>();
  const exclusive = pLimit(1);
  let loaded = false;

  async function readSnapshot(): Promise<void> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.debug("No progress file yet", { path });
        return;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw ledgerCorrupt(path, (error as Error).message);
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw ledgerCorrupt(path, "expected an object keyed by URL");
    }

    for (const [url, raw] of Object.entries(parsed)) {
      const result = parseRecord(url, raw, deriveFilename);
      if (result.ok) {
        records.set(url, result.record);
      } else {
        logger.warn("Skipping unreadable progress entry", { url, reason: result.reason });
      }
    }

    logger.debug("Progress file loaded", { path, records: records.size });
  }

  async function writeSnapshot(): Promise<void> {
    const body: Record<string, DownloadRecord> = {};
    for (const [url, record] of records) body[url] = record;

    await mkdir(outputDir, { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(body, null, 2)}\n`, "utf-8");
    await rename(tempPath, path);
  }

  async function ensureLoaded(): Promise<void> {
    if (loaded) return;
    await readSnapshot();
    loaded = true;
  }

  return {
    path,

    load: () =>
      exclusive(async () => {
        await ensureLoaded();
        return new Map([...records].map(([url, record]) => [url, copy(record)]));
      }),

    get: (url) =>
      exclusive(async () => {
        await ensureLoaded();
        const record = records.get(url);
        return record ? copy(record) : undefined;
      }),

    upsert: (record, upsertOptions = {}) =>
      exclusive(async () => {
        await ensureLoaded();
        records.set(record.url, copy(record));
        if (upsertOptions.persist) await writeSnapshot();
      }),

    entries: () =>
      exclusive(async () => {
        await ensureLoaded();
        return [...records.values()].map(copy);
      }),

    remove: (url, removeOptions = {}) =>
      exclusive(async () => {
        await ensureLoaded();
        const existed = records.delete(url);
        if (existed && removeOptions.persist) await writeSnapshot();
        return existed;
      }),

    snapshot: () =>
      exclusive(async () => {
        await ensureLoaded();
        await writeSnapshot();
      }),
  };
}
