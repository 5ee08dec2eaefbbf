import { open, stat, truncate } from "fs/promises";
import { join } from "path";
import type { ArchiveValidator } from "./archive-validator.js";
import { serializeCookies, type AuthBundle } from "./auth-bundle.js";
import type { DownloadRecord, TransferStatus } from "./download-record.js";
import {
  idleTimeout,
  missingBody,
  notAnArchive,
  rangeMismatch,
  rangeNotSatisfiable,
  toTransferError,
  unexpectedStatus,
} from "./errors/catalog.js";
import type { Ledger } from "./ledger.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { FetchLike } from "./ports/http.js";
import { systemClock } from "./adapters/system-clock.js";
import { globalFetch } from "./adapters/global-fetch.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TransferEngineOptions {
  outputDir: string;
  ledger: Ledger;
  validator: ArchiveValidator;
  logger: Logger;
  fetch?: FetchLike;
  clock?: Clock;
  /** Bytes written per chunk */
  chunkSize?: number;
  /** Snapshot the ledger every N chunks */
  persistEveryChunks?: number;
  /** Abort when no bytes arrive for this long */
  requestTimeoutMs?: number;
}

export interface TransferOutcome {
  url: string;
  filename: string;
  status: TransferStatus;
  bytesDownloaded: number;
  errorMessage?: string;
}

export interface TransferEngine {
  /** Bring one URL to a terminal state. Never throws. */
  download(record: DownloadRecord, auth: AuthBundle): Promise<TransferOutcome>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const TRANSFER_DEFAULTS = {
  chunkSize: 8192,
  persistEveryChunks: 100,
  requestTimeoutMs: 30_000,
} as const;

/** Headers the engine owns; caller values for these are dropped */
const ENGINE_HEADERS = new Set(["range", "cookie", "accept-encoding"]);

const CONTENT_RANGE = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Build request headers: custom headers, the cookie map as one `Cookie`
 * header, identity encoding so offsets address stored bytes, and a Range
 * when resuming.
 */
export function buildRequestHeaders(auth: AuthBundle, offset: number): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(auth.headers)) {
    if (!ENGINE_HEADERS.has(name.toLowerCase())) headers[name] = value;
  }

  const cookie = serializeCookies(auth.cookies);
  if (cookie) headers["Cookie"] = cookie;
  headers["Accept-Encoding"] = "identity";
  if (offset > 0) headers["Range"] = `bytes=${offset}-`;

  return headers;
}

export interface ContentRange {
  start: number;
  end: number;
  /** Undefined when the server sent `*` */
  total?: number;
}

export function parseContentRange(value: string | null): ContentRange | undefined {
  if (!value) return undefined;
  const match = CONTENT_RANGE.exec(value.trim());
  if (!match) return undefined;
  return {
    start: Number(match[1]),
    end: Number(match[2]),
    total: match[3] === "*" ? undefined : Number(match[3]),
  };
}

async function sizeOnDisk(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return 0;
    throw error;
  }
}

/**
 * Re-slice a byte stream into pieces of exactly `size` bytes (the last
 * one may be shorter). `onData` fires whenever the network delivers bytes.
 */
async function* readChunks(
  body: ReadableStream<Uint8Array>,
  size: number,
  onData: () => void
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let buffered: Uint8Array[] = [];
  let bufferedBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      onData();
      buffered.push(value);
      bufferedBytes += value.length;

      if (bufferedBytes >= size) {
        let joined = Buffer.concat(buffered);
        while (joined.length >= size) {
          yield joined.subarray(0, size);
          joined = joined.subarray(size);
        }
        buffered = joined.length > 0 ? [joined] : [];
        bufferedBytes = joined.length;
      }
    }

    if (bufferedBytes > 0) {
      yield Buffer.concat(buffered);
    }
  } finally {
    reader.releaseLock();
  }
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the engine that downloads one URL with byte-range resume.
 * The record is updated through the ledger at every step, so an
 * interrupted process resumes from the last recorded state.
 */
export function createTransferEngine(options: TransferEngineOptions): TransferEngine {
  const { outputDir, ledger, validator, logger } = options;
  const fetchImpl = options.fetch ?? globalFetch;
  const clock = options.clock ?? systemClock;
  const chunkSize = options.chunkSize ?? TRANSFER_DEFAULTS.chunkSize;
  const persistEveryChunks = options.persistEveryChunks ?? TRANSFER_DEFAULTS.persistEveryChunks;
  const requestTimeoutMs = options.requestTimeoutMs ?? TRANSFER_DEFAULTS.requestTimeoutMs;

  function outcomeOf(record: DownloadRecord, status: TransferStatus): TransferOutcome {
    return {
      url: record.url,
      filename: record.filename,
      status,
      bytesDownloaded: record.bytesDownloaded,
      ...(record.errorMessage !== undefined && { errorMessage: record.errorMessage }),
    };
  }

  async function complete(record: DownloadRecord, log: Logger): Promise<TransferOutcome> {
    record.status = "completed";
    record.completedAt = clock.newDate().toISOString();
    delete record.errorMessage;
    await ledger.upsert(record, { persist: true });
    log.info("Download complete", { bytes: record.bytesDownloaded });
    return outcomeOf(record, "completed");
  }

  async function expire(record: DownloadRecord, status: number, log: Logger): Promise<TransferOutcome> {
    record.status = "expired";
    record.errorMessage = `Link expired (HTTP ${status})`;
    await ledger.upsert(record, { persist: true });
    log.warn("Link expired", { status });
    return outcomeOf(record, "expired");
  }

  async function fail(record: DownloadRecord, error: unknown, log: Logger): Promise<TransferOutcome> {
    const transferError = toTransferError(error);
    record.status = "failed";
    record.retryCount += 1;
    record.errorMessage = transferError.message;
    log.error("Download failed", {
      code: transferError.code,
      error: transferError.message,
      retryCount: record.retryCount,
    });

    try {
      await ledger.upsert(record, { persist: true });
    } catch (persistError) {
      log.error("Could not record failure", {
        error: persistError instanceof Error ? persistError.message : String(persistError),
      });
    }
    return outcomeOf(record, "failed");
  }

  async function transfer(
    record: DownloadRecord,
    path: string,
    auth: AuthBundle,
    log: Logger
  ): Promise<TransferOutcome> {
    let offset = await sizeOnDisk(path);

    // A full-length file left by a failed attempt cannot be resumed
    if (offset > 0 && record.totalBytes > 0 && offset >= record.totalBytes) {
      if (await validator.isValid(path)) {
        record.bytesDownloaded = offset;
        record.totalBytes = offset;
        return complete(record, log);
      }
      log.warn("Discarding full-length file that is not an archive", { offset });
      offset = 0;
    }

    record.status = "downloading";
    record.startedAt = clock.newDate().toISOString();
    record.bytesDownloaded = offset;
    delete record.errorMessage;
    delete record.completedAt;
    await ledger.upsert(record, { persist: true });

    const controller = new AbortController();
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      if (idleTimer) clearTimeout(idleTimer);
      idleTimer = setTimeout(() => controller.abort(idleTimeout(requestTimeoutMs)), requestTimeoutMs);
    };

    try {
      log.info(offset > 0 ? "Resuming download" : "Starting download", { offset });
      armIdleTimer();
      const response = await fetchImpl(record.url, {
        method: "GET",
        headers: buildRequestHeaders(auth, offset),
        redirect: "follow",
        signal: controller.signal,
      });

      if (response.status === 403 || response.status === 404) {
        return await expire(record, response.status, log);
      }

      if (response.status === 416 && offset > 0) {
        if (await validator.isValid(path)) {
          log.info("Server reports nothing left to send; file is complete", { offset });
          record.totalBytes = offset;
          return await complete(record, log);
        }
        await truncate(path, 0);
        record.bytesDownloaded = 0;
        throw rangeNotSatisfiable(offset);
      }

      if (response.status !== 200 && response.status !== 206) {
        throw unexpectedStatus(response.status, response.statusText);
      }

      let append = false;
      if (response.status === 206) {
        const header = response.headers.get("content-range");
        const range = parseContentRange(header);
        if (!range || range.start !== offset) {
          throw rangeMismatch(offset, header);
        }
        append = offset > 0;
        if (record.totalBytes === 0 && range.total !== undefined) {
          record.totalBytes = range.total;
        }
      } else {
        const length = Number(response.headers.get("content-length"));
        if (Number.isFinite(length) && length > 0) record.totalBytes = length;
        if (offset > 0) {
          // The full body that follows is a new attempt
          log.warn("Server ignored the range request; restarting from zero", { offset });
          record.startedAt = clock.newDate().toISOString();
          record.bytesDownloaded = 0;
          await ledger.upsert(record, { persist: true });
        }
      }

      if (!response.body) {
        throw missingBody();
      }

      const handle = await open(path, append ? "a" : "w");
      let chunks = 0;
      try {
        for await (const chunk of readChunks(response.body, chunkSize, armIdleTimer)) {
          await handle.write(chunk);
          record.bytesDownloaded += chunk.length;
          chunks++;
          await ledger.upsert(record, { persist: chunks % persistEveryChunks === 0 });
        }
      } finally {
        await handle.close();
      }
    } finally {
      if (idleTimer) clearTimeout(idleTimer);
      controller.abort();
    }

    record.totalBytes = record.bytesDownloaded;
    await ledger.upsert(record, { persist: true });

    const inspection = await validator.inspect(path);
    if (!inspection.valid) {
      log.warn("Downloaded file is not an archive", { reason: inspection.reason });
      throw notAnArchive();
    }

    return complete(record, log);
  }

  return {
    async download(input, auth) {
      const record: DownloadRecord = { ...input };
      const path = join(outputDir, record.filename);
      const log = logger.child({ url: record.url, filename: record.filename });

      try {
        if (record.status === "completed") {
          if (await validator.isValid(path)) {
            log.debug("Already complete");
            return outcomeOf(record, "completed");
          }
          log.warn("Completed file is missing or invalid; downloading again");
          record.status = "pending";
          delete record.completedAt;
          await ledger.upsert(record, { persist: true });
        }

        return await transfer(record, path, auth, log);
      } catch (error) {
        return fail(record, error, log);
      }
    },
  };
}
