import { z } from "zod";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DOWNLOAD_STATUSES = [
  "pending",
  "downloading",
  "completed",
  "failed",
  "expired",
] as const;

export type DownloadStatus = (typeof DOWNLOAD_STATUSES)[number];

/** Ledger entry for one target URL. Field names are the on-disk format. */
export interface DownloadRecord {
  url: string;
  filename: string;
  status: DownloadStatus;
  bytesDownloaded: number;
  totalBytes: number;
  startedAt?: string;
  completedAt?: string;
  errorMessage?: string;
  retryCount: number;
}

/** Terminal result of one transfer attempt. */
export type TransferStatus = Extract<DownloadStatus, "completed" | "failed" | "expired">;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const count = z.number().int().nonnegative();

/**
 * Shape of a persisted record. Unknown keys are stripped; optional counters
 * default to zero; `url` and `filename` may be filled in from the ledger key.
 */
export const PersistedRecordSchema = z.object({
  url: z.string().min(1).optional(),
  filename: z.string().min(1).optional(),
  status: z.enum(DOWNLOAD_STATUSES),
  bytesDownloaded: count.default(0),
  totalBytes: count.default(0),
  startedAt: z.string().nullish(),
  completedAt: z.string().nullish(),
  errorMessage: z.string().nullish(),
  retryCount: count.default(0),
});

export type PersistedRecord = z.infer<typeof PersistedRecordSchema>;

/** Older snapshots used snake_case keys. */
const LEGACY_KEYS: Record<string, keyof DownloadRecord> = {
  bytes_downloaded: "bytesDownloaded",
  total_bytes: "totalBytes",
  started_at: "startedAt",
  completed_at: "completedAt",
  error_message: "errorMessage",
  retry_count: "retryCount",
};

/**
 * Rename legacy snake_case keys. Camel-case keys win when both are present.
 */
export function migrateLegacyKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const migrated: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const target = LEGACY_KEYS[key];
    if (target === undefined) {
      migrated[key] = value;
    } else if (!(target in raw)) {
      migrated[target] = value;
    }
  }
  return migrated;
}

export type ParseRecordResult =
  | { ok: true; record: DownloadRecord }
  | { ok: false; reason: string };

/**
 * Validate one ledger entry into a DownloadRecord.
 *
 * `deriveFilename` is only consulted when the entry has no filename.
 */
export function parseRecord(
  key: string,
  raw: unknown,
  deriveFilename: (url: string) => string
): ParseRecordResult {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { ok: false, reason: "entry is not an object" };
  }

  const entries = Object.fromEntries(Object.entries(raw));
  const result = PersistedRecordSchema.safeParse(migrateLegacyKeys(entries));
  if (!result.success) {
    const reason = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return { ok: false, reason };
  }

  const data = result.data;
  const url = data.url ?? key;
  if (url !== key) {
    return { ok: false, reason: `url field "${url}" does not match its key` };
  }

  const record: DownloadRecord = {
    url,
    filename: data.filename ?? deriveFilename(url),
    status: data.status,
    bytesDownloaded: data.bytesDownloaded,
    totalBytes: data.totalBytes,
    retryCount: data.retryCount,
  };
  if (data.startedAt) record.startedAt = data.startedAt;
  if (data.completedAt) record.completedAt = data.completedAt;
  if (data.errorMessage && (data.status === "failed" || data.status === "expired")) {
    record.errorMessage = data.errorMessage;
  }

  return { ok: true, record };
}

/**
 * A fresh record for a URL seen for the first time.
 */
export function createRecord(url: string, filename: string): DownloadRecord {
  return {
    url,
    filename,
    status: "pending",
    bytesDownloaded: 0,
    totalBytes: 0,
    retryCount: 0,
  };
}
