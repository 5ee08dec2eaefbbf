import { createHash } from "crypto";
import { basename, extname } from "path";

/** Archive names embedded in query strings, e.g. `?name=takeout-20240101T000000Z-001.zip` */
const ARCHIVE_TOKEN = /takeout-[^/?#&=\s]*?\.zip/i;

/** Characters that cannot appear in a file name on common filesystems */
const UNSAFE_CHARS = /[/\\:*?"<>|\x00-\x1f]/g;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * `YYYYMMDD_HHmmss` in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * First 8 hex characters of the URL's SHA-256.
 */
export function urlHash(url: string): string {
  return createHash("sha256").update(url).digest("hex").slice(0, 8);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed percent-encoding: keep the raw text
    return value;
  }
}

function sanitize(name: string): string {
  return name.replace(UNSAFE_CHARS, "_");
}

/**
 * Derive the local file name for a download URL:
 *
 * 1. the URL path's last segment, when it ends in `.zip`;
 * 2. else the first archive-name token found anywhere in the URL;
 * 3. else `archive_<timestamp>_<hash>.zip`.
 *
 * The result is stored in the ledger record and never recomputed, so the
 * time-based fallback stays stable across resumes.
 */
export function deriveFilename(url: string, now: Date = new Date()): string {
  let pathname = "";
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = "";
  }

  const last = safeDecode(basename(pathname));
  if (last.toLowerCase().endsWith(".zip") && last.length > ".zip".length) {
    return sanitize(last);
  }

  const token = ARCHIVE_TOKEN.exec(safeDecode(url));
  if (token) {
    return sanitize(token[0]);
  }

  return `archive_${formatTimestamp(now)}_${urlHash(url)}.zip`;
}

/**
 * Disambiguate a file name already claimed by a different URL:
 * `takeout-001.zip` → `takeout-001-3f2a9c1d.zip`.
 */
export function disambiguateFilename(filename: string, url: string): string {
  const ext = extname(filename);
  const stem = ext ? filename.slice(0, -ext.length) : filename;
  return `${stem}-${urlHash(url)}${ext}`;
}
