/**
 * JSON output utilities for machine-readable CLI output.
 * Errors go through the error renderer; this file covers results.
 */

import { isJsonMode } from "./cli-context.js";
import type { RunSummary } from "./report.js";
import type { SkippedUrl } from "./scheduler.js";
import type { TransferOutcome } from "./transfer.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    version?: string;
    durationMs?: number;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadResultJson {
  outputDir: string;
  ledgerPath: string;
  interrupted: boolean;
  summary: RunSummary;
  /** Transfers attempted this run, in completion order */
  outcomes: TransferOutcome[];
  skipped: SkippedUrl[];
}

export interface StatusJson {
  ledgerPath: string;
  exists: boolean;
  summary: RunSummary;
}

export interface LedgerResetJson {
  reset: string[];
  removed: string[];
  notFound: string[];
  /** Files of forgotten entries deleted because they were not archives */
  discarded: string[];
}

export interface AuthShowJson {
  path: string;
  cookies: string[];
  headers: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
