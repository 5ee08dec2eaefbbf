import chalk from "chalk";
import CliTable3 from "cli-table3";
import { DOWNLOAD_STATUSES, type DownloadRecord, type DownloadStatus } from "./download-record.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProblemEntry {
  url: string;
  filename: string;
  status: "failed" | "expired";
  errorMessage: string;
  retryCount: number;
}

export interface RunSummary {
  total: number;
  counts: Record<DownloadStatus, number>;
  /** Bytes held by completed downloads */
  completedBytes: number;
  /** Failed and expired records, in ledger order */
  problems: ProblemEntry[];
}

export interface ReportOptions {
  /** Retry cap, to flag failures that will not be retried */
  maxAttempts?: number;
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function summarize(records: Iterable<DownloadRecord>): RunSummary {
  const counts: Record<DownloadStatus, number> = {
    pending: 0,
    downloading: 0,
    completed: 0,
    failed: 0,
    expired: 0,
  };
  const problems: ProblemEntry[] = [];
  let total = 0;
  let completedBytes = 0;

  for (const record of records) {
    total++;
    counts[record.status]++;
    if (record.status === "completed") {
      completedBytes += record.totalBytes;
    } else if (record.status === "failed" || record.status === "expired") {
      problems.push({
        url: record.url,
        filename: record.filename,
        status: record.status,
        errorMessage: record.errorMessage ?? "unknown error",
        retryCount: record.retryCount,
      });
    }
  }

  return { total, counts, completedBytes, problems };
}

/**
 * Problems grouped into the URLs needing a fresh link and the rest.
 */
export function partitionProblems(summary: RunSummary): {
  expired: ProblemEntry[];
  failed: ProblemEntry[];
} {
  return {
    expired: summary.problems.filter((p) => p.status === "expired"),
    failed: summary.problems.filter((p) => p.status === "failed"),
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`;
}

const STATUS_COLORS: Record<DownloadStatus, (text: string) => string> = {
  completed: chalk.green,
  failed: chalk.red,
  expired: chalk.yellow,
  downloading: chalk.cyan,
  pending: chalk.gray,
};

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

/**
 * Human-readable report: counts by status, then one row per problem.
 */
export function formatReport(summary: RunSummary, options: ReportOptions = {}): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`Downloads: ${summary.total}`));

  const counts = new CliTable3({
    head: [chalk.cyan("Status"), chalk.cyan("Count")],
  });
  for (const status of DOWNLOAD_STATUSES) {
    counts.push([STATUS_COLORS[status](status), String(summary.counts[status])]);
  }
  lines.push(counts.toString());
  lines.push(`Completed size: ${formatBytes(summary.completedBytes)}`);

  const { expired, failed } = partitionProblems(summary);
  const cap = options.maxAttempts;

  if (failed.length > 0) {
    lines.push("", chalk.red.bold("Failed:"));
    const table = new CliTable3({
      head: [chalk.cyan("File"), chalk.cyan("Attempts"), chalk.cyan("Error")],
      colWidths: [40, 10, 50],
      wordWrap: true,
    });
    for (const problem of failed) {
      const attempts = cap !== undefined ? `${problem.retryCount}/${cap}` : String(problem.retryCount);
      table.push([truncate(problem.filename, 38), attempts, problem.errorMessage]);
    }
    lines.push(table.toString());

    if (cap !== undefined && failed.some((p) => p.retryCount >= cap)) {
      lines.push(chalk.gray("Entries at the attempt limit need `arcpull ledger reset --failed` to retry."));
    }
  }

  if (expired.length > 0) {
    lines.push("", chalk.yellow.bold("Expired links (request fresh ones):"));
    for (const problem of expired) {
      lines.push(`  ${chalk.yellow("•")} ${problem.filename}: ${problem.errorMessage}`);
      lines.push(chalk.gray(`    ${problem.url}`));
    }
  }

  return lines.join("\n");
}
