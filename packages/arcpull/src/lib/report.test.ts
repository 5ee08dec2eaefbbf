import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { formatBytes, formatReport, summarize } from "./report.js";
import { createRecord, type DownloadRecord } from "./download-record.js";

const completed: DownloadRecord = {
  ...createRecord("https://storage.example.com/takeout-001.zip", "takeout-001.zip"),
  status: "completed",
  bytesDownloaded: 2048,
  totalBytes: 2048,
};
const failed: DownloadRecord = {
  ...createRecord("https://storage.example.com/takeout-002.zip", "takeout-002.zip"),
  status: "failed",
  errorMessage: "Not a valid archive, likely an authentication page",
  retryCount: 3,
};
const expired: DownloadRecord = {
  ...createRecord("https://storage.example.com/takeout-003.zip", "takeout-003.zip"),
  status: "expired",
  errorMessage: "Link expired (HTTP 404)",
};
const pending = createRecord("https://storage.example.com/takeout-004.zip", "takeout-004.zip");

describe("summarize", () => {
  it("counts every status and lists problems in ledger order", () => {
    expect(summarize([completed, failed, expired, pending])).toEqual({
      total: 4,
      counts: { pending: 1, downloading: 0, completed: 1, failed: 1, expired: 1 },
      completedBytes: 2048,
      problems: [
        {
          url: failed.url,
          filename: "takeout-002.zip",
          status: "failed",
          errorMessage: "Not a valid archive, likely an authentication page",
          retryCount: 3,
        },
        {
          url: expired.url,
          filename: "takeout-003.zip",
          status: "expired",
          errorMessage: "Link expired (HTTP 404)",
          retryCount: 0,
        },
      ],
    });
  });

  it("summarizes an empty ledger", () => {
    expect(summarize([])).toEqual({
      total: 0,
      counts: { pending: 0, downloading: 0, completed: 0, failed: 0, expired: 0 },
      completedBytes: 0,
      problems: [],
    });
  });
});

describe("formatBytes", () => {
  it.each([
    [0, "0 B"],
    [512, "512 B"],
    [2048, "2.0 KB"],
    [5 * 1024 * 1024, "5.0 MB"],
    [3.5 * 1024 ** 3, "3.5 GB"],
  ])("formats %i as %s", (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe("formatReport", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it("shows counts, failures with attempts and expired links", () => {
    const report = formatReport(summarize([completed, failed, expired]), { maxAttempts: 3 });

    expect(report.split("\n")[0]).toBe("Downloads: 3");
    expect(report).toMatch(/│ completed\s+│ 1\s+│/);
    expect(report).toMatch(/│ failed\s+│ 1\s+│/);
    expect(report).toMatch(/│ expired\s+│ 1\s+│/);
    expect(report).toContain("Completed size: 2.0 KB");
    expect(report).toMatch(/│ takeout-002\.zip\s+│ 3\/3\s+│/);
    expect(report).toContain("Entries at the attempt limit need `arcpull ledger reset --failed` to retry.");
    const lines = report.split("\n");
    const expiredAt = lines.indexOf("  • takeout-003.zip: Link expired (HTTP 404)");
    expect(expiredAt).toBeGreaterThan(0);
    expect(lines[expiredAt + 1]).toBe("    https://storage.example.com/takeout-003.zip");
  });

  it("leaves out problem sections when everything completed", () => {
    const report = formatReport(summarize([completed]));

    expect(report).not.toContain("Failed:");
    expect(report).not.toContain("Expired links");
  });
});
