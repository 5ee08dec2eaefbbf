import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createLedger, LEDGER_FILENAME } from "./ledger.js";
import { createRecord, type DownloadRecord } from "./download-record.js";
import { CLIError } from "./errors/types.js";
import { createMockLogger } from "./__fixtures__/logger.js";

const URL_A = "https://storage.example.com/takeout-001.zip";
const URL_B = "https://storage.example.com/takeout-002.zip";

describe("createLedger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "arcpull-ledger-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function readPersisted(): Promise<unknown> {
    return JSON.parse(await readFile(join(dir, LEDGER_FILENAME), "utf-8"));
  }

  it("starts empty when there is no progress file", async () => {
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });

    const records = await ledger.load();

    expect(records.size).toBe(0);
    expect(ledger.path).toBe(join(dir, LEDGER_FILENAME));
  });

  it("persists records under their URL with the record field names", async () => {
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });

    await ledger.upsert(createRecord(URL_A, "takeout-001.zip"), { persist: true });

    expect(await readPersisted()).toEqual({
      [URL_A]: {
        url: URL_A,
        filename: "takeout-001.zip",
        status: "pending",
        bytesDownloaded: 0,
        totalBytes: 0,
        retryCount: 0,
      },
    });
  });

  it("does not write without persist until a snapshot", async () => {
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });

    await ledger.upsert(createRecord(URL_A, "a.zip"));
    expect(await readdir(dir)).toEqual([]);

    await ledger.snapshot();
    expect(await readdir(dir)).toEqual([LEDGER_FILENAME]);
  });

  it("hands out copies, never the stored record", async () => {
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });
    const record = createRecord(URL_A, "a.zip");
    await ledger.upsert(record);

    record.status = "completed";
    const first = await ledger.get(URL_A);
    if (first) first.bytesDownloaded = 999;

    expect(await ledger.get(URL_A)).toEqual(createRecord(URL_A, "a.zip"));
  });

  it("round-trips through a second ledger instance", async () => {
    const writer = createLedger({ outputDir: dir, logger: createMockLogger() });
    const record: DownloadRecord = {
      ...createRecord(URL_A, "a.zip"),
      status: "failed",
      bytesDownloaded: 1024,
      totalBytes: 4096,
      startedAt: "2024-05-01T10:00:00.000Z",
      errorMessage: "fetch failed (ECONNRESET)",
      retryCount: 2,
    };
    await writer.upsert(record, { persist: true });
    await writer.upsert(createRecord(URL_B, "b.zip"), { persist: true });

    const reader = createLedger({ outputDir: dir, logger: createMockLogger() });
    const records = await reader.entries();

    expect(records).toEqual([record, createRecord(URL_B, "b.zip")]);
  });

  it("leaves no temp file behind after a snapshot", async () => {
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });
    await ledger.upsert(createRecord(URL_A, "a.zip"), { persist: true });
    await ledger.upsert(createRecord(URL_B, "b.zip"), { persist: true });

    expect(await readdir(dir)).toEqual([LEDGER_FILENAME]);
  });

  it("serializes concurrent upserts without losing any", async () => {
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });
    const urls = Array.from({ length: 20 }, (_, i) => `https://storage.example.com/part-${i}.zip`);

    await Promise.all(
      urls.map((url, i) => ledger.upsert(createRecord(url, `part-${i}.zip`), { persist: true }))
    );

    const persisted = await readPersisted();
    expect(Object.keys(persisted as object)).toHaveLength(20);
    expect((await ledger.entries()).map((r) => r.url)).toEqual(urls);
  });

  it("migrates legacy snake_case keys and fills defaults", async () => {
    await writeFile(
      join(dir, LEDGER_FILENAME),
      JSON.stringify({
        [URL_A]: {
          url: URL_A,
          filename: "takeout-001.zip",
          status: "downloading",
          bytes_downloaded: 2048,
          total_bytes: 8192,
          started_at: "2024-05-01T10:00:00",
          error_message: null,
          retry_count: 1,
          extra: "dropped",
        },
        [URL_B]: { status: "pending" },
      })
    );

    const records = await createLedger({
      outputDir: dir,
      logger: createMockLogger(),
      deriveFilename: () => "derived.zip",
    }).load();

    expect(records.get(URL_A)).toEqual({
      url: URL_A,
      filename: "takeout-001.zip",
      status: "downloading",
      bytesDownloaded: 2048,
      totalBytes: 8192,
      startedAt: "2024-05-01T10:00:00",
      retryCount: 1,
    });
    expect(records.get(URL_B)).toEqual(createRecord(URL_B, "derived.zip"));
  });

  it("skips entries that cannot be repaired and warns", async () => {
    await writeFile(
      join(dir, LEDGER_FILENAME),
      JSON.stringify({
        [URL_A]: { status: "paused" },
        [URL_B]: { status: "pending", bytesDownloaded: -5 },
        "https://storage.example.com/ok.zip": { status: "expired", errorMessage: "Link expired (HTTP 404)" },
      })
    );
    const logger = createMockLogger();

    const records = await createLedger({ outputDir: dir, logger }).load();

    expect([...records.keys()]).toEqual(["https://storage.example.com/ok.zip"]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "Skipping unreadable progress entry",
      expect.objectContaining({ url: URL_A })
    );
  });

  it("refuses a progress file that is not JSON", async () => {
    await writeFile(join(dir, LEDGER_FILENAME), "{ not json");
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });

    await expect(ledger.load()).rejects.toBeInstanceOf(CLIError);
    await expect(readFile(join(dir, LEDGER_FILENAME), "utf-8")).resolves.toBe("{ not json");
  });

  it("refuses a progress file holding an array", async () => {
    await writeFile(join(dir, LEDGER_FILENAME), "[]");
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });

    await expect(ledger.load()).rejects.toMatchObject({ code: "CONFIG_LEDGER_CORRUPT" });
  });

  it("removes a record only on request", async () => {
    const ledger = createLedger({ outputDir: dir, logger: createMockLogger() });
    await ledger.upsert(createRecord(URL_A, "a.zip"), { persist: true });

    expect(await ledger.remove(URL_A, { persist: true })).toBe(true);
    expect(await ledger.remove(URL_A)).toBe(false);
    expect(await readPersisted()).toEqual({});
  });
});
