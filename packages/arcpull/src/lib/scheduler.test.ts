import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createScheduler, type Scheduler, type SchedulerOptions } from "./scheduler.js";
import { createTransferEngine, type TransferEngine, type TransferOutcome } from "./transfer.js";
import { createArchiveValidator } from "./archive-validator.js";
import { createLedger, LEDGER_FILENAME, type Ledger } from "./ledger.js";
import { createRecord, type DownloadRecord } from "./download-record.js";
import { formatTimestamp, urlHash } from "./filename.js";
import type { Clock } from "./ports/clock.js";
import type { FetchLike } from "./ports/http.js";
import { buildZip, htmlPage } from "./__fixtures__/zip.js";
import { createMockLogger } from "./__fixtures__/logger.js";

const NOW = "2024-05-01T10:00:00.000Z";
const clock: Clock = { now: () => Date.parse(NOW), newDate: () => new Date(NOW) };
const auth = { cookies: { SID: "test-session" }, headers: {} };
const zip = buildZip([{ name: "a" }]);

const url = (n: number) => `https://storage.example.com/takeout-00${n}.zip`;

function respond(status: number, body: Uint8Array | null, headers: Record<string, string> = {}): Response {
  const stream = body === null
    ? null
    : new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(body);
          controller.close();
        },
      });
  return new Response(stream, { status, headers });
}

describe("createScheduler", () => {
  let dir: string;
  let ledger: Ledger;
  let fetchMock: Mock<FetchLike>;
  const logger = createMockLogger();
  const validator = createArchiveValidator({ minBytes: 100 });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "arcpull-scheduler-"));
    ledger = createLedger({ outputDir: dir, logger });
    fetchMock = vi.fn<FetchLike>();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function scheduler(overrides: Partial<SchedulerOptions> = {}) {
    const engine = createTransferEngine({
      outputDir: dir,
      ledger,
      validator,
      logger,
      fetch: fetchMock,
      clock,
    });
    return createScheduler({
      outputDir: dir,
      ledger,
      engine,
      validator,
      logger,
      auth,
      clock,
      ...overrides,
    });
  }

  /** Fresh ledger instance reading what is on disk */
  async function persisted(): Promise<DownloadRecord[]> {
    return createLedger({ outputDir: dir, logger }).entries();
  }

  describe("plan", () => {
    it("creates pending records for new URLs, once each", async () => {
      const plan = await scheduler().plan([url(1), url(2), url(1)]);

      expect(plan).toEqual({ pending: [url(1), url(2)], skipped: [], promoted: [] });
      expect(await persisted()).toEqual([
        createRecord(url(1), "takeout-001.zip"),
        createRecord(url(2), "takeout-002.zip"),
      ]);
    });

    it("gives a second URL with the same file name a hashed name", async () => {
      const first = "https://a.example.com/export/takeout-001.zip";
      const second = "https://b.example.com/export/takeout-001.zip";

      await scheduler().plan([first, second]);

      expect((await ledger.get(second))?.filename).toBe(`takeout-001-${urlHash(second)}.zip`);
      expect((await ledger.get(first))?.filename).toBe("takeout-001.zip");
    });

    it("derives a timestamped name when the URL carries none", async () => {
      const target = "https://storage.example.com/download?id=42";

      await scheduler().plan([target]);

      expect((await ledger.get(target))?.filename).toBe(`archive_${formatTimestamp(new Date(NOW))}_${urlHash(target)}.zip`);
    });

    it("retries failures below the attempt limit only", async () => {
      await ledger.upsert({ ...createRecord(url(1), "takeout-001.zip"), status: "failed", retryCount: 2 });
      await ledger.upsert({ ...createRecord(url(2), "takeout-002.zip"), status: "failed", retryCount: 3 });

      const plan = await scheduler().plan([url(1), url(2)]);

      expect(plan.pending).toEqual([url(1)]);
      expect(plan.skipped).toEqual([
        { url: url(2), status: "failed", reason: "attempt limit reached (3/3)" },
      ]);
    });

    it("never plans expired URLs", async () => {
      await ledger.upsert({
        ...createRecord(url(1), "takeout-001.zip"),
        status: "expired",
        errorMessage: "Link expired (HTTP 404)",
      });

      const plan = await scheduler().plan([url(1)]);

      expect(plan.skipped).toEqual([{ url: url(1), status: "expired", reason: "link expired" }]);
    });

    it("re-plans completed records whose file is missing", async () => {
      await writeFile(join(dir, "takeout-001.zip"), zip);
      await ledger.upsert({ ...createRecord(url(1), "takeout-001.zip"), status: "completed", totalBytes: 100 });
      await ledger.upsert({ ...createRecord(url(2), "takeout-002.zip"), status: "completed", totalBytes: 100 });

      const plan = await scheduler().plan([url(1), url(2)]);

      expect(plan.pending).toEqual([url(2)]);
      expect(plan.skipped).toEqual([{ url: url(1), status: "completed", reason: "already complete" }]);
    });

    it("promotes a finished download that was never marked complete", async () => {
      await writeFile(join(dir, "takeout-001.zip"), zip);
      await writeFile(join(dir, "takeout-002.zip"), zip.subarray(0, 60));
      await ledger.upsert({
        ...createRecord(url(1), "takeout-001.zip"),
        status: "downloading",
        bytesDownloaded: 60,
        totalBytes: 100,
      });
      await ledger.upsert({
        ...createRecord(url(2), "takeout-002.zip"),
        status: "downloading",
        bytesDownloaded: 60,
        totalBytes: 100,
      });

      const plan = await scheduler().plan([url(1), url(2)]);

      expect(plan.promoted).toEqual([url(1)]);
      expect(plan.pending).toEqual([url(2)]);
      expect((await persisted())[0]).toMatchObject({
        status: "completed",
        bytesDownloaded: 100,
        completedAt: NOW,
      });
    });
  });

  describe("run", () => {
    it("makes no requests when every record is complete and valid", async () => {
      fetchMock.mockImplementation(async () => respond(200, zip));
      const s = scheduler();
      await s.run([url(1), url(2)]);
      expect(fetchMock).toHaveBeenCalledTimes(2);

      const summary = await s.run([url(1), url(2)]);

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(summary.counts.completed).toBe(2);
    });

    it("stops retrying after three failed attempts", async () => {
      fetchMock.mockImplementation(async () => respond(503, null));
      const s = scheduler();

      for (let attempt = 1; attempt <= 3; attempt++) {
        await s.run([url(1)]);
        expect((await ledger.get(url(1)))?.retryCount).toBe(attempt);
      }
      const plan = await s.plan([url(1)]);

      expect(plan.pending).toEqual([]);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("never retries an expired link", async () => {
      fetchMock.mockImplementation(async () => respond(404, null));
      const s = scheduler();

      await s.run([url(1)]);
      await s.run([url(1)]);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect((await ledger.get(url(1)))?.status).toBe("expired");
    });

    it("runs at most `concurrency` transfers at once", async () => {
      let active = 0;
      let peak = 0;
      const engine: TransferEngine = {
        download: vi.fn(async (record: DownloadRecord): Promise<TransferOutcome> => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((r) => setTimeout(r, 10));
          active--;
          return { url: record.url, filename: record.filename, status: "completed", bytesDownloaded: 0 };
        }),
      };
      const urls = [1, 2, 3, 4, 5].map(url);

      await scheduler({ engine }).run(urls, 2);

      expect(engine.download).toHaveBeenCalledTimes(5);
      expect(peak).toBe(2);
    });

    it("gives every URL an outcome even when a transfer throws", async () => {
      const outcomes: TransferOutcome[] = [];
      const engine: TransferEngine = {
        download: vi.fn(async (record: DownloadRecord): Promise<TransferOutcome> => {
          if (record.url === url(1)) throw new Error("disk vanished");
          return { url: record.url, filename: record.filename, status: "completed", bytesDownloaded: 100 };
        }),
      };

      await scheduler({ engine, onOutcome: (o) => outcomes.push(o) }).run([url(1), url(2)]);

      expect(outcomes.map((o) => [o.url, o.status])).toEqual(
        expect.arrayContaining([
          [url(1), "failed"],
          [url(2), "completed"],
        ])
      );
      expect(outcomes).toHaveLength(2);
    });

    it("downloads, expires and rejects in one run", async () => {
      const good = "https://storage.example.com/takeout-good.zip";
      const gone = "https://storage.example.com/takeout-gone.zip";
      const login = "https://storage.example.com/takeout-login.zip";
      fetchMock.mockImplementation(async (target) => {
        if (target === good) return respond(206, zip, { "Content-Range": "bytes 0-99/100" });
        if (target === gone) return respond(404, null);
        return respond(200, htmlPage(40_000), { "Content-Type": "text/html" });
      });

      const summary = await scheduler().run([good, gone, login], 3);

      expect(summary.total).toBe(3);
      expect(summary.counts).toEqual({ pending: 0, downloading: 0, completed: 1, failed: 1, expired: 1 });
      expect(summary.completedBytes).toBe(100);
      expect(summary.problems).toEqual(
        expect.arrayContaining([
          expect.objectContaining({ url: gone, status: "expired", errorMessage: "Link expired (HTTP 404)" }),
          expect.objectContaining({
            url: login,
            status: "failed",
            errorMessage: "Not a valid archive, likely an authentication page",
          }),
        ])
      );
      expect(await readFile(join(dir, "takeout-good.zip"))).toEqual(zip);
    });
  });

  describe("shutdown", () => {
    it("starts nothing new and saves progress", async () => {
      let s: Scheduler | undefined;
      const engine: TransferEngine = {
        download: vi.fn(async (record: DownloadRecord): Promise<TransferOutcome> => {
          await s?.shutdown();
          return { url: record.url, filename: record.filename, status: "completed", bytesDownloaded: 0 };
        }),
      };
      s = scheduler({ engine });

      const summary = await s.run([1, 2, 3].map(url), 1);

      expect(engine.download).toHaveBeenCalledTimes(1);
      expect(summary.counts.pending).toBe(3);
      expect(Object.keys(JSON.parse(await readFile(join(dir, LEDGER_FILENAME), "utf-8")))).toHaveLength(3);
    });
  });
});

