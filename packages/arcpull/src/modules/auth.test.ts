import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import chalk from "chalk";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { registerAuthCommands } from "./auth.js";
import { initContext, resetContext } from "../lib/cli-context.js";

const CURL = `curl 'https://storage.example.com/takeout-001.zip' \\
  -H 'User-Agent: test-agent' \\
  -H 'Cookie: HSID=test-hsid' \\
  -b 'SID=test-session' \\
  -H 'Range: bytes=0-'
`;

describe("auth commands", () => {
  let dir: string;
  let bundlePath: string;
  let curlPath: string;
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "arcpull-auth-"));
    bundlePath = join(dir, "headers.json");
    curlPath = join(dir, "request.txt");
    chalk.level = 0;
    program = new Command();
    program.exitOverride();
    registerAuthCommands(program);
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  function run(...args: string[]): Promise<Command> {
    return program.parseAsync(["node", "test", "auth", ...args, "--auth", bundlePath, "-c", join(dir, "absent.yaml")]);
  }

  async function savedBundle(): Promise<unknown> {
    return JSON.parse(await readFile(bundlePath, "utf-8"));
  }

  describe("auth import-curl", () => {
    it("creates a bundle from a copied command", async () => {
      await writeFile(curlPath, CURL);

      await run("import-curl", curlPath);

      expect(await savedBundle()).toEqual({
        cookies: { HSID: "test-hsid", SID: "test-session" },
        headers: { "User-Agent": "test-agent" },
      });
      expect(consoleLogSpy).toHaveBeenCalledWith(`✓ Saved 2 cookies and 1 headers to ${bundlePath}`);
    });

    it("merges into an existing bundle, letting the command win", async () => {
      await writeFile(curlPath, CURL);
      await writeFile(
        bundlePath,
        JSON.stringify({
          cookies: { SID: "old-session", NID: "test-nid" },
          headers: { "user-agent": "old-agent", Accept: "*/*" },
        })
      );

      await run("import-curl", curlPath);

      expect(await savedBundle()).toEqual({
        cookies: { SID: "test-session", NID: "test-nid", HSID: "test-hsid" },
        headers: { Accept: "*/*", "User-Agent": "test-agent" },
      });
    });

    it("rejects a command without cookies or headers", async () => {
      await writeFile(curlPath, "curl 'https://storage.example.com/takeout-001.zip'\n");

      await run("import-curl", curlPath);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining("No cookies or headers found in")
      );
      expect(process.exitCode).toBe(1);
    });

    it("reports a missing command file", async () => {
      await run("import-curl", join(dir, "missing.txt"));

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Can't find cURL command file"));
      expect(process.exitCode).toBe(1);
    });
  });

  describe("auth show", () => {
    it("lists names without values", async () => {
      await writeFile(bundlePath, JSON.stringify({ cookies: { SID: "test-secret" }, headers: { "User-Agent": "test-agent" } }));

      await run("show");

      const printed = consoleLogSpy.mock.calls.map((call) => String(call[0]));
      expect(printed).toContain("  SID");
      expect(printed).toContain("  User-Agent");
      expect(printed.some((line) => line.includes("test-secret"))).toBe(false);
    });

    it("prints names as JSON in JSON mode", async () => {
      initContext(["node", "arcpull", "--json"]);
      await writeFile(bundlePath, JSON.stringify({ SID: "test-secret", HSID: "test-hsid" }));

      await run("show");

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
        success: true,
        data: { path: bundlePath, cookies: ["SID", "HSID"], headers: [] },
      });
    });

    it("fails when the bundle does not exist", async () => {
      await run("show");

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Can't find auth bundle"));
      expect(process.exitCode).toBe(1);
    });
  });
});
