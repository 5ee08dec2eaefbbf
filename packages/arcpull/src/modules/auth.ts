import { Command } from "commander";
import { readFile } from "fs/promises";
import chalk from "chalk";
import {
  emptyAuthBundle,
  loadAuthBundle,
  mergeAuthBundles,
  saveAuthBundle,
  type AuthBundle,
} from "../lib/auth-bundle.js";
import { loadConfig } from "../lib/config.js";
import { parseCurlCommand } from "../lib/curl-import.js";
import { curlFileNotFound, emptyCurlCommand } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type AuthShowJson } from "../lib/json-output.js";

interface AuthOptions {
  auth?: string;
  config?: string;
}

function bundlePath(options: AuthOptions): string {
  return loadConfig(options.config, { authBundle: options.auth }).config.authBundle;
}

async function readCurlFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw curlFileNotFound(path);
    }
    throw error;
  }
}

/**
 * Merge the credentials of a copied cURL command into the bundle file.
 * Values from the command replace stored ones with the same name.
 */
export async function importCurl(curlFile: string, options: AuthOptions): Promise<{ path: string; bundle: AuthBundle }> {
  const parsed = parseCurlCommand(await readCurlFile(curlFile));
  if (Object.keys(parsed.cookies).length === 0 && Object.keys(parsed.headers).length === 0) {
    throw emptyCurlCommand(curlFile);
  }

  const path = bundlePath(options);
  const existing = (await loadAuthBundle(path, { required: false })) ?? emptyAuthBundle();
  const bundle = mergeAuthBundles(existing, parsed);
  await saveAuthBundle(path, bundle);
  return { path, bundle };
}

export async function describeBundle(options: AuthOptions): Promise<AuthShowJson> {
  const path = bundlePath(options);
  const bundle = (await loadAuthBundle(path, { required: true })) ?? emptyAuthBundle();
  return {
    path,
    cookies: Object.keys(bundle.cookies),
    headers: Object.keys(bundle.headers),
  };
}

export function registerAuthCommands(program: Command): void {
  const auth = program.command("auth").description("Manage the cookies and headers sent with downloads");

  auth
    .command("import-curl")
    .description("Import cookies and headers from a browser's \"Copy as cURL\" command")
    .argument("<file>", "Text file holding the copied command")
    .option("--auth <file>", "Auth bundle to update")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action(async (file: string, options: AuthOptions) => {
      try {
        const { path, bundle } = await importCurl(file, options);
        const summary: AuthShowJson = {
          path,
          cookies: Object.keys(bundle.cookies),
          headers: Object.keys(bundle.headers),
        };
        if (maybeOutputJson(summary)) return;

        console.log(
          chalk.green(
            `✓ Saved ${summary.cookies.length} cookies and ${summary.headers.length} headers to ${path}`
          )
        );
        console.log(chalk.gray("Cookies expire; import a fresh command when downloads start failing."));
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  auth
    .command("show")
    .description("List the cookie and header names in the auth bundle (values stay hidden)")
    .option("--auth <file>", "Auth bundle to read")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action(async (options: AuthOptions) => {
      try {
        const info = await describeBundle(options);
        if (maybeOutputJson(info)) return;

        console.log(chalk.cyan(`Auth bundle: ${info.path}`));
        console.log();
        console.log(chalk.bold(`Cookies (${info.cookies.length}):`));
        for (const name of info.cookies) console.log(`  ${name}`);
        console.log();
        console.log(chalk.bold(`Headers (${info.headers.length}):`));
        for (const name of info.headers) console.log(`  ${name}`);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
