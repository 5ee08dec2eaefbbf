import { readFile } from "fs/promises";
import { urlsFileNotFound, urlsFileUnreadable } from "./errors/catalog.js";

const HTTP_SCHEME = /^https?:\/\//i;

/**
 * Keep trimmed lines that start with an http(s) scheme, in file order,
 * without duplicates.
 */
export function parseUrlList(content: string): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!HTTP_SCHEME.test(line) || seen.has(line)) continue;
    seen.add(line);
    urls.push(line);
  }
  return urls;
}

/**
 * Read a URL list file. A missing or unreadable file is a startup error.
 */
export async function readUrlList(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw urlsFileNotFound(path);
    }
    throw urlsFileUnreadable(path, error instanceof Error ? error.message : String(error));
  }
  return parseUrlList(content);
}
