import { readFile, writeFile } from "fs/promises";
import { z } from "zod";
import { authBundleInvalid, authBundleNotFound } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Credentials attached to every archive request. */
export interface AuthBundle {
  cookies: Record<string, string>;
  headers: Record<string, string>;
}

export function emptyAuthBundle(): AuthBundle {
  return { cookies: {}, headers: {} };
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const StringMapSchema = z.record(z.string());

const BundleSchema = z.object({
  cookies: StringMapSchema.optional(),
  headers: StringMapSchema.optional(),
});

/** Cookie-Editor style export: `[{ "name": "SID", "value": "…", "domain": … }]` */
const CookieArraySchema = z.array(
  z.object({
    name: z.string().min(1),
    value: z.string(),
  })
);

// ---------------------------------------------------------------------------
// Cookie helpers
// ---------------------------------------------------------------------------

/**
 * Parse a `Cookie:` header value (`a=1; b=2`) into a map.
 */
export function parseCookieHeader(value: string): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const pair of value.split(";")) {
    const eq = pair.indexOf("=");
    if (eq <= 0) continue;
    const name = pair.slice(0, eq).trim();
    if (name) cookies[name] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

export function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

/**
 * Netscape cookie file (curl/wget `cookies.txt`): tab-separated lines of
 * domain, flag, path, secure, expiry, name, value.
 */
export function parseNetscapeCookies(content: string): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    // HttpOnly cookies are written as comments with this prefix
    const line = rawLine.startsWith("#HttpOnly_")
      ? rawLine.slice("#HttpOnly_".length)
      : rawLine;
    if (!line.trim() || line.startsWith("#")) continue;
    const parts = line.trim().split("\t");
    if (parts.length >= 7) {
      cookies[parts[5]] = parts[6];
    }
  }
  return cookies;
}

/**
 * Move any `Cookie` header into the cookie map so cookies are only ever
 * sent from one place. Map entries win over header entries.
 */
export function normalizeAuthBundle(bundle: AuthBundle): AuthBundle {
  const headers: Record<string, string> = {};
  let headerCookies: Record<string, string> = {};
  for (const [name, value] of Object.entries(bundle.headers)) {
    if (name.toLowerCase() === "cookie") {
      headerCookies = { ...headerCookies, ...parseCookieHeader(value) };
    } else {
      headers[name] = value;
    }
  }
  return { cookies: { ...headerCookies, ...bundle.cookies }, headers };
}

/**
 * Combine two bundles; `override` wins on conflicting names.
 * Header names compare case-insensitively.
 */
export function mergeAuthBundles(base: AuthBundle, override: AuthBundle): AuthBundle {
  const headers: Record<string, string> = {};
  const overridden = new Set(Object.keys(override.headers).map((h) => h.toLowerCase()));
  for (const [name, value] of Object.entries(base.headers)) {
    if (!overridden.has(name.toLowerCase())) headers[name] = value;
  }
  return {
    cookies: { ...base.cookies, ...override.cookies },
    headers: { ...headers, ...override.headers },
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse the text of an auth bundle file. Accepted forms:
 *
 * - `{ "cookies": {…}, "headers": {…} }`, either key optional
 * - a flat `{ name: value }` map, taken as cookies
 * - a Cookie-Editor array of `{ name, value }` objects
 * - a Netscape cookie file
 */
export function parseAuthBundle(content: string, source: string): AuthBundle {
  const trimmed = content.trim();

  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    const cookies = parseNetscapeCookies(content);
    if (Object.keys(cookies).length === 0) {
      throw authBundleInvalid(source, "not JSON and no Netscape cookie lines found");
    }
    return { cookies, headers: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    throw authBundleInvalid(source, (error as Error).message);
  }

  if (Array.isArray(parsed)) {
    const result = CookieArraySchema.safeParse(parsed);
    if (!result.success) {
      throw authBundleInvalid(source, "cookie array entries need string name and value");
    }
    const cookies: Record<string, string> = {};
    for (const cookie of result.data) cookies[cookie.name] = cookie.value;
    return { cookies, headers: {} };
  }

  if (typeof parsed === "object" && parsed !== null && ("cookies" in parsed || "headers" in parsed)) {
    const result = BundleSchema.safeParse(parsed);
    if (!result.success) {
      throw authBundleInvalid(
        source,
        result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
      );
    }
    return normalizeAuthBundle({
      cookies: result.data.cookies ?? {},
      headers: result.data.headers ?? {},
    });
  }

  // Legacy format: a flat cookie map
  const flat = StringMapSchema.safeParse(parsed);
  if (!flat.success) {
    throw authBundleInvalid(source, "expected string values");
  }
  return { cookies: flat.data, headers: {} };
}

/**
 * Read an auth bundle. A missing file is an error only when `required`;
 * otherwise the run proceeds without credentials.
 */
export async function loadAuthBundle(
  path: string,
  options: { required: boolean }
): Promise<AuthBundle | undefined> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      if (options.required) throw authBundleNotFound(path);
      return undefined;
    }
    throw authBundleInvalid(path, error instanceof Error ? error.message : String(error));
  }
  return parseAuthBundle(content, path);
}

export async function saveAuthBundle(path: string, bundle: AuthBundle): Promise<void> {
  await writeFile(path, `${JSON.stringify(bundle, null, 2)}\n`, { encoding: "utf-8", mode: 0o600 });
}
