import { normalizeAuthBundle, parseCookieHeader, type AuthBundle } from "./auth-bundle.js";

/**
 * Split a shell command line into words the way a POSIX shell would for the
 * subset that "Copy as cURL" produces: single quotes, double quotes with
 * backslash escapes, ANSI-C `$'…'` strings and backslash-newline
 * continuations.
 */
export function tokenizeShellWords(command: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let i = 0;

  const flush = () => {
    if (inWord) words.push(current);
    current = "";
    inWord = false;
  };

  while (i < command.length) {
    const ch = command[i];

    if (ch === "\\" && (command[i + 1] === "\n" || command[i + 1] === "\r")) {
      // Line continuation
      i += command[i + 1] === "\r" && command[i + 2] === "\n" ? 3 : 2;
      continue;
    }

    if (/\s/.test(ch)) {
      flush();
      i++;
      continue;
    }

    inWord = true;

    if (ch === "'") {
      const end = command.indexOf("'", i + 1);
      const stop = end === -1 ? command.length : end;
      current += command.slice(i + 1, stop);
      i = stop + 1;
      continue;
    }

    if (ch === "$" && command[i + 1] === "'") {
      i += 2;
      while (i < command.length && command[i] !== "'") {
        if (command[i] === "\\" && i + 1 < command.length) {
          const next = command[i + 1];
          current += next === "n" ? "\n" : next === "t" ? "\t" : next;
          i += 2;
        } else {
          current += command[i];
          i++;
        }
      }
      i++;
      continue;
    }

    if (ch === '"') {
      i++;
      while (i < command.length && command[i] !== '"') {
        if (command[i] === "\\" && i + 1 < command.length && '"\\$`'.includes(command[i + 1])) {
          current += command[i + 1];
          i += 2;
        } else {
          current += command[i];
          i++;
        }
      }
      i++;
      continue;
    }

    if (ch === "\\" && i + 1 < command.length) {
      current += command[i + 1];
      i += 2;
      continue;
    }

    current += ch;
    i++;
  }

  flush();
  return words;
}

const HEADER_FLAGS = new Set(["-H", "--header"]);
const COOKIE_FLAGS = new Set(["-b", "--cookie"]);

/** Headers that describe one particular request, not the session */
const REQUEST_SPECIFIC_HEADERS = new Set(["range", "content-length", "host", "if-range"]);

/**
 * Pull cookies and headers out of a "Copy as cURL" command.
 * Cookies given with `-b` and in a `Cookie:` header are merged; `-b`
 * values win.
 */
export function parseCurlCommand(command: string): AuthBundle {
  const words = tokenizeShellWords(command);
  const headers: Record<string, string> = {};
  let cookies: Record<string, string> = {};

  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    let headerValue: string | undefined;
    let cookieValue: string | undefined;

    if (HEADER_FLAGS.has(word)) {
      headerValue = words[++i];
    } else if (word.startsWith("--header=")) {
      headerValue = word.slice("--header=".length);
    } else if (COOKIE_FLAGS.has(word)) {
      cookieValue = words[++i];
    } else if (word.startsWith("--cookie=")) {
      cookieValue = word.slice("--cookie=".length);
    }

    if (headerValue !== undefined) {
      const colon = headerValue.indexOf(":");
      if (colon <= 0) continue;
      const name = headerValue.slice(0, colon).trim();
      const value = headerValue.slice(colon + 1).trim();
      if (!REQUEST_SPECIFIC_HEADERS.has(name.toLowerCase())) {
        headers[name] = value;
      }
    }

    // Without "=" curl treats the argument as a cookie jar file name
    if (cookieValue !== undefined && cookieValue.includes("=")) {
      cookies = { ...cookies, ...parseCookieHeader(cookieValue) };
    }
  }

  return normalizeAuthBundle({ cookies, headers });
}
