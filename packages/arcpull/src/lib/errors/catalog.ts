import { CLIError, TransferError, isTransferError } from "./types.js";

/**
 * Error catalog - factory functions for every error the tool raises, so the
 * same situation always reads the same way in the terminal and the ledger.
 */

// ============================================================================
// Configuration Errors
// ============================================================================

export function urlsFileNotFound(path: string): CLIError {
  return new CLIError("CONFIG_URLS_FILE_NOT_FOUND", `Can't find URL list "${path}"`, {
    suggestion: "Pass a text file with one download link per line",
    example: "arcpull download urls.txt -o ./downloads",
  });
}

export function urlsFileUnreadable(path: string, reason?: string): CLIError {
  return new CLIError("CONFIG_URLS_FILE_UNREADABLE", `Can't read URL list "${path}"`, {
    suggestion: "Check file permissions",
    details: reason,
  });
}

export function outputDirUnwritable(path: string, reason?: string): CLIError {
  return new CLIError("CONFIG_OUTPUT_DIR_UNWRITABLE", `Can't write to output directory "${path}"`, {
    suggestion: "Choose a directory you can write to with --output-dir",
    details: reason,
  });
}

export function authBundleNotFound(path: string): CLIError {
  return new CLIError("CONFIG_AUTH_BUNDLE_NOT_FOUND", `Can't find auth bundle "${path}"`, {
    suggestion: "Create one from a copied cURL command",
    example: "arcpull auth import-curl request.txt",
  });
}

export function authBundleInvalid(path: string, reason: string): CLIError {
  return new CLIError("CONFIG_AUTH_BUNDLE_INVALID", `Auth bundle "${path}" is not usable`, {
    suggestion: 'Expected {"cookies": {...}, "headers": {...}}, a cookie map, a cookie array or a Netscape cookie file',
    details: reason,
  });
}

export function curlFileNotFound(path: string): CLIError {
  return new CLIError("CONFIG_CURL_FILE_NOT_FOUND", `Can't find cURL command file "${path}"`, {
    suggestion: "Save the copied command to a text file first",
    example: "arcpull auth import-curl request.txt",
  });
}

export function ledgerCorrupt(path: string, reason: string): CLIError {
  return new CLIError("CONFIG_LEDGER_CORRUPT", `Progress file "${path}" is not valid JSON`, {
    suggestion: "Move it aside to start over; downloaded files are kept and resumed",
    details: reason,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingArgument(argName: string, command: string, example?: string): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion: `The "${command}" command requires ${argName}`,
    example: example ?? `arcpull ${command} --help`,
  });
}

export function invalidOption(optionName: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`);
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function emptyCurlCommand(path: string): CLIError {
  return new CLIError("VALIDATION_CURL_EMPTY", `No cookies or headers found in "${path}"`, {
    suggestion: "Copy the archive request from your browser's network panel with \"Copy as cURL\"",
  });
}

export function confirmationRequired(action: string): CLIError {
  return new CLIError("VALIDATION_CONFIRMATION_REQUIRED", `Refusing to ${action} without confirmation`, {
    suggestion: "Pass --yes to confirm when no terminal is attached",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function unexpectedStatus(status: number, statusText?: string): TransferError {
  const text = statusText ? ` ${statusText}` : "";
  return new TransferError("TRANSFER_HTTP_STATUS", `Unexpected HTTP status ${status}${text}`, {
    status,
  });
}

export function rangeMismatch(expectedOffset: number, contentRange: string | null): TransferError {
  return new TransferError(
    "TRANSFER_PROTOCOL",
    `Server resumed at the wrong offset (expected ${expectedOffset}, got "${contentRange ?? "no Content-Range"}")`
  );
}

export function rangeNotSatisfiable(offset: number): TransferError {
  return new TransferError(
    "TRANSFER_PROTOCOL",
    `Server rejected resume from byte ${offset}; partial file discarded`,
    { status: 416 }
  );
}

export function notAnArchive(): TransferError {
  return new TransferError(
    "TRANSFER_INTEGRITY",
    "Not a valid archive, likely an authentication page"
  );
}

export function missingBody(): TransferError {
  return new TransferError("TRANSFER_PROTOCOL", "Response has no body");
}

export function idleTimeout(ms: number): TransferError {
  return new TransferError("TRANSFER_NETWORK", `No data received for ${ms}ms`);
}

/**
 * Read the errno-style code a Node or fetch error carries, looking one
 * level into `cause` where undici puts the socket error.
 */
function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") return error.code;
  const cause = error.cause;
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

const FILESYSTEM_CODES = new Set(["ENOSPC", "EACCES", "EPERM", "EROFS", "EISDIR", "EMFILE", "EDQUOT"]);

/**
 * Classify anything thrown during a transfer into a TransferError with a
 * readable message, e.g. "fetch failed (ECONNRESET)".
 */
export function toTransferError(error: unknown): TransferError {
  if (isTransferError(error)) return error;

  if (!(error instanceof Error)) {
    return new TransferError("TRANSFER_NETWORK", String(error));
  }

  const code = errorCode(error);
  const message = code && !error.message.includes(code)
    ? `${error.message} (${code})`
    : error.message;

  if (code && FILESYSTEM_CODES.has(code)) {
    return new TransferError("TRANSFER_FILESYSTEM", message, { cause: error });
  }
  return new TransferError("TRANSFER_NETWORK", message, { cause: error });
}
