/**
 * Error codes for startup and command errors.
 * Any of these ends the command before a transfer is attempted.
 */
export type ErrorCode =
  // Configuration errors
  | "CONFIG_URLS_FILE_NOT_FOUND"
  | "CONFIG_URLS_FILE_UNREADABLE"
  | "CONFIG_OUTPUT_DIR_UNWRITABLE"
  | "CONFIG_AUTH_BUNDLE_NOT_FOUND"
  | "CONFIG_AUTH_BUNDLE_INVALID"
  | "CONFIG_LEDGER_CORRUPT"
  | "CONFIG_CURL_FILE_NOT_FOUND"
  // Validation errors
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  | "VALIDATION_CURL_EMPTY"
  | "VALIDATION_CONFIRMATION_REQUIRED"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Per-URL transfer failure codes. These never end a run; the transfer
 * engine turns them into a `failed` record.
 */
export type TransferErrorCode =
  | "TRANSFER_HTTP_STATUS"
  | "TRANSFER_PROTOCOL"
  | "TRANSFER_INTEGRITY"
  | "TRANSFER_NETWORK"
  | "TRANSFER_FILESYSTEM";

/**
 * Extended Error class for CLI errors with a suggested next step.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * A single URL's transfer failed. The message is what ends up in the
 * ledger's `errorMessage`.
 */
export class TransferError extends Error {
  readonly code: TransferErrorCode;
  readonly status?: number;

  constructor(
    code: TransferErrorCode,
    message: string,
    options?: { status?: number; cause?: Error }
  ) {
    super(message, { cause: options?.cause });
    this.name = "TransferError";
    this.code = code;
    this.status = options?.status;
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError;
}
