/**
 * Global CLI context for options shared by every command.
 */

export interface CLIContext {
  /** Print the machine-readable result instead of the human report */
  json: boolean;
  /** Suppress spinners and progress logs */
  quiet: boolean;
  /** Skip confirmation prompts (auto-yes) */
  yes: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function envFlag(name: string): boolean {
  const value = process.env[name];
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(argv: string[] = process.argv): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || envFlag("ARCPULL_JSON")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || envFlag("ARCPULL_QUIET")) {
    currentContext.quiet = true;
  }

  if (argv.includes("--yes") || argv.includes("-y") || envFlag("ARCPULL_YES")) {
    currentContext.yes = true;
  }

  if (argv.includes("--no-input") || process.env.CI || envFlag("ARCPULL_NO_INPUT")) {
    currentContext.noInput = true;
  }

  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

export function shouldAutoConfirm(): boolean {
  return currentContext.yes;
}

/**
 * True when nobody can answer a prompt: --no-input, CI, or stdin/stdout
 * not attached to a terminal.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdout.isTTY || !process.stdin.isTTY;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
