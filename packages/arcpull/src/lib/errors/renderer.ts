import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { isJsonMode } from "../cli-context.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Wrap text to fit within a given width, indenting continuation lines.
 */
export function wrapText(text: string, maxWidth: number, indent = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Build the human-readable lines for an error.
 */
export function formatError(error: CLIError, width = 80): string[] {
  const termWidth = Math.min(width, 80);
  const output: string[] = [""];

  const [first = "", ...rest] = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    // Details may be a bullet list; wrap each line on its own
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, termWidth - 4, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion) {
    output.push("");
    const [head = "", ...tail] = wrapText(error.suggestion, termWidth - 4, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
    for (const line of tail) {
      output.push(`    ${line}`);
    }
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

function renderJSONError(error: CLIError): void {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  console.error(JSON.stringify(cleaned, null, 2));
}

/**
 * Render an error to stderr in the current output mode.
 */
export function renderError(error: CLIError, json = isJsonMode()): void {
  if (json) {
    renderJSONError(error);
    return;
  }
  for (const line of formatError(error, process.stderr.columns || 80)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, json = isJsonMode()): void {
  if (isCLIError(error)) {
    renderError(error, json);
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  renderError(
    new CLIError("UNKNOWN_ERROR", message, {
      cause: error instanceof Error ? error : undefined,
    }),
    json
  );
}

export { CLIError, isCLIError };
