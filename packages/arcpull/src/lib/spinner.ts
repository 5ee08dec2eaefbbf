/**
 * Progress indicator for the startup checks of a run.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  succeed(text: string): void;
  fail(text: string): void;
}

const silent: Spinner = {
  succeed: () => {},
  fail: () => {},
};

function oraSpinner(text: string): Spinner {
  // stderr keeps stdout clean for redirected reports
  const spinner: Ora = ora({ text, stream: process.stderr }).start();
  return {
    succeed: (done) => {
      spinner.succeed(done);
    },
    fail: (failed) => {
      spinner.fail(failed);
    },
  };
}

function createSpinner(text: string): Spinner {
  if (isQuietMode() || isJsonMode()) return silent;
  return oraSpinner(text);
}

/**
 * Run `task` behind a spinner. The spinner ends with `describe(result)` on
 * success or `failText` when the task throws; the error is rethrown.
 */
export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  describe: (result: T) => string,
  failText: string
): Promise<T> {
  const spinner = createSpinner(text);
  let result: T;
  try {
    result = await task();
  } catch (error) {
    spinner.fail(failText);
    throw error;
  }
  spinner.succeed(describe(result));
  return result;
}
