import type { SignalHandler } from "../ports/signal-handler.js";

/** Conventional exit status for a run stopped by a signal */
const INTERRUPTED_EXIT_CODE = 130;

/**
 * Create a signal handler for process shutdown signals.
 * A second signal while handlers run exits immediately.
 */
export function createProcessSignalHandler(): SignalHandler {
  const handlers: Array<() => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = async () => {
    if (isHandling) {
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    isHandling = true;
    try {
      await Promise.all(handlers.map((h) => h()));
    } finally {
      process.exit(INTERRUPTED_EXIT_CODE);
    }
  };

  const onSignal = () => {
    void handleSignal();
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", onSignal);
        process.on("SIGINT", onSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", onSignal);
      process.off("SIGINT", onSignal);
    },
  };
}
