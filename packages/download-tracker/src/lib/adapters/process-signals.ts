import type { SignalHandler } from "../ports/signal-handler.js";
import type { Logger } from "../logger.js";

/**
 * Create a signal handler for SIGTERM/SIGINT.
 * Runs every registered callback once; a second signal while they run is ignored.
 */
export function createProcessSignalHandler(logger: Logger): SignalHandler {
  const handlers: Array<() => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (isHandling) return;
    isHandling = true;
    logger.info("Shutting down", { signal });

    void Promise.allSettled(handlers.map((h) => h())).then((results) => {
      for (const result of results) {
        if (result.status === "rejected") {
          logger.error("Shutdown handler failed", { error: result.reason });
          process.exitCode = 1;
        }
      }
    });
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}
