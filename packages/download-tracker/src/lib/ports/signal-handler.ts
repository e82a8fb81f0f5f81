/**
 * Abstraction for process signal handling.
 * Lets tests trigger shutdown without sending real signals.
 */
export interface SignalHandler {
  /** Register a callback for shutdown signals (SIGTERM, SIGINT) */
  onShutdown(callback: () => Promise<void>): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
