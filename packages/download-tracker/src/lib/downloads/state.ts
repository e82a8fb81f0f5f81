// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DownloadState =
  | { status: "in-progress" }
  | { status: "completed"; artifactPath: string | null }
  | { status: "failed"; reason: string }
  | { status: "canceled" };

export type DownloadStatus = DownloadState["status"];

export type TerminalState = Exclude<DownloadState, { status: "in-progress" }>;

/** What `failure()` reports for a canceled download */
export const CANCELED_REASON = "canceled";

/**
 * Holds one download's state and wakes every waiter when it turns terminal.
 */
export interface StateCell {
  /** Snapshot of the current state */
  current(): DownloadState;
  isTerminal(): boolean;
  /** True once the connection was lost before a terminal state arrived */
  isInterrupted(): boolean;
  /**
   * Move to a terminal state. Only the first call (and only before an
   * interrupt) has any effect; returns whether this call won.
   */
  settle(state: TerminalState): boolean;
  /** Release every waiter, now and later, with `error`. State stays in-progress. */
  interrupt(error: Error): boolean;
  /**
   * Force a terminal state, even after an interrupt. Waiters already
   * released by an interrupt keep their rejection.
   */
  abandon(state: TerminalState): boolean;
  /** Resolves with the terminal state, rejects with the interrupt error */
  wait(): Promise<TerminalState>;
}

type Outcome =
  | { kind: "settled"; state: TerminalState }
  | { kind: "interrupted"; error: Error };

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createStateCell(): StateCell {
  let state: DownloadState = { status: "in-progress" };
  let interrupted = false;
  let resolveOutcome: (outcome: Outcome) => void = () => {};

  // Never rejects. wait() turns an interrupt into a rejection per caller.
  const outcome = new Promise<Outcome>((resolve) => {
    resolveOutcome = resolve;
  });

  function isTerminal(): boolean {
    return state.status !== "in-progress";
  }

  function settle(next: TerminalState): boolean {
    if (isTerminal() || interrupted) return false;
    state = next;
    resolveOutcome({ kind: "settled", state: next });
    return true;
  }

  function interrupt(error: Error): boolean {
    if (isTerminal() || interrupted) return false;
    interrupted = true;
    resolveOutcome({ kind: "interrupted", error });
    return true;
  }

  function abandon(next: TerminalState): boolean {
    if (isTerminal()) return false;
    state = next;
    if (!interrupted) {
      resolveOutcome({ kind: "settled", state: next });
    }
    return true;
  }

  async function wait(): Promise<TerminalState> {
    const result = await outcome;
    if (result.kind === "interrupted") {
      throw result.error;
    }
    return result.state;
  }

  return {
    current: () => state,
    isTerminal,
    isInterrupted: () => interrupted,
    settle,
    interrupt,
    abandon,
    wait,
  };
}

/**
 * Failure diagnostic for a terminal state, or null when it completed.
 */
export function failureReason(state: TerminalState): string | null {
  switch (state.status) {
    case "completed":
      return null;
    case "failed":
      return state.reason;
    case "canceled":
      return CANCELED_REASON;
  }
}
