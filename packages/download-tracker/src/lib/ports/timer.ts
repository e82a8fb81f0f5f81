/**
 * Abstraction for timer operations.
 * Lets tests drive wait timeouts without real time passing.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}
