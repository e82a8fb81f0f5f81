import type { Readable } from "stream";
import type { BackendEvent } from "../downloads/events.js";

/** Removes a handler registered with `on`. */
export type Unsubscribe = () => void;

export interface TransportEvents {
  /** Backend events, delivered in the order the backend sent them */
  event: (event: BackendEvent) => void;
  /** Fired once when the connection is lost */
  disconnect: (reason?: string) => void;
}

/**
 * Abstraction for the connection to a remote browser backend.
 * Allows testing the tracker without a browser.
 */
export interface DownloadTransport {
  on<K extends keyof TransportEvents>(event: K, handler: TransportEvents[K]): Unsubscribe;
  /** Ask the backend to cancel an in-progress download. Resolves on acknowledgment. */
  cancelDownload(id: string): Promise<void>;
  /** Remote mode: ask the backend to drop its copy of the artifact */
  deleteArtifact?(id: string): Promise<void>;
  /** Remote mode: stream the artifact bytes from the backend */
  openArtifact?(id: string): Promise<Readable>;
  close(): Promise<void>;
}
