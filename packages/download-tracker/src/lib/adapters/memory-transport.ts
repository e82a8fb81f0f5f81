import type { Readable } from "stream";
import type { DownloadTransport } from "../ports/transport.js";
import type { BackendEvent } from "../downloads/events.js";
import type { Logger } from "../logger.js";
import { createNoopLogger } from "../logger.js";
import { transportDisconnected } from "../errors/catalog.js";
import { createTransportEventHub } from "./transport-events.js";

export interface MemoryTransportOptions {
  /** Called for every cancel request; defaults to acknowledging immediately */
  onCancel?: (id: string) => Promise<void>;
  onDelete?: (id: string) => Promise<void>;
  /** Enables remote-mode artifact streaming */
  openArtifact?: (id: string) => Promise<Readable>;
  logger?: Logger;
}

/**
 * In-process transport. The embedding code (or a test) pushes backend
 * events with `emit` and observes the requests the tracker sent.
 */
export interface MemoryTransport extends DownloadTransport {
  emit(event: BackendEvent): void;
  disconnect(reason?: string): void;
  readonly cancelRequests: readonly string[];
  readonly deleteRequests: readonly string[];
}

export function createMemoryTransport(options: MemoryTransportOptions = {}): MemoryTransport {
  const logger = options.logger ?? createNoopLogger();
  const hub = createTransportEventHub(logger);
  const cancelRequests: string[] = [];
  const deleteRequests: string[] = [];

  function ensureConnected(): void {
    if (hub.isDisconnected()) {
      throw transportDisconnected("request after disconnect");
    }
  }

  const transport: MemoryTransport = {
    on: hub.on,
    emit: (event) => hub.emitEvent(event),
    disconnect: (reason) => hub.emitDisconnect(reason),
    cancelRequests,
    deleteRequests,

    async cancelDownload(id) {
      ensureConnected();
      cancelRequests.push(id);
      await options.onCancel?.(id);
    },

    async deleteArtifact(id) {
      ensureConnected();
      deleteRequests.push(id);
      await options.onDelete?.(id);
    },

    async close() {
      hub.emitDisconnect("transport closed");
    },
  };

  const { openArtifact } = options;
  if (openArtifact) {
    transport.openArtifact = async (id) => {
      ensureConnected();
      return openArtifact(id);
    };
  }

  return transport;
}
