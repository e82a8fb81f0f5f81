import type { TransportEvents, Unsubscribe } from "../ports/transport.js";
import type { BackendEvent } from "../downloads/events.js";
import type { Logger } from "../logger.js";

type HandlerSets = { [K in keyof TransportEvents]: Set<TransportEvents[K]> };

export interface TransportEventHub {
  on<K extends keyof TransportEvents>(event: K, handler: TransportEvents[K]): Unsubscribe;
  emitEvent(event: BackendEvent): void;
  /** Delivers at most once; later calls are ignored */
  emitDisconnect(reason?: string): void;
  isDisconnected(): boolean;
}

/**
 * Handler bookkeeping shared by the transport adapters.
 * A throwing handler is logged and does not stop delivery to the others.
 */
export function createTransportEventHub(logger: Logger): TransportEventHub {
  const handlers: HandlerSets = {
    event: new Set(),
    disconnect: new Set(),
  };
  let disconnected = false;

  function on<K extends keyof TransportEvents>(
    event: K,
    handler: TransportEvents[K]
  ): Unsubscribe {
    const set: Set<TransportEvents[K]> = handlers[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  function deliver(name: keyof TransportEvents, call: () => void): void {
    try {
      call();
    } catch (error) {
      logger.error("Transport handler threw", { event: name, error });
    }
  }

  function emitEvent(event: BackendEvent): void {
    for (const handler of [...handlers.event]) {
      deliver("event", () => handler(event));
    }
  }

  function emitDisconnect(reason?: string): void {
    if (disconnected) return;
    disconnected = true;
    for (const handler of [...handlers.disconnect]) {
      deliver("disconnect", () => handler(reason));
    }
  }

  return { on, emitEvent, emitDisconnect, isDisconnected: () => disconnected };
}
