export { realTimerService } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createTransportEventHub, type TransportEventHub } from "./transport-events.js";
export {
  createSocketTransport,
  connectSocketTransport,
  parseEndpoint,
} from "./socket-transport.js";
export {
  createMemoryTransport,
  type MemoryTransport,
  type MemoryTransportOptions,
} from "./memory-transport.js";
