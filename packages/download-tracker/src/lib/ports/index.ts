export type { TimerService } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type { DownloadTransport, TransportEvents, Unsubscribe } from "./transport.js";
