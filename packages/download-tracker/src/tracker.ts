/**
 * Library entry point for embedding the tracker without the CLI.
 */

export {
  createBrowsingContext,
  type BrowsingContext,
  type BrowsingContextOptions,
} from "./lib/downloads/browsing-context.js";
export type { Download, Page, ArtifactMode } from "./lib/downloads/download.js";
export type { DownloadState, DownloadStatus } from "./lib/downloads/state.js";
export {
  parseBackendEvent,
  type BackendEvent,
  type BackendRequest,
} from "./lib/downloads/events.js";
export { DownloadError, isDownloadError, isTransportError, type ErrorCode } from "./lib/errors/types.js";
export { createLogger, createNoopLogger, type Logger } from "./lib/logger.js";
export * from "./lib/ports/index.js";
export * from "./lib/adapters/index.js";
