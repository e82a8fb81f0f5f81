/**
 * JSON output for machine-readable CLI results.
 */

import type { Download } from "./downloads/download.js";
import type { DownloadStatus } from "./downloads/state.js";
import { failureReason } from "./downloads/state.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    contextId?: string;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadJson {
  id: string;
  url: string;
  pageId: string;
  suggestedFilename: string;
  status: DownloadStatus;
  reason?: string;
}

export interface SaveResultJson {
  download: DownloadJson;
  savedTo?: string;
}

export interface ListenEventJson {
  type: "start" | "download" | "finished" | "stop";
  timestamp: string;
  data?: {
    download?: DownloadJson;
    endpoint?: string;
    total?: number;
  };
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Snapshot of a download. `reason` is only present once it has failed or
 * been canceled.
 */
export function toDownloadJson(download: Download): DownloadJson {
  const state = download.state();
  const json: DownloadJson = {
    id: download.id,
    url: download.url(),
    pageId: download.page().id,
    suggestedFilename: download.suggestedFilename(),
    status: state.status,
  };
  if (state.status !== "in-progress") {
    const reason = failureReason(state);
    if (reason !== null) json.reason = reason;
  }
  return json;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (for streaming, like listen).
 */
export function outputNdjson(event: ListenEventJson): void {
  console.log(JSON.stringify(event));
}
