/**
 * Error codes for every failure the tracker can surface.
 * A download that the browser reports as failed is NOT one of these:
 * it is a terminal state, read back through `failure()`.
 */
export type ErrorCode =
  // Download errors
  | "DOWNLOAD_UNSUPPORTED_OPERATION"
  | "DOWNLOAD_IO_ERROR"
  | "DOWNLOAD_NOT_COMPLETED"
  // Transport errors
  | "TRANSPORT_DISCONNECTED"
  | "TRANSPORT_PROTOCOL"
  // Context errors
  | "CONTEXT_CLOSED"
  | "WAIT_TIMEOUT"
  // Configuration
  | "CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

/** Codes that mean the backend connection, not the download, went wrong. */
const TRANSPORT_CODES: ReadonlySet<ErrorCode> = new Set([
  "TRANSPORT_DISCONNECTED",
  "TRANSPORT_PROTOCOL",
]);

/**
 * Error raised by download handles, browsing contexts and the CLI.
 */
export class DownloadError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly details?: string;
  readonly downloadId?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      details?: string;
      downloadId?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "DownloadError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.details = options?.details;
    this.downloadId = options?.downloadId;
  }
}

export function isDownloadError(error: unknown): error is DownloadError {
  return error instanceof DownloadError;
}

/**
 * True when the error came from the backend connection rather than from
 * the download itself.
 */
export function isTransportError(error: unknown): error is DownloadError {
  return isDownloadError(error) && TRANSPORT_CODES.has(error.code);
}
