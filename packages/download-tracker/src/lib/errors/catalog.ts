import { DownloadError } from "./types.js";

/**
 * Error catalog - factory functions for every DownloadError the tracker raises.
 * Callers never build DownloadErrors by hand so messages stay consistent.
 */

// ============================================================================
// Download Errors
// ============================================================================

export function pathUnavailableRemotely(downloadId: string): DownloadError {
  return new DownloadError(
    "DOWNLOAD_UNSUPPORTED_OPERATION",
    "Path is not available when connected to a remote browser",
    {
      suggestion: "Use saveAs() to store a local copy instead",
      downloadId,
    }
  );
}

export function unsupportedOperation(
  operation: string,
  downloadId: string
): DownloadError {
  return new DownloadError(
    "DOWNLOAD_UNSUPPORTED_OPERATION",
    `${operation}() is not supported by this backend`,
    { downloadId }
  );
}

export function downloadNotCompleted(
  downloadId: string,
  reason: string
): DownloadError {
  return new DownloadError(
    "DOWNLOAD_NOT_COMPLETED",
    `Download did not complete: ${reason}`,
    {
      suggestion: "Check failure() before saving the download",
      downloadId,
    }
  );
}

export function artifactDeleted(downloadId: string): DownloadError {
  return new DownloadError(
    "DOWNLOAD_IO_ERROR",
    "Download artifact has already been deleted",
    { downloadId }
  );
}

/**
 * Wrap a filesystem failure. The Node error code (ENOENT, EACCES, ...)
 * goes into `details` and the original error into `cause`.
 */
export function ioError(
  action: string,
  path: string,
  cause: unknown,
  downloadId?: string
): DownloadError {
  const errno = errnoCode(cause);
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new DownloadError("DOWNLOAD_IO_ERROR", `Can't ${action} "${path}"`, {
    suggestion:
      errno === "ENOENT"
        ? "Check that the destination directory exists"
        : errno === "EACCES" || errno === "EPERM"
          ? "Check permissions on the destination"
          : undefined,
    details: reason,
    downloadId,
    cause,
  });
}

// ============================================================================
// Transport Errors
// ============================================================================

export function transportDisconnected(reason?: string): DownloadError {
  return new DownloadError(
    "TRANSPORT_DISCONNECTED",
    "Lost connection to the browser backend",
    {
      suggestion: "Check that the browser is still running",
      details: reason,
    }
  );
}

export function protocolError(details: string): DownloadError {
  return new DownloadError(
    "TRANSPORT_PROTOCOL",
    "Received a malformed message from the browser backend",
    { details }
  );
}

// ============================================================================
// Context Errors
// ============================================================================

export function contextClosed(): DownloadError {
  return new DownloadError("CONTEXT_CLOSED", "Browsing context has been closed");
}

export function waitTimeout(timeoutMs: number): DownloadError {
  return new DownloadError(
    "WAIT_TIMEOUT",
    `Timed out after ${timeoutMs}ms waiting for a download`,
    { suggestion: "Raise --timeout or check that the action starts a download" }
  );
}

// ============================================================================
// Configuration Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): DownloadError {
  const details =
    issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new DownloadError("CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function invalidOption(optionName: string, reason: string): DownloadError {
  return new DownloadError("CONFIG_INVALID", `Invalid --${optionName}: ${reason}`);
}

// ============================================================================
// Helpers
// ============================================================================

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
