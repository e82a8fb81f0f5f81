import chalk from "chalk";
import { DownloadError, isDownloadError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Format an error for a terminal. Returns the lines without printing them.
 */
export function formatStaticError(error: DownloadError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.downloadId) {
    output.push(`  ${chalk.dim(`download ${error.downloadId}`)}`);
  }

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  output.push("");
  return output;
}

/**
 * Format an error as a JSON document, dropping unset fields.
 */
export function formatJsonError(error: DownloadError): string {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    downloadId: error.downloadId,
    suggestion: error.suggestion,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  return JSON.stringify(cleaned, null, 2);
}

export function renderError(error: DownloadError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      console.error(formatJsonError(error));
      break;
    case "static":
      for (const line of formatStaticError(error)) {
        console.error(line);
      }
      break;
  }
}

/**
 * Convert an unknown error to a DownloadError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isDownloadError(error)) {
    renderError(error, mode);
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  renderError(new DownloadError("UNKNOWN_ERROR", message, { cause: error }), mode);
}

export { DownloadError, isDownloadError };
