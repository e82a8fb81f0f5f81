/**
 * Output mode detection for CLI rendering.
 */

export type OutputMode = "static" | "json";

/**
 * - `json`: one JSON document (or NDJSON line) per result, for scripting
 * - `static`: coloured human-readable text
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): OutputMode {
  if (argv.includes("--json")) {
    return "json";
  }

  if (env.DLTRACK_JSON === "1" || env.DLTRACK_JSON === "true") {
    return "json";
  }

  return "static";
}

/**
 * Spinners only make sense on an interactive terminal in static mode.
 */
export function canAnimate(mode: OutputMode): boolean {
  return mode === "static" && Boolean(process.stderr.isTTY) && process.env.TERM !== "dumb";
}
