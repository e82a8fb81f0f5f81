import { Command } from "commander";
import chalk from "chalk";
import { statSync } from "fs";
import { join, resolve } from "path";
import type { Download } from "../lib/downloads/download.js";
import type { Session } from "../lib/session.js";
import type { OutputMode } from "../lib/output/mode.js";
import { createSpinner } from "../lib/spinner.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { outputSuccess, toDownloadJson, type SaveResultJson } from "../lib/json-output.js";
import type { CommandRuntime } from "../lib/command-runtime.js";

export interface SaveOptions {
  page?: string;
  timeout?: string;
}

export interface SaveParams {
  destination: string;
  pageId: string | null;
  timeoutMs: number;
}

// ---------------------------------------------------------------------------
// Validation (Pure Functions)
// ---------------------------------------------------------------------------

/**
 * Parse --timeout. 0 means wait forever.
 */
export function parseTimeout(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw invalidOption("timeout", `expected milliseconds, got "${value}"`);
  }
  return Number(value);
}

/**
 * A destination that is an existing directory receives the suggested
 * filename (or the download id when the browser suggested none).
 */
export function resolveDestination(
  destination: string,
  download: Download,
  isDirectory: (path: string) => boolean = directoryExists
): string {
  const target = resolve(destination);
  if (!isDirectory(target)) {
    return target;
  }
  const name = download.suggestedFilename() || download.id;
  return join(target, name);
}

function directoryExists(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * Wait for the next download, then copy it to `destination`.
 * A download that fails or is canceled is reported, not thrown.
 */
export async function saveNextDownload(
  session: Session,
  params: SaveParams,
  mode: OutputMode
): Promise<SaveResultJson> {
  const spinner = createSpinner(mode, "Waiting for a download").start();

  try {
    const download = await session.context.waitForDownload(params.pageId, () => {}, {
      timeoutMs: params.timeoutMs,
    });
    spinner.text = `Downloading ${download.suggestedFilename() || download.url()}`;

    const reason = await download.failure();
    if (reason !== null) {
      spinner.fail(`Download ${reason === "canceled" ? "canceled" : `failed: ${reason}`}`);
      return { download: toDownloadJson(download) };
    }

    const target = resolveDestination(params.destination, download);
    await download.saveAs(target);
    spinner.succeed(`Saved ${chalk.cyan(target)}`);

    return { download: toDownloadJson(download), savedTo: target };
  } catch (error) {
    spinner.stop();
    throw error;
  }
}

export function registerSaveCommand(program: Command, runtime: CommandRuntime): void {
  program
    .command("save")
    .description("Wait for the next download and copy it to a local path")
    .argument("<destination>", "File path, or an existing directory")
    .option("-p, --page <id>", "Only accept downloads started by this page")
    .option("-t, --timeout <ms>", "Give up after this many milliseconds (0 waits forever)")
    .action(async (destination: string, options: SaveOptions, command: Command) => {
      await runtime.withSession(command, async (session, ctx) => {
        const timeoutMs =
          options.timeout !== undefined ? parseTimeout(options.timeout) : ctx.config.waitTimeoutMs;

        const result = await saveNextDownload(
          session,
          { destination, pageId: options.page ?? null, timeoutMs },
          ctx.mode
        );

        if (ctx.mode === "json") {
          outputSuccess(result, { contextId: session.context.id });
        } else if (result.savedTo) {
          console.log(result.savedTo);
        }

        if (!result.savedTo) {
          process.exitCode = 1;
        }
      });
    });
}
