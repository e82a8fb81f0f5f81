import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { Session } from "../lib/session.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import { createProcessSignalHandler } from "../lib/adapters/process-signals.js";
import { invalidOption } from "../lib/errors/catalog.js";
import {
  outputNdjson,
  toDownloadJson,
  type DownloadJson,
  type ListenEventJson,
} from "../lib/json-output.js";
import type { CommandRuntime, RuntimeContext } from "../lib/command-runtime.js";

export interface ListenOptions {
  count?: string;
}

export interface ListenParams {
  /** Stop after this many downloads reach a terminal state; null runs until signalled */
  count: number | null;
}

/**
 * Dependencies for listen operations.
 * All have sensible defaults for production use.
 */
export interface ListenDeps {
  signalHandler?: SignalHandler;
}

// ---------------------------------------------------------------------------
// Validation (Pure Functions)
// ---------------------------------------------------------------------------

export function parseCount(value: string): number {
  const n = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(n) || n < 1) {
    throw invalidOption("count", `expected a positive integer, got "${value}"`);
  }
  return n;
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

export function formatFinishedLine(download: DownloadJson): string {
  switch (download.status) {
    case "completed":
      return `${chalk.green("✓")} ${download.id} ${download.suggestedFilename || download.url}`;
    case "canceled":
      return `${chalk.yellow("–")} ${download.id} canceled`;
    default:
      return `${chalk.red("✗")} ${download.id} ${download.reason ?? download.status}`;
  }
}

export function renderSummary(downloads: DownloadJson[]): string {
  const table = new CliTable3({
    head: [chalk.cyan("Download"), chalk.cyan("File"), chalk.cyan("Status"), chalk.cyan("Reason")],
    style: { head: [], border: [] },
  });

  for (const download of downloads) {
    table.push([
      download.id,
      download.suggestedFilename || "-",
      download.status,
      download.reason ?? "",
    ]);
  }

  return table.toString();
}

function emit(type: ListenEventJson["type"], data?: ListenEventJson["data"]): void {
  outputNdjson({ type, timestamp: new Date().toISOString(), ...(data && { data }) });
}

// ---------------------------------------------------------------------------
// Core Listen Logic
// ---------------------------------------------------------------------------

/**
 * Report every download in the session as it finishes, until `count` have
 * finished, the backend goes away, or a shutdown signal arrives.
 *
 * @returns the finished downloads, in the order they finished
 */
export async function listenForDownloads(
  session: Session,
  params: ListenParams,
  ctx: RuntimeContext,
  signalHandler: SignalHandler
): Promise<DownloadJson[]> {
  const { logger, mode } = ctx;
  const finished: DownloadJson[] = [];

  if (mode === "json") {
    emit("start", { endpoint: ctx.config.endpoint });
  } else {
    console.error(chalk.gray(`Listening for downloads on ${ctx.config.endpoint}`));
  }

  await new Promise<void>((resolve) => {
    let stopped = false;
    const unsubscribers: Array<() => void> = [];

    const stop = () => {
      if (stopped) return;
      stopped = true;
      for (const unsubscribe of unsubscribers) unsubscribe();
      resolve();
    };

    const onFinished = (json: DownloadJson) => {
      if (stopped) return;
      finished.push(json);

      if (mode === "json") {
        emit("finished", { download: json });
      } else {
        console.log(formatFinishedLine(json));
      }

      if (params.count !== null && finished.length >= params.count) {
        stop();
      }
    };

    unsubscribers.push(
      session.context.onDownload(null, (download) => {
        if (mode === "json") {
          emit("download", { download: toDownloadJson(download) });
        }

        void download.failure().then(
          () => onFinished(toDownloadJson(download)),
          (error: unknown) => {
            logger.debug("Stopped tracking download", { downloadId: download.id, error });
          }
        );
      })
    );

    unsubscribers.push(
      session.transport.on("disconnect", (reason) => {
        logger.info("Stopping: backend disconnected", { reason });
        stop();
      })
    );

    signalHandler.onShutdown(async () => stop());
  });

  if (mode === "json") {
    emit("stop", { total: finished.length });
  } else if (finished.length > 0) {
    console.log(renderSummary(finished));
  } else {
    console.error(chalk.gray("No downloads finished"));
  }

  return finished;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerListenCommand(
  program: Command,
  runtime: CommandRuntime,
  deps: ListenDeps = {}
): void {
  program
    .command("listen")
    .description("Report downloads as they finish")
    .option("-n, --count <n>", "Stop after this many downloads have finished")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  dltrack listen
      ${chalk.gray("Report downloads until Ctrl+C")}

  dltrack listen --count 3 --json
      ${chalk.gray("Stream NDJSON events for the next three downloads")}
`
    )
    .action(async (options: ListenOptions, command: Command) => {
      const count = options.count !== undefined ? parseCount(options.count) : null;

      await runtime.withSession(command, async (session, ctx) => {
        const signalHandler = deps.signalHandler ?? createProcessSignalHandler(ctx.logger);
        try {
          await listenForDownloads(session, { count }, ctx, signalHandler);
        } finally {
          signalHandler.removeAll();
        }
      });
    });
}
