import { copyFile, open, rm } from "fs/promises";
import { createWriteStream } from "fs";
import type { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { Logger } from "../logger.js";
import type { DownloadTransport } from "../ports/transport.js";
import {
  artifactDeleted,
  downloadNotCompleted,
  ioError,
  pathUnavailableRemotely,
  unsupportedOperation,
} from "../errors/catalog.js";
import { createFileLock } from "./file-lock.js";
import {
  createStateCell,
  failureReason,
  type DownloadState,
  type TerminalState,
} from "./state.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A page in the browsing context that owns downloads */
export interface Page {
  readonly id: string;
}

/**
 * `local`: the browser writes artifacts to a filesystem this process can read.
 * `remote`: the browser runs elsewhere; bytes only reach us through the transport.
 */
export type ArtifactMode = "local" | "remote";

/**
 * One browser-initiated download, as seen by callers.
 *
 * Accessors returning a promise wait for the download to reach a terminal
 * state. None of them time out on their own.
 */
export interface Download {
  readonly id: string;
  url(): string;
  /**
   * Filename computed by the browser from Content-Disposition or the
   * `download` attribute. Empty until the browser has resolved it.
   */
  suggestedFilename(): string;
  page(): Page;
  state(): DownloadState;
  /** No-op once the download is finished or canceled. */
  cancel(): Promise<void>;
  /** Readable over the artifact, or null when the download did not complete. */
  createReadStream(): Promise<Readable | null>;
  /** Remove the artifact. No-op for downloads that did not complete. */
  delete(): Promise<void>;
  /** Failure reason, `"canceled"` after cancellation, null on success. */
  failure(): Promise<string | null>;
  /**
   * Local artifact path, null when the download did not complete or its
   * artifact has been deleted.
   * The file name is a generated id; see {@link Download.suggestedFilename}.
   * Rejects immediately when connected to a remote browser.
   */
  path(): Promise<string | null>;
  /** Copy the artifact to `destination`, overwriting it. Safe to call mid-download. */
  saveAs(destination: string): Promise<void>;
}

/**
 * The tracker's side of a download: the signals that drive its state.
 * Only the owning browsing context holds one.
 */
export interface DownloadController {
  readonly download: Download;
  complete(artifactPath?: string, suggestedFilename?: string): boolean;
  fail(reason: string): boolean;
  markCanceled(): boolean;
  resolveFilename(suggestedFilename: string): void;
  interrupt(error: Error): boolean;
  /** Settle as canceled on context close, including after an interrupt */
  abandon(): boolean;
  isInProgress(): boolean;
  /** Remove whatever artifact exists, whatever the state. Used on context close. */
  discardArtifact(): Promise<void>;
}

export interface CreateDownloadOptions {
  id: string;
  url: string;
  page: Page;
  suggestedFilename?: string;
  /** Artifact location announced at creation; a finish event may override it */
  artifactPath?: string;
  mode: ArtifactMode;
  transport: DownloadTransport;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createDownload(options: CreateDownloadOptions): DownloadController {
  const { id, url, page, mode, transport } = options;
  const logger = options.logger.child({ downloadId: id });
  const cell = createStateCell();
  const lock = createFileLock();

  let suggestedFilename = options.suggestedFilename ?? "";
  let knownArtifactPath = options.artifactPath ?? null;
  let cancelRequest: Promise<void> | null = null;
  let deleted = false;

  function resolveFilename(filename: string): void {
    if (suggestedFilename === "") {
      suggestedFilename = filename;
    }
  }

  // -------------------------------------------------------------------------
  // Artifact access
  // -------------------------------------------------------------------------

  function completedArtifact(state: TerminalState, operation: string): string | null {
    if (state.status !== "completed") {
      throw downloadNotCompleted(id, failureReason(state) ?? state.status);
    }
    if (deleted) {
      throw artifactDeleted(id);
    }
    if (mode === "local" && state.artifactPath === null) {
      throw unsupportedOperation(operation, id);
    }
    return state.artifactPath;
  }

  async function openRemote(operation: string): Promise<Readable> {
    if (!transport.openArtifact) {
      throw unsupportedOperation(operation, id);
    }
    return transport.openArtifact(id);
  }

  async function removeArtifact(artifactPath: string | null): Promise<void> {
    if (mode === "remote") {
      if (transport.deleteArtifact) {
        await transport.deleteArtifact(id);
      }
      return;
    }
    if (artifactPath === null) return;
    try {
      await rm(artifactPath, { force: true });
    } catch (error) {
      throw ioError("delete", artifactPath, error, id);
    }
  }

  // -------------------------------------------------------------------------
  // Public handle
  // -------------------------------------------------------------------------

  const download: Download = {
    id,
    url: () => url,
    suggestedFilename: () => suggestedFilename,
    page: () => page,
    state: () => cell.current(),

    cancel(): Promise<void> {
      if (cell.isTerminal()) return Promise.resolve();
      if (cancelRequest) return cancelRequest;

      logger.debug("Requesting cancellation");
      cancelRequest = transport.cancelDownload(id);
      return cancelRequest;
    },

    async createReadStream(): Promise<Readable | null> {
      const state = await cell.wait();
      if (state.status !== "completed") return null;

      return lock.run(async () => {
        const artifactPath = completedArtifact(state, "createReadStream");
        if (artifactPath === null) {
          return openRemote("createReadStream");
        }
        try {
          const handle = await open(artifactPath, "r");
          return handle.createReadStream();
        } catch (error) {
          throw ioError("read", artifactPath, error, id);
        }
      });
    },

    async delete(): Promise<void> {
      const state = await cell.wait();

      await lock.run(async () => {
        if (deleted || state.status !== "completed") return;
        await removeArtifact(state.artifactPath);
        deleted = true;
        logger.debug("Artifact deleted", { artifactPath: state.artifactPath });
      });
    },

    async failure(): Promise<string | null> {
      return failureReason(await cell.wait());
    },

    async path(): Promise<string | null> {
      if (mode === "remote") {
        throw pathUnavailableRemotely(id);
      }
      const state = await cell.wait();
      return state.status === "completed" && !deleted ? state.artifactPath : null;
    },

    async saveAs(destination: string): Promise<void> {
      const state = await cell.wait();

      await lock.run(async () => {
        const artifactPath = completedArtifact(state, "saveAs");

        if (artifactPath === null) {
          const source = await openRemote("saveAs");
          try {
            await pipeline(source, createWriteStream(destination));
          } catch (error) {
            throw ioError("save download to", destination, error, id);
          }
        } else {
          try {
            await copyFile(artifactPath, destination);
          } catch (error) {
            throw ioError("save download to", destination, error, id);
          }
        }

        logger.info("Download saved", { destination });
      });
    },
  };

  // -------------------------------------------------------------------------
  // Controller
  // -------------------------------------------------------------------------

  function transition(next: TerminalState): boolean {
    const won = cell.settle(next);
    if (won) {
      logger.info("Download finished", {
        status: next.status,
        reason: failureReason(next) ?? undefined,
      });
    } else {
      logger.debug("Ignoring late download signal", {
        status: next.status,
        current: cell.current().status,
      });
    }
    return won;
  }

  return {
    download,

    complete(artifactPath, filename) {
      if (filename) resolveFilename(filename);
      if (artifactPath !== undefined && !cell.isTerminal()) {
        knownArtifactPath = artifactPath;
      }
      return transition({
        status: "completed",
        artifactPath: mode === "local" ? knownArtifactPath : null,
      });
    },

    fail(reason) {
      return transition({ status: "failed", reason });
    },

    markCanceled() {
      return transition({ status: "canceled" });
    },

    resolveFilename,

    interrupt(error) {
      const interrupted = cell.interrupt(error);
      if (interrupted) {
        logger.warn("Download interrupted", { error });
      }
      return interrupted;
    },

    abandon() {
      const abandoned = cell.abandon({ status: "canceled" });
      if (abandoned) {
        logger.info("Download abandoned on close", { interrupted: cell.isInterrupted() });
      }
      return abandoned;
    },

    isInProgress: () => !cell.isTerminal() && !cell.isInterrupted(),

    discardArtifact() {
      return lock.run(async () => {
        if (deleted) return;
        await removeArtifact(knownArtifactPath);
        deleted = true;
      });
    },
  };
}
