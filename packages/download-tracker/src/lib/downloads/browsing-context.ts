import { randomUUID } from "crypto";
import type { Logger } from "../logger.js";
import type { DownloadTransport, Unsubscribe } from "../ports/transport.js";
import type { TimerService } from "../ports/timer.js";
import { realTimerService } from "../adapters/real-timers.js";
import { contextClosed, transportDisconnected, waitTimeout } from "../errors/catalog.js";
import type { BackendEvent, DownloadCreatedEvent } from "./events.js";
import { CANCELED_REASON } from "./state.js";
import {
  createDownload,
  type ArtifactMode,
  type Download,
  type DownloadController,
  type Page,
} from "./download.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DownloadListener = (download: Download) => void;

export interface WaitForDownloadOptions {
  /** 0 waits forever */
  timeoutMs?: number;
}

export interface BrowsingContextOptions {
  id?: string;
  transport: DownloadTransport;
  mode: ArtifactMode;
  logger: Logger;
  timerService?: TimerService;
}

/**
 * Owns every download started by its pages and deletes their artifacts
 * when it closes.
 */
export interface BrowsingContext {
  readonly id: string;
  addPage(page: Page): void;
  page(pageId: string): Page | undefined;
  /** Downloads currently tracked, in creation order */
  downloads(): Download[];
  /** Notify on every new download, or only those of `pageId` */
  onDownload(pageId: string | null, listener: DownloadListener): Unsubscribe;
  /**
   * Run `action` and resolve with the next download the page (any page
   * when null) starts. The listener is in place before `action` runs.
   */
  waitForDownload(
    pageId: string | null,
    action: () => unknown,
    options?: WaitForDownloadOptions
  ): Promise<Download>;
  /** Apply one backend event. Called by the transport subscription. */
  handleEvent(event: BackendEvent): void;
  isClosed(): boolean;
  /**
   * Cancel downloads still in progress, delete every artifact, release
   * all entries. Safe to call more than once.
   */
  close(): Promise<void>;
}

interface ListenerEntry {
  pageId: string | null;
  listener: DownloadListener;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createBrowsingContext(options: BrowsingContextOptions): BrowsingContext {
  const { transport, mode } = options;
  const id = options.id ?? randomUUID();
  const timers = options.timerService ?? realTimerService;
  const logger = options.logger.child({ contextId: id });

  const pages = new Map<string, Page>();
  const controllers = new Map<string, DownloadController>();
  const listeners = new Set<ListenerEntry>();
  const pendingWaits = new Set<(error: Error) => void>();

  let closed = false;
  let disconnected = false;
  let closing: Promise<void> | null = null;

  const subscriptions: Unsubscribe[] = [
    transport.on("event", (event) => handleEvent(event)),
    transport.on("disconnect", (reason) => handleDisconnect(reason)),
  ];

  // -------------------------------------------------------------------------
  // Event handling
  // -------------------------------------------------------------------------

  function handleEvent(event: BackendEvent): void {
    if (closed) {
      logger.debug("Dropping event for closed context", { type: event.type, id: event.id });
      return;
    }

    switch (event.type) {
      case "download.created":
        onCreated(event);
        break;
      case "download.finished": {
        const controller = lookup(event.id, event.type);
        if (!controller) return;
        if (event.outcome === "success") {
          controller.complete(event.artifactPath, event.suggestedFilename);
        } else if (event.reason === CANCELED_REASON) {
          controller.markCanceled();
        } else {
          controller.fail(event.reason ?? "unknown error");
        }
        break;
      }
      case "download.canceled":
        lookup(event.id, event.type)?.markCanceled();
        break;
    }
  }

  function onCreated(event: DownloadCreatedEvent): void {
    if (controllers.has(event.id)) {
      logger.warn("Duplicate download id", { id: event.id });
      return;
    }

    let page = pages.get(event.pageId);
    if (!page) {
      page = { id: event.pageId };
      pages.set(page.id, page);
    }

    const controller = createDownload({
      id: event.id,
      url: event.url,
      page,
      suggestedFilename: event.suggestedFilename,
      artifactPath: event.artifactPath,
      mode,
      transport,
      logger,
    });
    controllers.set(event.id, controller);
    logger.info("Download started", { downloadId: event.id, pageId: page.id, url: event.url });

    emit(controller.download);
  }

  function lookup(downloadId: string, type: string): DownloadController | undefined {
    const controller = controllers.get(downloadId);
    if (!controller) {
      logger.warn("Event for unknown download", { type, id: downloadId });
    }
    return controller;
  }

  function handleDisconnect(reason?: string): void {
    if (disconnected) return;
    disconnected = true;
    logger.error("Backend connection lost", { reason });

    const error = transportDisconnected(reason);
    for (const controller of controllers.values()) {
      controller.interrupt(error);
    }
    for (const abort of [...pendingWaits]) {
      abort(error);
    }
  }

  function emit(download: Download): void {
    for (const entry of [...listeners]) {
      if (entry.pageId !== null && entry.pageId !== download.page().id) continue;
      try {
        entry.listener(download);
      } catch (error) {
        logger.error("Download listener threw", { downloadId: download.id, error });
      }
    }
  }

  // -------------------------------------------------------------------------
  // Subscriptions
  // -------------------------------------------------------------------------

  function onDownload(pageId: string | null, listener: DownloadListener): Unsubscribe {
    const entry: ListenerEntry = { pageId, listener };
    listeners.add(entry);
    return () => {
      listeners.delete(entry);
    };
  }

  function waitForDownload(
    pageId: string | null,
    action: () => unknown,
    waitOptions: WaitForDownloadOptions = {}
  ): Promise<Download> {
    if (closed) return Promise.reject(contextClosed());
    if (disconnected) return Promise.reject(transportDisconnected());

    const timeoutMs = waitOptions.timeoutMs ?? 0;

    return new Promise<Download>((resolve, reject) => {
      let done = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (settle: () => void) => {
        if (done) return;
        done = true;
        unsubscribe();
        pendingWaits.delete(abort);
        if (timer !== undefined) timers.clearTimeout(timer);
        settle();
      };

      const abort = (error: Error) => finish(() => reject(error));
      const unsubscribe = onDownload(pageId, (download) => finish(() => resolve(download)));
      pendingWaits.add(abort);

      if (timeoutMs > 0) {
        timer = timers.setTimeout(() => abort(waitTimeout(timeoutMs)), timeoutMs);
      }

      Promise.resolve()
        .then(action)
        .catch((error: unknown) => {
          abort(error instanceof Error ? error : new Error(String(error)));
        });
    });
  }

  // -------------------------------------------------------------------------
  // Teardown
  // -------------------------------------------------------------------------

  async function release(controller: DownloadController): Promise<void> {
    const downloadId = controller.download.id;

    const live = controller.isInProgress();
    // Settle first so a completion racing the close cannot win.
    controller.abandon();

    if (live && !disconnected) {
      try {
        await transport.cancelDownload(downloadId);
      } catch (error) {
        logger.warn("Cancel request failed during close", { downloadId, error });
      }
    }

    if (mode === "remote" && disconnected) {
      logger.warn("Backend disconnected; remote artifact not deleted", { downloadId });
      return;
    }
    await controller.discardArtifact();
  }

  async function teardown(): Promise<void> {
    closed = true;
    for (const abort of [...pendingWaits]) {
      abort(contextClosed());
    }

    const owned = [...controllers.values()];
    logger.info("Closing browsing context", { downloads: owned.length });

    const results = await Promise.allSettled(owned.map(release));

    controllers.clear();
    listeners.clear();
    pages.clear();
    for (const unsubscribe of subscriptions) unsubscribe();

    const failures: unknown[] = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
    for (const error of failures) {
      logger.error("Failed to delete download artifact", { error });
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  function close(): Promise<void> {
    if (!closing) {
      closing = teardown();
    }
    return closing;
  }

  return {
    id,
    addPage(page) {
      pages.set(page.id, page);
    },
    page: (pageId) => pages.get(pageId),
    downloads: () => [...controllers.values()].map((c) => c.download),
    onDownload,
    waitForDownload,
    handleEvent,
    isClosed: () => closed,
    close,
  };
}
