import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { parseTimeout, resolveDestination, saveNextDownload } from "./save.js";
import { createDownload } from "../lib/downloads/download.js";
import { createMemoryTransport, type MemoryTransport } from "../lib/adapters/memory-transport.js";
import { openSession, type Session } from "../lib/session.js";
import { resolveConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

describe("save module", () => {
  describe("parseTimeout", () => {
    it("accepts whole milliseconds", () => {
      expect(parseTimeout("1500")).toBe(1500);
      expect(parseTimeout("0")).toBe(0);
    });

    it("rejects anything else", () => {
      expect(() => parseTimeout("1.5s")).toThrow(
        expect.objectContaining({
          code: "CONFIG_INVALID",
          message: 'Invalid --timeout: expected milliseconds, got "1.5s"',
        })
      );
      expect(() => parseTimeout("-1")).toThrow("Invalid --timeout");
    });
  });

  describe("resolveDestination", () => {
    function download(suggestedFilename?: string) {
      return createDownload({
        id: "dl-7",
        url: "https://example.test/export",
        page: { id: "page-1" },
        suggestedFilename,
        mode: "local",
        transport: createMemoryTransport(),
        logger: createMockLogger(),
      }).download;
    }

    it("uses a file path as given", () => {
      expect(resolveDestination("out/report.csv", download("x.csv"), () => false)).toBe(
        resolve("out/report.csv")
      );
    });

    it("appends the suggested filename to a directory", () => {
      expect(resolveDestination("/srv/inbox", download("report.csv"), () => true)).toBe(
        join(resolve("/srv/inbox"), "report.csv")
      );
    });

    it("falls back to the download id without a suggested filename", () => {
      expect(resolveDestination("/srv/inbox", download(), () => true)).toBe(
        join(resolve("/srv/inbox"), "dl-7")
      );
    });
  });

  describe("saveNextDownload", () => {
    let dir: string;
    let artifactPath: string;
    let transport: MemoryTransport;
    let session: Session;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "save-test-"));
      artifactPath = join(dir, "artifact-0001");
      await writeFile(artifactPath, "quarterly numbers");
      transport = createMemoryTransport();
      session = await openSession(resolveConfig(), createMockLogger(), {
        connect: async () => transport,
      });
    });

    afterEach(async () => {
      await session.close();
      await rm(dir, { recursive: true, force: true });
    });

    function startDownload(): void {
      transport.emit({
        type: "download.created",
        id: "dl-1",
        pageId: "page-1",
        url: "https://example.test/report.csv",
        suggestedFilename: "report.csv",
        artifactPath,
      });
    }

    it("copies the next download into a destination directory", async () => {
      const saving = saveNextDownload(
        session,
        { destination: dir, pageId: null, timeoutMs: 0 },
        "json"
      );
      startDownload();
      transport.emit({ type: "download.finished", id: "dl-1", outcome: "success" });

      const result = await saving;

      expect(result).toEqual({
        download: {
          id: "dl-1",
          url: "https://example.test/report.csv",
          pageId: "page-1",
          suggestedFilename: "report.csv",
          status: "completed",
        },
        savedTo: join(dir, "report.csv"),
      });
      expect(await readFile(join(dir, "report.csv"), "utf-8")).toBe("quarterly numbers");
    });

    it("reports a failed download without saving", async () => {
      const saving = saveNextDownload(
        session,
        { destination: join(dir, "out.csv"), pageId: "page-1", timeoutMs: 0 },
        "json"
      );
      startDownload();
      transport.emit({
        type: "download.finished",
        id: "dl-1",
        outcome: "failure",
        reason: "network error",
      });

      const result = await saving;

      expect(result.savedTo).toBeUndefined();
      expect(result.download).toMatchObject({ status: "failed", reason: "network error" });
    });

    it("deletes the artifact when the session closes", async () => {
      const saving = saveNextDownload(
        session,
        { destination: join(dir, "kept.csv"), pageId: null, timeoutMs: 0 },
        "json"
      );
      startDownload();
      transport.emit({ type: "download.finished", id: "dl-1", outcome: "success" });
      await saving;

      await session.close();

      await expect(readFile(artifactPath)).rejects.toMatchObject({ code: "ENOENT" });
      expect(await readFile(join(dir, "kept.csv"), "utf-8")).toBe("quarterly numbers");
    });
  });
});
