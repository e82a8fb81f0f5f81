import { describe, it, expect, vi, beforeEach } from "vitest";
import { Duplex } from "stream";
import { createSocketTransport, parseEndpoint } from "./socket-transport.js";
import type { DownloadTransport } from "../ports/transport.js";
import type { BackendEvent } from "../downloads/events.js";
import type { Logger } from "../logger.js";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

const flush = async () => {
  for (let i = 0; i < 5; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
};

describe("socket transport", () => {
  let written: string;
  let stream: Duplex;
  let logger: Logger;
  let transport: DownloadTransport;
  let events: BackendEvent[];

  beforeEach(() => {
    written = "";
    stream = new Duplex({
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        written += chunk.toString("utf-8");
        callback();
      },
    });
    logger = createMockLogger();
    transport = createSocketTransport(stream, logger);
    events = [];
    transport.on("event", (event) => events.push(event));
  });

  it("emits one event per JSON line, across chunk boundaries", async () => {
    stream.push('{"type":"download.created","id":"a","pageId":"p","url":"https://exa');
    stream.push('mple.test/a"}\n{"type":"download.canceled","id":"a"}\n');
    await flush();

    expect(events).toEqual([
      { type: "download.created", id: "a", pageId: "p", url: "https://example.test/a" },
      { type: "download.canceled", id: "a" },
    ]);
  });

  it("skips lines that are not JSON", async () => {
    stream.push("not json\n\n");
    await flush();

    expect(events).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Received a malformed message from the browser backend",
      expect.objectContaining({ details: expect.any(String) })
    );
  });

  it("skips events that fail validation", async () => {
    stream.push('{"type":"download.finished","id":"a","outcome":"maybe"}\n');
    await flush();

    expect(events).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Received a malformed message from the browser backend",
      { issues: [expect.stringMatching(/^outcome: /)] }
    );
  });

  it("writes cancel and delete requests as JSON lines", async () => {
    await transport.cancelDownload("a");
    await transport.deleteArtifact?.("b");
    await flush();

    expect(written).toBe(
      '{"type":"download.cancel","id":"a"}\n{"type":"download.delete","id":"b"}\n'
    );
  });

  it("reports a disconnect once and rejects later requests", async () => {
    const onDisconnect = vi.fn();
    transport.on("disconnect", onDisconnect);

    stream.destroy();
    await flush();

    expect(onDisconnect).toHaveBeenCalledTimes(1);
    expect(onDisconnect).toHaveBeenCalledWith("connection closed");
    await expect(transport.cancelDownload("a")).rejects.toMatchObject({
      code: "TRANSPORT_DISCONNECTED",
    });
  });

  it("treats the end of the backend's stream as a disconnect", async () => {
    const onDisconnect = vi.fn();
    transport.on("disconnect", onDisconnect);

    stream.push(null);
    await flush();

    expect(onDisconnect).toHaveBeenCalledTimes(1);
    expect(onDisconnect).toHaveBeenCalledWith("connection closed by backend");
  });

  it("flushes queued requests before closing", async () => {
    const onDisconnect = vi.fn();
    transport.on("disconnect", onDisconnect);

    const request = transport.cancelDownload("a");
    await transport.close();

    await expect(request).resolves.toBeUndefined();
    expect(written).toBe('{"type":"download.cancel","id":"a"}\n');
    expect(stream.destroyed).toBe(true);
    expect(onDisconnect).toHaveBeenCalledWith("connection closed");
  });

  it("stops delivering to unsubscribed handlers", async () => {
    const handler = vi.fn();
    const unsubscribe = transport.on("event", handler);
    unsubscribe();

    stream.push('{"type":"download.canceled","id":"a"}\n');
    await flush();

    expect(handler).not.toHaveBeenCalled();
    expect(events).toHaveLength(1);
  });
});

describe("parseEndpoint", () => {
  it("reads host:port as TCP", () => {
    expect(parseEndpoint("localhost:9300")).toEqual({ kind: "tcp", host: "localhost", port: 9300 });
    expect(parseEndpoint("[::1]:9300")).toEqual({ kind: "tcp", host: "::1", port: 9300 });
  });

  it("reads anything else as a socket path", () => {
    expect(parseEndpoint("/tmp/dltrack.sock")).toEqual({ kind: "ipc", path: "/tmp/dltrack.sock" });
    expect(parseEndpoint("localhost:99999")).toEqual({ kind: "ipc", path: "localhost:99999" });
  });
});
