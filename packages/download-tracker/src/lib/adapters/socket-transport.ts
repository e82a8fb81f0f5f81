import { connect, type Socket } from "net";
import { createInterface } from "readline";
import type { Duplex } from "stream";
import type { DownloadTransport } from "../ports/transport.js";
import type { Logger } from "../logger.js";
import { parseBackendEvent, type BackendRequest } from "../downloads/events.js";
import { protocolError, transportDisconnected } from "../errors/catalog.js";
import { createTransportEventHub } from "./transport-events.js";

/**
 * Transport speaking newline-delimited JSON over a duplex stream.
 *
 * Inbound lines are backend events; outbound lines are cancel/delete
 * requests. A write is acknowledged once the stream has flushed it.
 * Lines that do not parse are logged and skipped.
 */
export function createSocketTransport(stream: Duplex, logger: Logger): DownloadTransport {
  const hub = createTransportEventHub(logger);
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  lines.on("line", (line) => {
    const trimmed = line.trim();
    if (trimmed === "") return;

    let value: unknown;
    try {
      value = JSON.parse(trimmed);
    } catch (error) {
      const err = protocolError(error instanceof Error ? error.message : String(error));
      logger.warn(err.message, { details: err.details });
      return;
    }

    const parsed = parseBackendEvent(value);
    if (!parsed.ok) {
      logger.warn(protocolError(parsed.issues.join("; ")).message, { issues: parsed.issues });
      return;
    }

    logger.debug("Backend event", { type: parsed.event.type, id: parsed.event.id });
    hub.emitEvent(parsed.event);
  });

  stream.on("error", (error) => {
    hub.emitDisconnect(error.message);
  });
  stream.on("end", () => {
    hub.emitDisconnect("connection closed by backend");
  });
  stream.on("close", () => {
    hub.emitDisconnect("connection closed");
  });

  function send(request: BackendRequest): Promise<void> {
    if (hub.isDisconnected() || stream.destroyed) {
      return Promise.reject(transportDisconnected("request after disconnect"));
    }
    return new Promise((resolve, reject) => {
      stream.write(`${JSON.stringify(request)}\n`, (error) => {
        if (error) {
          reject(transportDisconnected(error.message));
        } else {
          resolve();
        }
      });
    });
  }

  return {
    on: hub.on,
    cancelDownload: (id) => send({ type: "download.cancel", id }),
    deleteArtifact: (id) => send({ type: "download.delete", id }),
    async close() {
      lines.close();
      if (stream.destroyed) return;
      // Flush queued requests before tearing the connection down.
      await new Promise<void>((resolve) => {
        stream.once("close", () => resolve());
        stream.end(() => stream.destroy());
      });
    },
  };
}

/**
 * Parse an endpoint: `host:port` for TCP, anything else is a Unix socket path.
 */
export function parseEndpoint(
  endpoint: string
): { kind: "tcp"; host: string; port: number } | { kind: "ipc"; path: string } {
  const match = /^([^/\\:]+|\[[^\]]+\]):(\d{1,5})$/.exec(endpoint);
  if (match) {
    const port = Number(match[2]);
    if (port > 0 && port < 65536) {
      return { kind: "tcp", host: match[1].replace(/^\[|\]$/g, ""), port };
    }
  }
  return { kind: "ipc", path: endpoint };
}

/**
 * Open a connection to the backend and wrap it in a socket transport.
 */
export async function connectSocketTransport(
  endpoint: string,
  logger: Logger
): Promise<DownloadTransport> {
  const target = parseEndpoint(endpoint);

  const socket = await new Promise<Socket>((resolve, reject) => {
    const s =
      target.kind === "tcp"
        ? connect({ host: target.host, port: target.port })
        : connect({ path: target.path });
    const onError = (error: Error) => {
      reject(transportDisconnected(`${endpoint}: ${error.message}`));
    };
    s.once("error", onError);
    s.once("connect", () => {
      s.off("error", onError);
      resolve(s);
    });
  });

  logger.info("Connected to backend", { endpoint });
  return createSocketTransport(socket, logger);
}
