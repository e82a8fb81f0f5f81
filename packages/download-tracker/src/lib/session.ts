import type { ResolvedConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { DownloadTransport } from "./ports/transport.js";
import type { TimerService } from "./ports/timer.js";
import { connectSocketTransport } from "./adapters/socket-transport.js";
import {
  createBrowsingContext,
  type BrowsingContext,
} from "./downloads/browsing-context.js";

/**
 * One connection to the backend plus the browsing context that owns
 * the downloads seen on it.
 */
export interface Session {
  transport: DownloadTransport;
  context: BrowsingContext;
  /** Close the context (deleting its artifacts), then the connection */
  close(): Promise<void>;
}

/**
 * Dependencies for opening a session.
 * All have defaults for production use.
 */
export interface SessionDeps {
  connect?: (endpoint: string, logger: Logger) => Promise<DownloadTransport>;
  timerService?: TimerService;
}

export async function openSession(
  config: ResolvedConfig,
  logger: Logger,
  deps: SessionDeps = {}
): Promise<Session> {
  const connect = deps.connect ?? connectSocketTransport;
  const transport = await connect(config.endpoint, logger);

  const context = createBrowsingContext({
    transport,
    mode: config.remote ? "remote" : "local",
    logger,
    timerService: deps.timerService,
  });

  return {
    transport,
    context,
    async close() {
      try {
        await context.close();
      } finally {
        await transport.close();
      }
    },
  };
}
