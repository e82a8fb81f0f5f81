import type { Command } from "commander";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, stderrSink, type Logger, type LogLevel } from "./logger.js";
import { getOutputMode, type OutputMode } from "./output/mode.js";
import { openSession, type Session, type SessionDeps } from "./session.js";

/** Options every command accepts */
export type GlobalOptions = {
  endpoint?: string;
  config?: string;
  remote?: boolean;
  json?: boolean;
  logLevel?: LogLevel;
};

export interface RuntimeContext {
  config: ResolvedConfig;
  logger: Logger;
  mode: OutputMode;
}

export interface CommandRuntime {
  /** Resolve config and logger from the command's options */
  resolve(command: Command): RuntimeContext;
  /** Open a session, run `fn`, and always close the session afterwards */
  withSession<T>(
    command: Command,
    fn: (session: Session, ctx: RuntimeContext) => Promise<T>
  ): Promise<T>;
}

export interface RuntimeDeps extends SessionDeps {
  env?: NodeJS.ProcessEnv;
  /** Replaces the stderr logger, mainly for tests */
  createLogger?: (config: ResolvedConfig) => Logger;
}

export function createCommandRuntime(deps: RuntimeDeps = {}): CommandRuntime {
  const env = deps.env ?? process.env;

  function resolveContext(command: Command): RuntimeContext {
    const opts = command.optsWithGlobals<GlobalOptions>();
    const { config } = loadConfig(
      {
        endpoint: opts.endpoint,
        remote: opts.remote,
        logLevel: opts.logLevel,
        logJson: opts.json,
      },
      opts.config,
      env
    );

    const logger = deps.createLogger
      ? deps.createLogger(config)
      : createLogger({ level: config.logLevel, json: config.logJson, sink: stderrSink });

    const mode: OutputMode = opts.json ? "json" : getOutputMode([], env);

    return { config, logger, mode };
  }

  async function withSession<T>(
    command: Command,
    fn: (session: Session, ctx: RuntimeContext) => Promise<T>
  ): Promise<T> {
    const ctx = resolveContext(command);
    const session = await openSession(ctx.config, ctx.logger, deps);
    try {
      return await fn(session, ctx);
    } finally {
      await session.close();
    }
  }

  return { resolve: resolveContext, withSession };
}
