#!/usr/bin/env node
import { Command, Option } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { createCommandRuntime } from "./lib/command-runtime.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { getOutputMode } from "./lib/output/mode.js";
import { registerSaveCommand } from "./modules/save.js";
import { registerListenCommand } from "./modules/listen.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  return PackageJsonSchema.parse(raw).version;
}

export async function main(argv = process.argv): Promise<void> {
  const program = new Command()
    .name("dltrack")
    .description("Track browser downloads and collect their files")
    .version(readVersion())
    .option("-e, --endpoint <address>", "Backend socket path or host:port")
    .option("-c, --config <path>", "Path to configuration file")
    .option("--remote", "Backend runs on another machine; stream artifacts instead of reading them")
    .option("--json", "Output machine-readable JSON")
    .addOption(
      new Option("--log-level <level>", "Log verbosity").choices(["debug", "info", "warn", "error"])
    );

  const runtime = createCommandRuntime();

  registerSaveCommand(program, runtime);
  registerListenCommand(program, runtime);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error, getOutputMode(argv));
    process.exitCode = 1;
  }
}

void main();
