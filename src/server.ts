#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { StructuredLogger } from "./logger.js";
import { createOrchestratorRuntime } from "./orchestrator/runtime.js";
import { parseCliOptions, USAGE, type CliOptions } from "./serverOptions.js";

export * from "./orchestrator/runtime.js";

/**
 * Parses the command line, builds the runtime and serves it over stdio until
 * the client disconnects or the process receives SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliOptions(process.argv.slice(2));
  } catch (error) {
    const bootLogger = new StructuredLogger();
    bootLogger.error("cli_options_invalid", { message: error instanceof Error ? error.message : String(error) });
    await bootLogger.flush();
    process.stderr.write(USAGE);
    process.exit(1);
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }

  const runtime = createOrchestratorRuntime({ config: options.overrides });
  const { logger } = runtime;

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_requested", { reason });
    try {
      await runtime.close();
    } catch (error) {
      logger.error("shutdown_failed", { message: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    }
    process.exit();
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  runtime.server.onclose = () => {
    void shutdown("transport_closed");
  };
  await runtime.server.connect(new StdioServerTransport());
  logger.info("stdio_listening");
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

const isMain = isEntryPoint();

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exit(1);
  });
}
