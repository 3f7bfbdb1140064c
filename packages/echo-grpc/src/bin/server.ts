#!/usr/bin/env tsx
// stream-echo-server: serve EchoService until SIGINT/SIGTERM.

import { Command } from "commander";
import { ConfigError, createLogger, type EchoConfig, resolveConfig } from "@stream-echo/core";
import { EchoServer } from "../server.ts";
import { parseCount } from "./options.ts";

interface ServerFlags {
  host?: string;
  port?: number;
  workers?: number;
  queueCapacity?: number;
  verbose?: boolean;
}

function serverCommand(): Command {
  return new Command("stream-echo-server")
    .description("Serve the streaming echo service over gRPC")
    .option("--host <host>", "interface to bind (env ECHO_HOST, default 0.0.0.0)")
    .option("-p, --port <port>", "port to bind (env ECHO_PORT, default 8080)", parseCount)
    .option("-w, --workers <n>", "calls served at once (env ECHO_MAX_CALLS, default 10)", parseCount)
    .option("--queue-capacity <n>", "relay queue capacity per async call (default 10)", parseCount)
    .option("-v, --verbose", "log debug output for every namespace")
    .action(async (flags: ServerFlags) => {
      await runServer(flags);
    });
}

async function runServer(flags: ServerFlags): Promise<void> {
  const log = createLogger("echo:server", { verbose: flags.verbose });

  let config: EchoConfig;
  try {
    config = resolveConfig({
      host: flags.host,
      port: flags.port,
      maxConcurrentCalls: flags.workers,
      queueCapacity: flags.queueCapacity,
    });
  } catch (e) {
    if (e instanceof ConfigError) {
      log.error(`invalid configuration: ${e.message}`);
      process.exitCode = 1;
      return;
    }
    throw e;
  }

  const server = new EchoServer({ config, logger: log });
  await server.listen();

  let shuttingDown = false;
  const stop = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      log.warn("second signal, exiting now");
      process.exit(1);
    }
    shuttingDown = true;
    log.info(`${signal} received, stopping`);
    await server.shutdown();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      stop(signal).catch((e: unknown) => {
        log.error("shutdown failed", { error: e instanceof Error ? e.message : String(e) });
        process.exitCode = 1;
      });
    });
  }
}

serverCommand()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
