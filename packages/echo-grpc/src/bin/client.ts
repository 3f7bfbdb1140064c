#!/usr/bin/env tsx
// stream-echo-client: run the demo calls against a server, repeating until stopped.

import { Command } from "commander";
import { createLogger } from "@stream-echo/core";
import { EchoClient } from "../client.ts";
import { DEMO_KINDS, type DemoKind, runDemoLoop } from "../demo.ts";
import { type DemoSelection, parseCount, parseDemoSelection } from "./options.ts";

interface ClientFlags {
  server: string;
  test: DemoSelection;
  messages: number;
  interval?: number;
  once?: boolean;
  verbose?: boolean;
}

function clientCommand(): Command {
  return new Command("stream-echo-client")
    .description("Exercise the streaming echo service")
    .option("-s, --server <address>", "server address", "localhost:8080")
    .option("-t, --test <kind>", "client, server, sync, async or all", parseDemoSelection, "all")
    .option("-n, --messages <n>", "messages per streaming call", parseCount, 3)
    .option("-i, --interval <ms>", "pause between outbound messages", parseCount)
    .option("--once", "run each test once and exit")
    .option("-v, --verbose", "log debug output for every namespace")
    .action(async (flags: ClientFlags) => {
      await runClient(flags);
    });
}

async function runClient(flags: ClientFlags): Promise<void> {
  const log = createLogger("echo:client", { verbose: flags.verbose });
  const client = new EchoClient(flags.server, { logger: log });
  const stopping = new AbortController();

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info(`${signal} received, stopping`);
    stopping.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const kinds: readonly DemoKind[] = flags.test === "all" ? DEMO_KINDS : [flags.test];
  log.info(`connecting to ${flags.server}`, { tests: kinds.join(","), once: flags.once ?? false });

  try {
    const results = await Promise.all(
      kinds.map((kind, i) =>
        runDemoLoop(kind, client, {
          clientId: i + 1,
          messages: flags.messages,
          intervalMs: flags.interval,
          logger: log,
          signal: stopping.signal,
          once: flags.once ?? false,
        }),
      ),
    );
    if (results.some((ok) => !ok)) process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    client.close();
  }
}

clientCommand()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
