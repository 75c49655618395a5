#!/usr/bin/env tsx
/**
 * @splitrelay/cli — Entry point.
 *
 * Loads .env and config, then runs one command. Logs go to stderr so
 * command output stays clean.
 */

import "dotenv/config";
import { createInterface } from "node:readline/promises";
import pino from "pino";
import { createForwardingService, createOAuthClient, loadConfig } from "@splitrelay/node";
import type { ForwardingService } from "@splitrelay/node";
import { runCli } from "./cli.js";
import { consoleOutput } from "./output.js";

async function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    transport: { target: "pino-pretty", options: { destination: 2 } },
  });

  let service: ForwardingService | undefined;

  return runCli(process.argv.slice(2), {
    out: consoleOutput,
    service: ({ accessToken }) =>
      (service ??= createForwardingService(
        accessToken !== undefined ? { ...config, LEDGER_ACCESS_TOKEN: accessToken } : config,
        { logger },
      )),
    oauth: () => createOAuthClient(config),
    prompt,
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
  },
);
