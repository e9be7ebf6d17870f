#!/usr/bin/env node
import readline from "node:readline/promises";

import { ConsoleLogger, createDirsnap, isDirsnapError, resolveConfig } from "@dirsnap/core-application";

import { runCli, type CliIo } from "./commands";

async function main() {
  const config = resolveConfig();
  const logger = new ConsoleLogger(config.logLevel, "dirsnap");
  const app = createDirsnap(config, { logger });

  const io: CliIo = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    ask: async (question) => {
      const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      try {
        return await rl.question(question);
      } finally {
        rl.close();
      }
    },
  };

  process.exitCode = await runCli(process.argv.slice(2), { app, io, logger });
}

main().catch((err) => {
  console.error(isDirsnapError(err) ? `Error: ${err.message}` : err);
  process.exit(1);
});
