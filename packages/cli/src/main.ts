#!/usr/bin/env node
/**
 * @arbor/cli — Entry point.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runCli } from "./program.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  await runCli(process.argv.slice(2), {
    config,
    logger,
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
      setExitCode: (code) => {
        process.exitCode = code;
      },
    },
  });
}

main().catch((err: unknown) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
