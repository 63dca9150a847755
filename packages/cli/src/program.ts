/**
 * @arbor/cli — Program assembly.
 *
 * Commands receive their config, logger and output sinks through a
 * context object so tests can run them in process.
 */

import { Command, CommanderError } from "commander";
import { ZodError } from "zod";
import { MerkleError } from "@arbor/merkle";
import { createCombiner } from "./hashers.js";
import { registerExclusionCommands } from "./commands/exclusion.js";
import { registerProofCommand } from "./commands/proof.js";
import { registerRootCommand } from "./commands/root.js";
import { registerVerifyCommand } from "./commands/verify.js";
import type { CliContext, CliDeps } from "./commands/shared.js";

export type { CliContext, CliDeps, CliIO } from "./commands/shared.js";

export const VERSION = "0.1.0";

/** Exit code for invocations that failed before producing a verdict. */
export const EXIT_FAILURE = 2;

export function createProgram(deps: CliDeps): Command {
  const ctx: CliContext = { ...deps, hashFn: createCombiner(deps.config.ARBOR_HASH) };

  const program = new Command();
  program
    .name("arbor")
    .description("Build Merkle roots and check inclusion and exclusion proofs")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.io.out(str.replace(/\n$/, "")),
      writeErr: (str) => deps.io.err(str.replace(/\n$/, "")),
    });

  registerRootCommand(program, ctx);
  registerProofCommand(program, ctx);
  registerVerifyCommand(program, ctx);
  registerExclusionCommands(program, ctx);

  return program;
}

/**
 * Run one invocation. `argv` holds the user arguments only.
 *
 * Failures never reject: they are logged and reported through
 * `io.setExitCode`.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<void> {
  const program = createProgram(deps);

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed usage errors, help and version
      deps.io.setExitCode(err.exitCode);
      return;
    }
    reportFailure(err, deps);
    deps.io.setExitCode(EXIT_FAILURE);
  }
}

function reportFailure(err: unknown, { logger, io }: CliDeps): void {
  if (err instanceof MerkleError) {
    logger.error({ code: err.code }, err.message);
    io.err(`error: ${err.code}: ${err.message}`);
    return;
  }

  if (err instanceof ZodError) {
    const issues = err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    logger.error({ issues }, "Invalid input");
    io.err(`error: invalid input: ${issues.join("; ")}`);
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  logger.error({ err }, "Command failed");
  io.err(`error: ${message}`);
}
