/**
 * Verify Command
 *
 * Usage:
 *   arbor verify <bundle> [--root <hex>]
 *
 * Exit code 1 when the bundle does not verify.
 */

import type { Command } from "commander";
import { verifyProofBundle } from "@arbor/merkle";
import type { Hash } from "@arbor/merkle";
import { formatVerdict } from "../output.js";
import { parseHashArgument, readJsonFile } from "./shared.js";
import type { CliContext } from "./shared.js";

interface VerifyOptions {
  readonly root?: Hash;
}

export function registerVerifyCommand(program: Command, ctx: CliContext): void {
  program
    .command("verify")
    .description("Verify a proof bundle")
    .argument("<bundle>", "proof bundle JSON file")
    .option("--root <hex>", "root the bundle must commit to", parseHashArgument)
    .action(async (file: string, options: VerifyOptions) => {
      const bundle = await readJsonFile(file);
      const valid = verifyProofBundle(bundle, ctx.hashFn, options.root);

      ctx.logger.debug({ file, valid, pinned: options.root !== undefined }, "Bundle checked");
      ctx.io.out(formatVerdict(valid));
      if (!valid) {
        ctx.io.setExitCode(1);
      }
    });
}
