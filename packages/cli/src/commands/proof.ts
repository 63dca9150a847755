/**
 * Proof Command
 *
 * Prints a self-contained proof bundle as canonical JSON.
 *
 * Usage:
 *   arbor proof <leaves> (--index <n> | --leaf <hex>) [--capacity <n>] [--sort]
 *
 * --capacity falls back to ARBOR_PROOF_CAPACITY.
 */

import type { Command } from "commander";
import { canonicalJson, createProofBundle } from "@arbor/merkle";
import type { Hash } from "@arbor/merkle";
import {
  loadTree,
  parseHashArgument,
  parseIntegerArgument,
} from "./shared.js";
import type { CliContext } from "./shared.js";

interface ProofOptions {
  readonly index?: number;
  readonly leaf?: Hash;
  readonly capacity?: number;
  readonly sort?: boolean;
}

export function registerProofCommand(program: Command, ctx: CliContext): void {
  const command: Command = program
    .command("proof")
    .description("Print an inclusion proof bundle for one leaf")
    .argument("<leaves>", "file with one 64-hex leaf per line")
    .option("--index <n>", "position of the leaf", parseIntegerArgument)
    .option("--leaf <hex>", "value of the leaf", parseHashArgument)
    .option("--capacity <n>", "maximum number of proof nodes", parseIntegerArgument)
    .option("--sort", "sort leaves ascending before building");

  command.action(async (file: string, options: ProofOptions) => {
    const target = options.index ?? options.leaf;
    if (target === undefined || (options.index !== undefined && options.leaf !== undefined)) {
      command.error("error: pass exactly one of --index or --leaf");
    }

    const tree = await loadTree(ctx, file, options.sort === true);
    const capacity = options.capacity ?? ctx.config.ARBOR_PROOF_CAPACITY;
    const bundle = createProofBundle(tree, target, { capacity });

    ctx.logger.info(
      { leafIndex: bundle.proof.leafIndex, nodes: bundle.proof.nodes.length },
      "Proof created",
    );
    ctx.io.out(canonicalJson(bundle));
  });
}
