/**
 * Root Command
 *
 * Usage:
 *   arbor root <leaves> [--sort]
 */

import type { Command } from "commander";
import { hashToHex } from "@arbor/merkle";
import { loadTree } from "./shared.js";
import type { CliContext } from "./shared.js";

interface RootOptions {
  readonly sort?: boolean;
}

export function registerRootCommand(program: Command, ctx: CliContext): void {
  program
    .command("root")
    .description("Print the Merkle root of a leaf file")
    .argument("<leaves>", "file with one 64-hex leaf per line")
    .option("--sort", "sort leaves ascending before building")
    .action(async (file: string, options: RootOptions) => {
      const tree = await loadTree(ctx, file, options.sort === true);
      ctx.io.out(hashToHex(tree.getRoot()));
    });
}
