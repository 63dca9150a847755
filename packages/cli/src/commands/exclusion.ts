/**
 * Exclusion Commands
 *
 * Usage:
 *   arbor exclusion prove <leaves> <target>
 *   arbor exclusion verify <claim> [--root <hex>] [--leaf-count <n>]
 *
 * A claim file is { target, root, proof } with hex hashes and an
 * encoded exclusion proof. Leaves are sorted before proving.
 * --leaf-count pins the size of the committed set.
 */

import type { Command } from "commander";
import { z } from "zod";
import {
  MerkleTree,
  canonicalJson,
  decodeExclusionProof,
  encodeExclusionProof,
  hashFromHex,
  hashToHex,
  hashesEqual,
  verifyExclusionProof,
} from "@arbor/merkle";
import type { Hash } from "@arbor/merkle";
import { readLeafFile, sortLeaves } from "../leaves.js";
import { formatFailures, formatVerdict } from "../output.js";
import { parseHashArgument, parseIntegerArgument, readJsonFile } from "./shared.js";
import type { CliContext } from "./shared.js";

const HexString = z.string().regex(/^[0-9a-fA-F]{64}$/, "must be 64 hex characters");

export const ExclusionClaimSchema = z.object({
  target: HexString,
  root: HexString,
  proof: z.unknown(),
});

export type ExclusionClaim = z.infer<typeof ExclusionClaimSchema>;

interface ExclusionVerifyOptions {
  readonly root?: Hash;
  readonly leafCount?: number;
}

export function registerExclusionCommands(program: Command, ctx: CliContext): void {
  const exclusion = program
    .command("exclusion")
    .description("Prove or check that a value is absent from a sorted leaf set");

  exclusion
    .command("prove")
    .description("Print an exclusion claim for a target")
    .argument("<leaves>", "file with one 64-hex leaf per line")
    .argument("<target>", "64-hex value to prove absent", parseHashArgument)
    .action(async (file: string, target: Hash) => {
      const tree = MerkleTree.build(sortLeaves(await readLeafFile(file)), ctx.hashFn);
      const proof = tree.makeExclusionProof(target);

      ctx.logger.info(
        {
          leafCount: tree.getLeafCount(),
          left: proof.left?.proof.leafIndex,
          right: proof.right?.proof.leafIndex,
        },
        "Exclusion proof created",
      );
      ctx.io.out(
        canonicalJson({
          target: hashToHex(target),
          root: hashToHex(tree.getRoot()),
          proof: encodeExclusionProof(proof),
        }),
      );
    });

  exclusion
    .command("verify")
    .description("Check an exclusion claim")
    .argument("<claim>", "exclusion claim JSON file")
    .option("--root <hex>", "root the claim must commit to", parseHashArgument)
    .option("--leaf-count <n>", "number of leaves the root commits to", parseIntegerArgument)
    .action(async (file: string, options: ExclusionVerifyOptions) => {
      const claim: ExclusionClaim = ExclusionClaimSchema.parse(await readJsonFile(file));
      const root = hashFromHex(claim.root);

      const failures: string[] = [];
      if (options.root !== undefined && !hashesEqual(options.root, root)) {
        failures.push("ROOT_MISMATCH");
      }
      const result = verifyExclusionProof(
        hashFromHex(claim.target),
        decodeExclusionProof(claim.proof),
        root,
        ctx.hashFn,
        options.leafCount,
      );
      failures.push(...result.errors);

      ctx.logger.debug({ file, failures }, "Exclusion claim checked");
      if (failures.length === 0) {
        ctx.io.out(formatVerdict(true));
      } else {
        ctx.io.out(formatFailures(failures));
        ctx.io.setExitCode(1);
      }
    });
}
