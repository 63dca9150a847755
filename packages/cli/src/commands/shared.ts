/**
 * @arbor/cli — Helpers shared by the commands.
 */

import { readFile } from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { MerkleTree } from "@arbor/merkle";
import type { Hash, HashFn } from "@arbor/merkle";
import type { Logger } from "pino";
import type { AppConfig } from "../config.js";
import { parseHexHash, readLeafFile, sortLeaves } from "../leaves.js";

// =============================================================================
// Context
// =============================================================================

/** Where command output goes. */
export interface CliIO {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
  readonly setExitCode: (code: number) => void;
}

export interface CliDeps {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly io: CliIO;
}

export interface CliContext extends CliDeps {
  readonly hashFn: HashFn;
}

// =============================================================================
// Argument parsers
// =============================================================================

export function parseHashArgument(value: string): Hash {
  const hash = parseHexHash(value);
  if (hash === null) {
    throw new InvalidArgumentError("Expected 64 hex characters.");
  }
  return hash;
}

export function parseIntegerArgument(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Integer is too large.");
  }
  return parsed;
}

// =============================================================================
// Inputs
// =============================================================================

export async function loadTree(
  ctx: CliContext,
  file: string,
  sort: boolean,
): Promise<MerkleTree> {
  const leaves = await readLeafFile(file);
  const tree = MerkleTree.build(sort ? sortLeaves(leaves) : leaves, ctx.hashFn);

  ctx.logger.debug(
    {
      file,
      leafCount: tree.getLeafCount(),
      height: tree.getHeight(),
      hash: ctx.config.ARBOR_HASH,
    },
    "Tree built",
  );
  return tree;
}

export async function readJsonFile(file: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await readFile(file, "utf8"));
  return parsed;
}
