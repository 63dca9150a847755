/**
 * @arbor/cli — Leaf files.
 *
 * Format: one 64-character hex leaf per line, optional 0x prefix.
 * Blank lines and lines starting with # are skipped.
 */

import { readFile } from "node:fs/promises";
import { MerkleError, compareHashes, hashFromHex } from "@arbor/merkle";
import type { Hash } from "@arbor/merkle";

const HEX_LEAF = /^(?:0x)?([0-9a-fA-F]{64})$/;

/**
 * Decode one hex hash, or null when `value` is not 64 hex characters.
 */
export function parseHexHash(value: string): Hash | null {
  const match = HEX_LEAF.exec(value.trim());
  const hex = match?.[1];
  return hex === undefined ? null : hashFromHex(hex);
}

/**
 * @throws {MerkleError} INVALID_HASH naming the first malformed line
 */
export function parseLeafList(text: string): Hash[] {
  const leaves: Hash[] = [];

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) {
      return;
    }

    const leaf = parseHexHash(line);
    if (leaf === null) {
      throw new MerkleError(
        "INVALID_HASH",
        `Line ${i + 1}: expected 64 hex characters, got "${line}"`,
      );
    }
    leaves.push(leaf);
  });

  return leaves;
}

export async function readLeafFile(path: string): Promise<Hash[]> {
  return parseLeafList(await readFile(path, "utf8"));
}

/** Ascending copy; the input is left as is. */
export function sortLeaves(leaves: readonly Hash[]): Hash[] {
  return [...leaves].sort(compareHashes);
}
