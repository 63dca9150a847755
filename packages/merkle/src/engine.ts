/**
 * @arbor/merkle — Tree engine.
 *
 * Pure functions for building the level pyramid, deriving inclusion
 * proofs and replaying them into a candidate root.
 *
 * Design:
 * - Hash-agnostic: the caller supplies the combining function
 * - Leaves are pre-hashed 32-byte values; the engine never hashes data
 * - Internal nodes: hashFn(left, right), pairing left to right
 * - Odd count: the unpaired last node is carried up unchanged
 *   (never duplicated, never combined with itself)
 * - Empty input: EMPTY_INPUT error
 * - Single leaf: leaf IS the root, proof has no nodes
 */

import { assertHash, hashesEqual } from "./hash.js";
import { ProofPath } from "./proof-path.js";
import { MerkleError } from "./types.js";
import type {
  Hash,
  HashFn,
  MerkleProof,
  ProofOptions,
  ProofTarget,
  Side,
} from "./types.js";

/** Level 0 holds the leaves, the last level holds only the root. */
export type Levels = readonly (readonly Hash[])[];

// =============================================================================
// Internal Helpers
// =============================================================================

function combine(hashFn: HashFn, left: Hash, right: Hash): Hash {
  const parent = hashFn(left, right);
  assertHash(parent, "Combining function output");
  return parent;
}

/**
 * Combine one level pairwise into the next.
 */
function nextLevel(level: readonly Hash[], hashFn: HashFn): Hash[] {
  const next: Hash[] = [];
  let pending: Hash | undefined;

  for (const node of level) {
    if (pending === undefined) {
      pending = node;
    } else {
      next.push(combine(hashFn, pending, node));
      pending = undefined;
    }
  }

  // Unpaired last node moves up as-is
  if (pending !== undefined) {
    next.push(pending);
  }

  return next;
}

function checkLeafCount(leafCount: number): void {
  if (!Number.isSafeInteger(leafCount) || leafCount < 0) {
    throw new MerkleError(
      "INDEX_OUT_OF_RANGE",
      `Leaf count ${leafCount} is not a non-negative safe integer`,
    );
  }
}

function checkLeafIndex(leafIndex: number, leafCount: number): void {
  checkLeafCount(leafCount);
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= leafCount) {
    throw new MerkleError(
      "INDEX_OUT_OF_RANGE",
      `Leaf index ${leafIndex} is outside [0, ${leafCount})`,
    );
  }
}

/** Level-0 index of a proof target; a value resolves to its first occurrence. */
export function resolveTarget(levels: Levels, target: ProofTarget): number {
  if (typeof target === "number") {
    checkLeafIndex(target, levels[0]?.length ?? 0);
    return target;
  }

  assertHash(target, "Target leaf");
  const index = findLeaf(levels, target);
  if (index === -1) {
    throw new MerkleError("LEAF_NOT_FOUND", "Target leaf is not in the tree");
  }
  return index;
}

// =============================================================================
// Shape
// =============================================================================

/**
 * Number of combining rounds between the leaves and the root.
 * Equals ceil(log2(leafCount)); 0 for a single leaf.
 *
 * @throws {MerkleError} INDEX_OUT_OF_RANGE for a count that is not a
 * non-negative safe integer
 */
export function treeHeight(leafCount: number): number {
  checkLeafCount(leafCount);

  let height = 0;
  for (let size = leafCount; size > 1; size = Math.ceil(size / 2)) {
    height++;
  }
  return height;
}

/**
 * Side sequence carried by a genuine proof for `leafIndex` in a tree
 * of `leafCount` leaves. Computable without any hashes.
 */
export function expectedSides(leafIndex: number, leafCount: number): Side[] {
  checkLeafIndex(leafIndex, leafCount);

  const sides: Side[] = [];
  let index = leafIndex;

  for (let size = leafCount; size > 1; size = Math.ceil(size / 2)) {
    if (index % 2 === 1) {
      sides.push("left");
    } else if (index + 1 < size) {
      sides.push("right");
    }
    index = Math.floor(index / 2);
  }

  return sides;
}

/**
 * Number of nodes in the proof for `leafIndex`. At most treeHeight.
 */
export function pathLength(leafIndex: number, leafCount: number): number {
  return expectedSides(leafIndex, leafCount).length;
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build the full level pyramid.
 *
 * Leaves are copied, so later mutation of the caller's buffers does
 * not affect the result.
 *
 * @throws {MerkleError} EMPTY_INPUT for zero leaves, INVALID_HASH for a
 * malformed leaf or combining function output
 */
export function buildLevels(leaves: readonly Hash[], hashFn: HashFn): Levels {
  if (leaves.length === 0) {
    throw new MerkleError(
      "EMPTY_INPUT",
      "Cannot build a Merkle tree from zero leaves",
    );
  }

  const base = leaves.map((leaf, i) => {
    assertHash(leaf, `Leaf ${i}`);
    return new Uint8Array(leaf);
  });

  const levels: Hash[][] = [base];
  let current: Hash[] = base;
  while (current.length > 1) {
    current = nextLevel(current, hashFn);
    levels.push(current);
  }

  return levels;
}

/**
 * Root of the tree over `leaves`.
 */
export function merkleRoot(leaves: readonly Hash[], hashFn: HashFn): Hash {
  const levels = buildLevels(leaves, hashFn);
  const top = levels[levels.length - 1];
  const root = top?.[0];
  // buildLevels never returns an empty pyramid
  assertHash(root, "Root");
  return new Uint8Array(root);
}

// =============================================================================
// Proof Derivation
// =============================================================================

/**
 * Derive the inclusion proof for the leaf at `leafIndex` from a
 * pyramid produced by buildLevels.
 *
 * @throws {MerkleError} INDEX_OUT_OF_RANGE, PROOF_CAPACITY_EXCEEDED,
 * INVALID_CAPACITY
 */
export function proofFromLevels(
  levels: Levels,
  leafIndex: number,
  options: ProofOptions = {},
): MerkleProof {
  const leafCount = levels[0]?.length ?? 0;
  const required = pathLength(leafIndex, leafCount);
  const path = new ProofPath(options.capacity);

  if (required > path.capacity) {
    throw new MerkleError(
      "PROOF_CAPACITY_EXCEEDED",
      `Proof for leaf ${leafIndex} needs ${required} nodes, capacity is ${path.capacity}`,
    );
  }

  let index = leafIndex;
  for (const level of levels) {
    const isRightChild = index % 2 === 1;
    const partner = level[isRightChild ? index - 1 : index + 1];

    // No partner: carried up at this level, or this is the root level
    if (partner !== undefined) {
      path.push({
        data: new Uint8Array(partner),
        side: isRightChild ? "left" : "right",
      });
    }

    index = Math.floor(index / 2);
  }

  return { leafIndex, leafCount, nodes: path.toArray() };
}

/**
 * Derive an inclusion proof for a leaf, located by value or by index.
 *
 * By value, the first matching leaf is proved.
 *
 * @throws {MerkleError} EMPTY_INPUT, LEAF_NOT_FOUND, INDEX_OUT_OF_RANGE,
 * PROOF_CAPACITY_EXCEEDED
 */
export function merkleProof(
  leaves: readonly Hash[],
  target: ProofTarget,
  hashFn: HashFn,
  options: ProofOptions = {},
): MerkleProof {
  const levels = buildLevels(leaves, hashFn);
  return proofFromLevels(levels, resolveTarget(levels, target), options);
}

/**
 * Index of the first leaf equal to `leaf` in the pyramid, or -1.
 */
export function findLeaf(levels: Levels, leaf: Hash): number {
  return (levels[0] ?? []).findIndex((candidate) => hashesEqual(candidate, leaf));
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Replay a proof from `leaf` and return the candidate root.
 *
 * Only `nodes` is read; leafIndex and leafCount play no part in
 * inclusion. The caller compares the result to a trusted root.
 */
export function computeRoot(
  proof: Pick<MerkleProof, "nodes">,
  leaf: Hash,
  hashFn: HashFn,
): Hash {
  assertHash(leaf, "Leaf");

  let current = leaf;
  proof.nodes.forEach((node, i) => {
    assertHash(node.data, `Proof node ${i}`);
    current =
      node.side === "right"
        ? combine(hashFn, current, node.data)
        : combine(hashFn, node.data, current);
  });

  return new Uint8Array(current);
}

/**
 * Static verification: needs only the leaf, proof, expected root and
 * combining function. A mismatch returns false, it does not throw.
 */
export function verifyProof(
  leaf: Hash,
  proof: Pick<MerkleProof, "nodes">,
  root: Hash,
  hashFn: HashFn,
): boolean {
  assertHash(root, "Root");
  return hashesEqual(computeRoot(proof, leaf, hashFn), root);
}
