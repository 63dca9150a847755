/**
 * @arbor/merkle — Exclusion (non-membership) proofs.
 *
 * A target is absent from a sorted leaf set when two adjacent leaves
 * bracket it: left < target < right, each proven included under the
 * same root. At the ends of the set a single neighbor suffices
 * (target below the first leaf, or above the last).
 *
 * Assumptions the hashes alone cannot carry:
 * - Leaves were strictly ascending (compareHashes) when the tree was built
 * - The root does not commit to the leaf count. The position check binds
 *   each neighbor to the slot its proof claims within the claimed shape,
 *   and the slots must be adjacent. Without a trusted count, subtree roots
 *   can pose as leaves of a smaller tree; pass `expectedLeafCount` from an
 *   embedding protocol that commits the count to rule that out
 */

import { expectedSides, verifyProof } from "./engine.js";
import { assertHash, compareHashes, hashesEqual } from "./hash.js";
import type { MerkleTree } from "./merkle-tree.js";
import { MerkleError } from "./types.js";
import type {
  ExclusionFailure,
  ExclusionProof,
  ExclusionVerification,
  Hash,
  HashFn,
  MerkleProof,
  NeighborWitness,
} from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function witness(tree: MerkleTree, index: number): NeighborWitness {
  return { leaf: tree.getLeaf(index), proof: tree.makeProof(index) };
}

/**
 * Whether the proof's sides are exactly those of a genuine proof for
 * its claimed leafIndex in a tree of leafCount leaves.
 */
function matchesPosition(proof: MerkleProof): boolean {
  const { leafIndex, leafCount, nodes } = proof;
  if (!Number.isSafeInteger(leafCount) || leafCount < 1) {
    return false;
  }
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= leafCount) {
    return false;
  }

  const sides = expectedSides(leafIndex, leafCount);
  return (
    sides.length === nodes.length &&
    sides.every((side, i) => nodes[i]?.side === side)
  );
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Build the exclusion proof for `target` from a tree over sorted leaves.
 *
 * @throws {MerkleError} UNSORTED_LEAVES if the leaves are not strictly
 * ascending, TARGET_PRESENT if the target is one of them
 */
export function buildExclusionProof(
  tree: MerkleTree,
  target: Hash,
): ExclusionProof {
  assertHash(target, "Target");
  if (!tree.isSorted()) {
    throw new MerkleError(
      "UNSORTED_LEAVES",
      "Exclusion proofs need strictly ascending leaves",
    );
  }

  // First position whose leaf is >= target
  const count = tree.getLeafCount();
  let lo = 0;
  let hi = count;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareHashes(tree.getLeaf(mid), target) < 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  if (lo < count && hashesEqual(tree.getLeaf(lo), target)) {
    throw new MerkleError(
      "TARGET_PRESENT",
      `Target is leaf ${lo} of the tree`,
    );
  }

  return {
    left: lo > 0 ? witness(tree, lo - 1) : undefined,
    right: lo < count ? witness(tree, lo) : undefined,
  };
}

/**
 * Verify an exclusion proof against a known root.
 *
 * Checks:
 * 1. At least one neighbor is present
 * 2. Each neighbor's inclusion proof replays to `root`
 * 3. left < target < right
 * 4. Neighbors occupy adjacent slots, or the single neighbor is the
 *    first or last leaf
 * 5. Each neighbor's sides match its claimed slot
 *
 * When `expectedLeafCount` is given, a neighbor claiming any other leaf
 * count fails check 4 with NOT_ADJACENT.
 *
 * @returns Verification result listing every failed check
 */
export function verifyExclusionProof(
  target: Hash,
  proof: ExclusionProof,
  root: Hash,
  hashFn: HashFn,
  expectedLeafCount?: number,
): ExclusionVerification {
  assertHash(target, "Target");
  assertHash(root, "Root");

  const { left, right } = proof;
  if (left === undefined && right === undefined) {
    return { valid: false, errors: ["MISSING_NEIGHBOR"] };
  }

  const errors: ExclusionFailure[] = [];

  if (left !== undefined && !verifyProof(left.leaf, left.proof, root, hashFn)) {
    errors.push("LEFT_NOT_INCLUDED");
  }
  if (right !== undefined && !verifyProof(right.leaf, right.proof, root, hashFn)) {
    errors.push("RIGHT_NOT_INCLUDED");
  }

  if (
    (left !== undefined && compareHashes(left.leaf, target) >= 0) ||
    (right !== undefined && compareHashes(target, right.leaf) >= 0)
  ) {
    errors.push("ORDER_VIOLATION");
  }

  const witnesses = [left, right].filter(
    (w): w is NeighborWitness => w !== undefined,
  );

  if (
    expectedLeafCount !== undefined &&
    witnesses.some((w) => w.proof.leafCount !== expectedLeafCount)
  ) {
    errors.push("NOT_ADJACENT");
  } else if (left !== undefined && right !== undefined) {
    if (
      right.proof.leafIndex !== left.proof.leafIndex + 1 ||
      right.proof.leafCount !== left.proof.leafCount
    ) {
      errors.push("NOT_ADJACENT");
    }
  } else if (left !== undefined) {
    if (left.proof.leafIndex !== left.proof.leafCount - 1) {
      errors.push("NOT_BOUNDARY");
    }
  } else if (right !== undefined && right.proof.leafIndex !== 0) {
    errors.push("NOT_BOUNDARY");
  }

  if (witnesses.some((w) => !matchesPosition(w.proof))) {
    errors.push("POSITION_MISMATCH");
  }

  return { valid: errors.length === 0, errors };
}
