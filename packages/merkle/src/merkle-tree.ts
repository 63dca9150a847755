/**
 * @arbor/merkle — Merkle Tree.
 *
 * Immutable handle over a built level pyramid and the combining
 * function that produced it.
 *
 * Design:
 * - Build once, query many times; no insertion or removal
 * - Proofs copy the sibling bytes they need and hold no reference
 *   into the pyramid
 * - Verification is static: MerkleTree.verifyProof needs no instance
 */

import { buildExclusionProof } from "./exclusion.js";
import {
  buildLevels,
  findLeaf,
  proofFromLevels,
  resolveTarget,
  treeHeight,
  verifyProof,
} from "./engine.js";
import type { Levels } from "./engine.js";
import { assertHash, compareHashes } from "./hash.js";
import { MerkleError } from "./types.js";
import type {
  ExclusionProof,
  Hash,
  HashFn,
  MerkleProof,
  ProofOptions,
  ProofTarget,
} from "./types.js";

/**
 * Usage:
 * ```ts
 * const tree = MerkleTree.build(leaves, hashFn);
 * const root = tree.getRoot();
 * const proof = tree.makeProof(0);                       // or by value
 * MerkleTree.verifyProof(leaves[0], proof, root, hashFn); // true/false
 * ```
 */
export class MerkleTree {
  private readonly levels: Levels;
  private readonly root: Hash;
  readonly hashFn: HashFn;

  private constructor(levels: Levels, root: Hash, hashFn: HashFn) {
    this.levels = levels;
    this.root = root;
    this.hashFn = hashFn;
  }

  /**
   * Build a tree from pre-hashed 32-byte leaves.
   *
   * @throws {MerkleError} EMPTY_INPUT for zero leaves, INVALID_HASH for
   * a malformed leaf or combining function output
   */
  static build(leaves: readonly Hash[], hashFn: HashFn): MerkleTree {
    const levels = buildLevels(leaves, hashFn);
    const root = levels[levels.length - 1]?.[0];
    assertHash(root, "Root");
    return new MerkleTree(levels, root, hashFn);
  }

  /**
   * Verify a proof against a known root. Needs no tree instance.
   */
  static verifyProof(
    leaf: Hash,
    proof: Pick<MerkleProof, "nodes">,
    root: Hash,
    hashFn: HashFn,
  ): boolean {
    return verifyProof(leaf, proof, root, hashFn);
  }

  getRoot(): Hash {
    return new Uint8Array(this.root);
  }

  getLeafCount(): number {
    return this.leaves().length;
  }

  /** Number of combining rounds between leaves and root. */
  getHeight(): number {
    return treeHeight(this.getLeafCount());
  }

  /**
   * @throws {MerkleError} INDEX_OUT_OF_RANGE
   */
  getLeaf(index: number): Hash {
    const leaf = Number.isInteger(index) ? this.leaves()[index] : undefined;
    if (leaf === undefined) {
      throw new MerkleError(
        "INDEX_OUT_OF_RANGE",
        `Leaf index ${index} is outside [0, ${this.getLeafCount()})`,
      );
    }
    return new Uint8Array(leaf);
  }

  /** Index of the first leaf equal to `leaf`, or -1. */
  indexOf(leaf: Hash): number {
    return findLeaf(this.levels, leaf);
  }

  /** Leaves are strictly ascending under compareHashes. */
  isSorted(): boolean {
    const leaves = this.leaves();
    for (let i = 1; i < leaves.length; i++) {
      const prev = leaves[i - 1];
      const next = leaves[i];
      if (prev === undefined || next === undefined || compareHashes(prev, next) >= 0) {
        return false;
      }
    }
    return true;
  }

  /**
   * Inclusion proof for a leaf, by value (first occurrence) or index.
   *
   * @throws {MerkleError} LEAF_NOT_FOUND, INDEX_OUT_OF_RANGE,
   * PROOF_CAPACITY_EXCEEDED
   */
  makeProof(target: ProofTarget, options: ProofOptions = {}): MerkleProof {
    return proofFromLevels(this.levels, resolveTarget(this.levels, target), options);
  }

  /**
   * Verify a proof against this tree's root and combining function.
   */
  verifyMerkleProof(leaf: Hash, proof: Pick<MerkleProof, "nodes">): boolean {
    return verifyProof(leaf, proof, this.root, this.hashFn);
  }

  /**
   * Non-membership proof for `target`. Requires strictly ascending leaves.
   *
   * @throws {MerkleError} UNSORTED_LEAVES, TARGET_PRESENT
   */
  makeExclusionProof(target: Hash): ExclusionProof {
    return buildExclusionProof(this, target);
  }

  private leaves(): readonly Hash[] {
    return this.levels[0] ?? [];
  }
}
