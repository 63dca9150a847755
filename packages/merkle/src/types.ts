/**
 * @arbor/merkle — Core types.
 *
 * Types for hash values, combining functions, inclusion proofs,
 * exclusion proofs, and the structured error thrown by the engine.
 * All hashes are raw 32-byte values; hex is a transport concern (see codec).
 */

// =============================================================================
// Hash Types
// =============================================================================

/** Width of every hash the engine handles, in bytes. */
export const HASH_SIZE = 32;

/**
 * A 32-byte hash value. Leaves, internal nodes, and roots all share
 * this type. Value semantics: two hashes are the same if their bytes are.
 */
export type Hash = Uint8Array;

/**
 * Caller-supplied combining function.
 *
 * Must be deterministic and total over all pairs of 32-byte inputs,
 * and must return a 32-byte output. The engine never hashes raw data.
 */
export type HashFn = (left: Hash, right: Hash) => Hash;

// =============================================================================
// Proof Types
// =============================================================================

/**
 * Operand position a sibling occupied when it was combined.
 * - "left": sibling was the left operand, the proved path element the right
 * - "right": sibling was the right operand, the proved path element the left
 */
export type Side = "left" | "right";

/**
 * A single entry in an inclusion proof: one sibling hash and its side.
 */
export interface ProofNode {
  readonly data: Hash;
  readonly side: Side;
}

/**
 * An inclusion proof — the sibling path from a leaf up to the root.
 *
 * `nodes` is ordered leaf level first. Levels where the proved element
 * was carried up unchanged contribute no node, so `nodes.length` can be
 * smaller than the tree height.
 */
export interface MerkleProof {
  /** Position of the proved leaf at level 0 */
  readonly leafIndex: number;
  /** Number of leaves in the tree the proof was derived from */
  readonly leafCount: number;
  /** Sibling path, bottom-up */
  readonly nodes: readonly ProofNode[];
}

/**
 * Options accepted by proof derivation.
 */
export interface ProofOptions {
  /**
   * Maximum number of nodes the proof may hold. Derivation fails with
   * PROOF_CAPACITY_EXCEEDED when the leaf's path is longer.
   * Defaults to unbounded.
   */
  readonly capacity?: number | undefined;
}

/**
 * A proof request target: a leaf value (first occurrence) or a leaf index.
 */
export type ProofTarget = Hash | number;

// =============================================================================
// Exclusion Proof Types
// =============================================================================

/**
 * A leaf that is present in the tree, with its inclusion proof.
 */
export interface NeighborWitness {
  readonly leaf: Hash;
  readonly proof: MerkleProof;
}

/**
 * Non-membership argument over a sorted leaf set.
 *
 * `left` is the greatest leaf below the target, `right` the smallest
 * leaf above it. One of them is absent when the target falls outside
 * the range of the set.
 */
export interface ExclusionProof {
  readonly left?: NeighborWitness | undefined;
  readonly right?: NeighborWitness | undefined;
}

/**
 * Reasons an exclusion proof is rejected.
 */
export type ExclusionFailure =
  | "MISSING_NEIGHBOR"
  | "LEFT_NOT_INCLUDED"
  | "RIGHT_NOT_INCLUDED"
  | "ORDER_VIOLATION"
  | "NOT_ADJACENT"
  | "NOT_BOUNDARY"
  | "POSITION_MISMATCH";

/**
 * Outcome of exclusion proof verification. A rejected proof is a
 * value, not an error.
 */
export interface ExclusionVerification {
  readonly valid: boolean;
  readonly errors: readonly ExclusionFailure[];
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for engine operations.
 */
export type MerkleErrorCode =
  | "EMPTY_INPUT"
  | "LEAF_NOT_FOUND"
  | "INDEX_OUT_OF_RANGE"
  | "PROOF_CAPACITY_EXCEEDED"
  | "CAPACITY_EXCEEDED"
  | "INVALID_CAPACITY"
  | "INVALID_HASH"
  | "UNSORTED_LEAVES"
  | "TARGET_PRESENT"
  | "INVALID_ENCODING";

/**
 * Structured error from the Merkle engine.
 * Always thrown synchronously at the call that violates its contract.
 */
export class MerkleError extends Error {
  public readonly code: MerkleErrorCode;

  constructor(code: MerkleErrorCode, message: string) {
    super(message);
    this.name = "MerkleError";
    this.code = code;
  }
}
