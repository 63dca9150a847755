/**
 * @arbor/merkle — Hash-agnostic Merkle trees.
 *
 * Roots over pre-hashed leaves, inclusion proofs, static
 * verification, exclusion proofs over sorted leaf sets, and a JSON
 * transport encoding for all of them.
 *
 * @packageDocumentation
 */

// Types
export { HASH_SIZE, MerkleError } from "./types.js";
export type {
  Hash,
  HashFn,
  Side,
  ProofNode,
  MerkleProof,
  ProofOptions,
  ProofTarget,
  NeighborWitness,
  ExclusionProof,
  ExclusionFailure,
  ExclusionVerification,
  MerkleErrorCode,
} from "./types.js";

// Hash values
export {
  isHash,
  assertHash,
  hashFromHex,
  hashToHex,
  hashesEqual,
  compareHashes,
} from "./hash.js";

// Proof container
export { ProofPath } from "./proof-path.js";

// Engine
export {
  buildLevels,
  merkleRoot,
  merkleProof,
  proofFromLevels,
  computeRoot,
  verifyProof,
  treeHeight,
  pathLength,
  expectedSides,
} from "./engine.js";
export type { Levels } from "./engine.js";

// Tree handle
export { MerkleTree } from "./merkle-tree.js";

// Exclusion proofs
export { buildExclusionProof, verifyExclusionProof } from "./exclusion.js";

// Transport encoding
export {
  encodeProof,
  decodeProof,
  encodeExclusionProof,
  decodeExclusionProof,
  createProofBundle,
  decodeProofBundle,
  verifyProofBundle,
  canonicalJson,
  EncodedProofSchema,
  EncodedExclusionProofSchema,
  ProofBundleSchema,
} from "./codec.js";
export type {
  EncodedProof,
  EncodedNeighbor,
  EncodedExclusionProof,
  ProofBundle,
  DecodedProofBundle,
} from "./codec.js";
