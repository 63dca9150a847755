/**
 * @arbor/merkle — Proof transport encoding.
 *
 * JSON-safe encodings of inclusion proofs, exclusion proofs and
 * self-contained proof bundles. Hashes travel as lowercase hex.
 * Decoding validates with zod at the boundary; canonicalJson gives
 * RFC 8785 bytes so the same proof always serializes identically.
 *
 * A bundle carries leaf, root and path: a third party verifies it
 * with ONLY the bundle and the combining function.
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { verifyProof } from "./engine.js";
import { hashesEqual, hashFromHex, hashToHex } from "./hash.js";
import type { MerkleTree } from "./merkle-tree.js";
import { MerkleError } from "./types.js";
import type {
  ExclusionProof,
  Hash,
  HashFn,
  MerkleProof,
  NeighborWitness,
  ProofOptions,
  ProofTarget,
} from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

const HexHashSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, "must be 64 hex characters");

const ProofNodeSchema = z.object({
  data: HexHashSchema,
  side: z.enum(["left", "right"]),
});

export const EncodedProofSchema = z
  .object({
    leafIndex: z.number().int().nonnegative(),
    leafCount: z.number().int().positive(),
    nodes: z.array(ProofNodeSchema),
  })
  .refine((p) => p.leafIndex < p.leafCount, {
    message: "leafIndex must be below leafCount",
    path: ["leafIndex"],
  });

const EncodedNeighborSchema = z.object({
  leaf: HexHashSchema,
  proof: EncodedProofSchema,
});

export const EncodedExclusionProofSchema = z.object({
  left: EncodedNeighborSchema.optional(),
  right: EncodedNeighborSchema.optional(),
});

export const ProofBundleSchema = z.object({
  version: z.literal(1),
  leaf: HexHashSchema,
  root: HexHashSchema,
  proof: EncodedProofSchema,
});

export type EncodedProof = z.infer<typeof EncodedProofSchema>;
export type EncodedNeighbor = z.infer<typeof EncodedNeighborSchema>;
export type EncodedExclusionProof = z.infer<typeof EncodedExclusionProofSchema>;
export type ProofBundle = z.infer<typeof ProofBundleSchema>;

/** A bundle after decoding: raw hashes, ready to verify. */
export interface DecodedProofBundle {
  readonly leaf: Hash;
  readonly root: Hash;
  readonly proof: MerkleProof;
}

// =============================================================================
// Internal Helpers
// =============================================================================

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  label: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MerkleError("INVALID_ENCODING", `Invalid ${label}: ${issues}`);
  }
  return result.data;
}

function toProof(encoded: EncodedProof): MerkleProof {
  return {
    leafIndex: encoded.leafIndex,
    leafCount: encoded.leafCount,
    nodes: encoded.nodes.map((node) => ({
      data: hashFromHex(node.data),
      side: node.side,
    })),
  };
}

function toNeighbor(encoded: EncodedNeighbor | undefined): NeighborWitness | undefined {
  return encoded === undefined
    ? undefined
    : { leaf: hashFromHex(encoded.leaf), proof: toProof(encoded.proof) };
}

function fromNeighbor(neighbor: NeighborWitness | undefined): EncodedNeighbor | undefined {
  return neighbor === undefined
    ? undefined
    : { leaf: hashToHex(neighbor.leaf), proof: encodeProof(neighbor.proof) };
}

// =============================================================================
// Public API
// =============================================================================

export function encodeProof(proof: MerkleProof): EncodedProof {
  return {
    leafIndex: proof.leafIndex,
    leafCount: proof.leafCount,
    nodes: proof.nodes.map((node) => ({
      data: hashToHex(node.data),
      side: node.side,
    })),
  };
}

/**
 * @throws {MerkleError} INVALID_ENCODING when `input` is not an encoded proof
 */
export function decodeProof(input: unknown): MerkleProof {
  return toProof(parseWith(EncodedProofSchema, input, "proof"));
}

/**
 * Absent neighbors are omitted rather than written as null.
 */
export function encodeExclusionProof(proof: ExclusionProof): EncodedExclusionProof {
  const left = fromNeighbor(proof.left);
  const right = fromNeighbor(proof.right);
  return {
    ...(left !== undefined ? { left } : {}),
    ...(right !== undefined ? { right } : {}),
  };
}

/**
 * @throws {MerkleError} INVALID_ENCODING when `input` is not an encoded
 * exclusion proof
 */
export function decodeExclusionProof(input: unknown): ExclusionProof {
  const encoded = parseWith(EncodedExclusionProofSchema, input, "exclusion proof");
  return {
    left: toNeighbor(encoded.left),
    right: toNeighbor(encoded.right),
  };
}

/**
 * Package a leaf, its inclusion proof and the tree root.
 *
 * @throws {MerkleError} as MerkleTree.makeProof
 */
export function createProofBundle(
  tree: MerkleTree,
  target: ProofTarget,
  options: ProofOptions = {},
): ProofBundle {
  const proof = tree.makeProof(target, options);
  return {
    version: 1,
    leaf: hashToHex(tree.getLeaf(proof.leafIndex)),
    root: hashToHex(tree.getRoot()),
    proof: encodeProof(proof),
  };
}

/**
 * @throws {MerkleError} INVALID_ENCODING when `input` is not a bundle
 */
export function decodeProofBundle(input: unknown): DecodedProofBundle {
  const bundle = parseWith(ProofBundleSchema, input, "proof bundle");
  return {
    leaf: hashFromHex(bundle.leaf),
    root: hashFromHex(bundle.root),
    proof: toProof(bundle.proof),
  };
}

/**
 * Verify a proof bundle.
 *
 * The bundle's own root is the default anchor. Pass `expectedRoot`
 * to pin a root obtained out of band; a bundle naming any other root
 * is then rejected.
 *
 * @throws {MerkleError} INVALID_ENCODING when `input` is not a bundle
 */
export function verifyProofBundle(
  input: unknown,
  hashFn: HashFn,
  expectedRoot?: Hash,
): boolean {
  const { leaf, root, proof } = decodeProofBundle(input);
  if (expectedRoot !== undefined && !hashesEqual(root, expectedRoot)) {
    return false;
  }
  return verifyProof(leaf, proof, root, hashFn);
}

/**
 * RFC 8785 canonical JSON of an encoded value.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}
