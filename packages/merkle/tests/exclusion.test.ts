/**
 * Exclusion Proof Tests
 *
 * Verifies:
 * - Gap, below-first and above-last targets produce valid proofs
 * - Present targets and unsorted trees are refused at build time
 * - Each rejection reason: missing neighbor, inclusion failure,
 *   ordering, adjacency, boundary, and forged position
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { MerkleTree } from "../src/merkle-tree.js";
import {
  buildExclusionProof,
  verifyExclusionProof,
} from "../src/exclusion.js";
import { MerkleError } from "../src/types.js";
import type { ExclusionProof, Hash, HashFn } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const hashPair: HashFn = (left, right) =>
  new Uint8Array(createHash("sha256").update(left).update(right).digest());

/** 32-byte value whose first byte is `lead`; orders by `lead`. */
function valueOf(lead: number): Hash {
  const hash = new Uint8Array(32);
  hash[0] = lead;
  return hash;
}

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof MerkleError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

// Sorted set [a, b, c, d]
const a = valueOf(0x10);
const b = valueOf(0x20);
const c = valueOf(0x30);
const d = valueOf(0x40);
const tree = MerkleTree.build([a, b, c, d], hashPair);
const root = tree.getRoot();

// =============================================================================
// Building
// =============================================================================

describe("buildExclusionProof", () => {
  it("brackets a gap target with its adjacent neighbors", () => {
    const proof = buildExclusionProof(tree, valueOf(0x28));

    expect(proof.left?.proof.leafIndex).toBe(1);
    expect(proof.right?.proof.leafIndex).toBe(2);
    expect(verifyExclusionProof(valueOf(0x28), proof, root, hashPair)).toEqual({
      valid: true,
      errors: [],
    });
  });

  it("uses only the first leaf for a target below the set", () => {
    const proof = tree.makeExclusionProof(valueOf(0x05));

    expect(proof.left).toBeUndefined();
    expect(proof.right?.proof.leafIndex).toBe(0);
    expect(verifyExclusionProof(valueOf(0x05), proof, root, hashPair).valid).toBe(true);
  });

  it("uses only the last leaf for a target above the set", () => {
    const proof = tree.makeExclusionProof(valueOf(0x50));

    expect(proof.right).toBeUndefined();
    expect(proof.left?.proof.leafIndex).toBe(3);
    expect(verifyExclusionProof(valueOf(0x50), proof, root, hashPair).valid).toBe(true);
  });

  it("proves every gap of an odd-sized set", () => {
    const leaves = [0x10, 0x20, 0x30, 0x40, 0x50].map(valueOf);
    const odd = MerkleTree.build(leaves, hashPair);

    for (const lead of [0x05, 0x15, 0x25, 0x35, 0x45, 0x55]) {
      const target = valueOf(lead);
      const proof = odd.makeExclusionProof(target);
      expect(verifyExclusionProof(target, proof, odd.getRoot(), hashPair).valid).toBe(true);
    }
  });

  it("works on a single-leaf set", () => {
    const single = MerkleTree.build([b], hashPair);

    for (const lead of [0x05, 0x50]) {
      const target = valueOf(lead);
      const proof = single.makeExclusionProof(target);
      expect(verifyExclusionProof(target, proof, single.getRoot(), hashPair).valid).toBe(true);
    }
  });

  it("refuses a target that is present", () => {
    expect(errorCode(() => tree.makeExclusionProof(c))).toBe("TARGET_PRESENT");
  });

  it("refuses unsorted or duplicated leaves", () => {
    const unsorted = MerkleTree.build([b, a, c], hashPair);
    const duplicated = MerkleTree.build([a, b, b, c], hashPair);

    expect(errorCode(() => unsorted.makeExclusionProof(valueOf(0x28)))).toBe("UNSORTED_LEAVES");
    expect(errorCode(() => duplicated.makeExclusionProof(valueOf(0x28)))).toBe("UNSORTED_LEAVES");
  });
});

// =============================================================================
// Rejection
// =============================================================================

describe("verifyExclusionProof rejections", () => {
  const target = valueOf(0x28);

  it("rejects a proof with no neighbors", () => {
    expect(verifyExclusionProof(target, {}, root, hashPair)).toEqual({
      valid: false,
      errors: ["MISSING_NEIGHBOR"],
    });
  });

  it("rejects neighbors that are not under the root", () => {
    const other = MerkleTree.build([a, b, c, valueOf(0x41)], hashPair);
    const proof = buildExclusionProof(tree, target);

    expect(verifyExclusionProof(target, proof, other.getRoot(), hashPair).errors).toEqual([
      "LEFT_NOT_INCLUDED",
      "RIGHT_NOT_INCLUDED",
    ]);
  });

  it("rejects a target outside the neighbors' interval", () => {
    const proof = buildExclusionProof(tree, target);

    expect(verifyExclusionProof(valueOf(0x35), proof, root, hashPair).errors).toEqual([
      "ORDER_VIOLATION",
    ]);
  });

  it("rejects a target equal to a neighbor", () => {
    const proof = buildExclusionProof(tree, target);

    expect(verifyExclusionProof(b, proof, root, hashPair).errors).toEqual(["ORDER_VIOLATION"]);
  });

  it("rejects a genuine but non-adjacent pair", () => {
    const proof: ExclusionProof = {
      left: { leaf: a, proof: tree.makeProof(0) },
      right: { leaf: d, proof: tree.makeProof(3) },
    };

    expect(verifyExclusionProof(target, proof, root, hashPair)).toEqual({
      valid: false,
      errors: ["NOT_ADJACENT"],
    });
  });

  it("rejects a one-sided proof away from the ends of the set", () => {
    const proof: ExclusionProof = {
      left: { leaf: b, proof: tree.makeProof(1) },
    };

    expect(verifyExclusionProof(target, proof, root, hashPair).errors).toEqual([
      "NOT_BOUNDARY",
    ]);
  });

  it("rejects a right-only proof that is not the first leaf", () => {
    const proof: ExclusionProof = {
      right: { leaf: c, proof: tree.makeProof(2) },
    };

    expect(verifyExclusionProof(target, proof, root, hashPair).errors).toEqual([
      "NOT_BOUNDARY",
    ]);
  });

  it("rejects a neighbor whose claimed slot does not match its path", () => {
    // d really sits at index 3; claiming index 1 makes the pair look adjacent
    const proof: ExclusionProof = {
      left: { leaf: a, proof: tree.makeProof(0) },
      right: { leaf: d, proof: { ...tree.makeProof(3), leafIndex: 1 } },
    };

    expect(verifyExclusionProof(target, proof, root, hashPair).errors).toEqual([
      "POSITION_MISMATCH",
    ]);
  });

  it("rejects a leaf count that is not a safe integer", () => {
    for (const leafCount of [Infinity, NaN, 2 ** 53]) {
      const proof: ExclusionProof = {
        right: { leaf: a, proof: { ...tree.makeProof(0), leafCount } },
      };

      expect(verifyExclusionProof(valueOf(0x05), proof, root, hashPair)).toEqual({
        valid: false,
        errors: ["POSITION_MISMATCH"],
      });
    }
  });

  it("rejects a claimed slot outside the claimed leaf count", () => {
    const proof: ExclusionProof = {
      right: { leaf: a, proof: { ...tree.makeProof(0), leafCount: 0 } },
    };

    expect(verifyExclusionProof(valueOf(0x05), proof, root, hashPair).errors).toEqual([
      "POSITION_MISMATCH",
    ]);
  });
});

// =============================================================================
// Committed leaf count
// =============================================================================

describe("verifyExclusionProof with an expected leaf count", () => {
  const target = valueOf(0x28);

  // Subtree roots H(a,b) and H(c,d) posing as the two leaves of a 2-leaf tree
  const ab = hashPair(a, b);
  const cd = hashPair(c, d);
  const subtrees: ExclusionProof = {
    left: { leaf: ab, proof: { leafIndex: 0, leafCount: 2, nodes: [{ data: cd, side: "right" }] } },
    right: { leaf: cd, proof: { leafIndex: 1, leafCount: 2, nodes: [{ data: ab, side: "left" }] } },
  };

  it("accepts a genuine proof under the tree's own count", () => {
    const proof = tree.makeExclusionProof(target);

    expect(verifyExclusionProof(target, proof, root, hashPair, 4)).toEqual({
      valid: true,
      errors: [],
    });
  });

  it("rejects a genuine proof under another count", () => {
    const proof = tree.makeExclusionProof(target);

    expect(verifyExclusionProof(target, proof, root, hashPair, 5)).toEqual({
      valid: false,
      errors: ["NOT_ADJACENT"],
    });
  });

  it("shape checks alone cannot tell subtree roots from leaves", () => {
    const { errors } = verifyExclusionProof(target, subtrees, root, hashPair);

    expect(errors).not.toContain("LEFT_NOT_INCLUDED");
    expect(errors).not.toContain("RIGHT_NOT_INCLUDED");
    expect(errors).not.toContain("NOT_ADJACENT");
    expect(errors).not.toContain("POSITION_MISMATCH");
  });

  it("rejects subtree roots once the count is known", () => {
    const result = verifyExclusionProof(target, subtrees, root, hashPair, 4);

    expect(result.valid).toBe(false);
    expect(result.errors).toContain("NOT_ADJACENT");
  });
});
