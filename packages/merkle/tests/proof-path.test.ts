/**
 * Proof Path Tests
 *
 * Verifies:
 * - Unbounded by default
 * - Append fails once a finite capacity is reached
 * - Indexed reads are limited to [0, length)
 * - toArray returns a frozen copy
 */

import { describe, it, expect } from "vitest";
import { ProofPath } from "../src/proof-path.js";
import { MerkleError } from "../src/types.js";
import type { ProofNode } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

function node(fill: number, side: ProofNode["side"] = "right"): ProofNode {
  return { data: new Uint8Array(32).fill(fill), side };
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

// =============================================================================
// Tests
// =============================================================================

describe("ProofPath", () => {
  it("starts empty and unbounded", () => {
    const path = new ProofPath();

    expect(path.length).toBe(0);
    expect(path.capacity).toBe(Number.POSITIVE_INFINITY);
    expect(path.isFull()).toBe(false);
  });

  it("keeps nodes in append order", () => {
    const path = new ProofPath();
    path.push(node(1));
    path.push(node(2, "left"));

    expect(path.length).toBe(2);
    expect(path.at(0).data[0]).toBe(1);
    expect(path.at(1).side).toBe("left");
    expect([...path].map((n) => n.data[0])).toEqual([1, 2]);
  });

  it("rejects appends beyond capacity", () => {
    const path = new ProofPath(2);
    path.push(node(1));
    path.push(node(2));

    expect(path.isFull()).toBe(true);
    expect(errorCode(() => path.push(node(3)))).toBe("CAPACITY_EXCEEDED");
    expect(path.length).toBe(2);
  });

  it("capacity 0 is full from the start", () => {
    const path = new ProofPath(0);
    expect(path.isFull()).toBe(true);
    expect(errorCode(() => path.push(node(1)))).toBe("CAPACITY_EXCEEDED");
  });

  it("rejects reads outside [0, length)", () => {
    const path = new ProofPath(4);
    path.push(node(1));

    expect(errorCode(() => path.at(1))).toBe("INDEX_OUT_OF_RANGE");
    expect(errorCode(() => path.at(-1))).toBe("INDEX_OUT_OF_RANGE");
    expect(errorCode(() => path.at(0.5))).toBe("INDEX_OUT_OF_RANGE");
  });

  it("rejects invalid capacities", () => {
    expect(errorCode(() => new ProofPath(-1))).toBe("INVALID_CAPACITY");
    expect(errorCode(() => new ProofPath(1.5))).toBe("INVALID_CAPACITY");
    expect(errorCode(() => new ProofPath(Number.NaN))).toBe("INVALID_CAPACITY");
  });

  it("toArray returns a frozen snapshot", () => {
    const path = new ProofPath();
    path.push(node(1));

    const snapshot = path.toArray();
    path.push(node(2));

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.length).toBe(1);
  });
});
