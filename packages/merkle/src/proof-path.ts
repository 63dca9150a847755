/**
 * @arbor/merkle — Proof path container.
 *
 * Append-only ordered sequence of proof nodes with an optional
 * capacity ceiling. Unbounded by default; a finite capacity is for
 * embedders that budget proof sizes up front (fixed-width circuits,
 * fixed-size wire frames).
 */

import { MerkleError } from "./types.js";
import type { ProofNode } from "./types.js";

export class ProofPath implements Iterable<ProofNode> {
  readonly capacity: number;
  private readonly nodes: ProofNode[] = [];

  /**
   * @param capacity - Maximum number of nodes; a non-negative integer or Infinity
   */
  constructor(capacity: number = Number.POSITIVE_INFINITY) {
    if (
      capacity !== Number.POSITIVE_INFINITY &&
      !(Number.isSafeInteger(capacity) && capacity >= 0)
    ) {
      throw new MerkleError(
        "INVALID_CAPACITY",
        `Capacity must be a non-negative integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
  }

  /** Number of populated entries. */
  get length(): number {
    return this.nodes.length;
  }

  isFull(): boolean {
    return this.nodes.length >= this.capacity;
  }

  /**
   * Append a node.
   *
   * @throws {MerkleError} CAPACITY_EXCEEDED when the path is full
   */
  push(node: ProofNode): void {
    if (this.isFull()) {
      throw new MerkleError(
        "CAPACITY_EXCEEDED",
        `Proof path is full (capacity ${this.capacity})`,
      );
    }
    this.nodes.push(node);
  }

  /**
   * Read the node at `index`.
   *
   * @throws {MerkleError} INDEX_OUT_OF_RANGE outside [0, length)
   */
  at(index: number): ProofNode {
    const node = Number.isInteger(index) ? this.nodes[index] : undefined;
    if (node === undefined) {
      throw new MerkleError(
        "INDEX_OUT_OF_RANGE",
        `Index ${index} is outside [0, ${this.nodes.length})`,
      );
    }
    return node;
  }

  /** Frozen copy of the populated entries. */
  toArray(): readonly ProofNode[] {
    return Object.freeze([...this.nodes]);
  }

  [Symbol.iterator](): Iterator<ProofNode> {
    return this.nodes[Symbol.iterator]();
  }
}
