/**
 * @arbor/merkle — Hash value helpers.
 *
 * Narrowing, hex conversion, equality and ordering for 32-byte hashes.
 * Ordering is unsigned lexicographic over bytes, which is the order
 * sorted leaf sets and exclusion proofs are defined against.
 */

import { HASH_SIZE, MerkleError } from "./types.js";
import type { Hash } from "./types.js";

const HEX_HASH = /^[0-9a-f]{64}$/i;

export function isHash(value: unknown): value is Hash {
  return value instanceof Uint8Array && value.length === HASH_SIZE;
}

/**
 * Throw INVALID_HASH unless `value` is a 32-byte Uint8Array.
 *
 * @param label - Names the offending value in the error message
 */
export function assertHash(value: unknown, label: string): asserts value is Hash {
  if (!isHash(value)) {
    const got =
      value instanceof Uint8Array ? `${value.length} bytes` : typeof value;
    throw new MerkleError(
      "INVALID_HASH",
      `${label} must be a ${HASH_SIZE}-byte Uint8Array, got ${got}`,
    );
  }
}

/**
 * Decode a 64-character hex string (either case) into a hash.
 */
export function hashFromHex(hex: string): Hash {
  if (!HEX_HASH.test(hex)) {
    throw new MerkleError(
      "INVALID_HASH",
      `Expected ${HASH_SIZE * 2} hex characters, got "${hex}"`,
    );
  }
  return new Uint8Array(Buffer.from(hex, "hex"));
}

/**
 * Encode a hash as lowercase hex.
 */
export function hashToHex(hash: Hash): string {
  return Buffer.from(hash.buffer, hash.byteOffset, hash.byteLength).toString(
    "hex",
  );
}

export function hashesEqual(a: Hash, b: Hash): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Compare two hashes as unsigned big-endian byte strings.
 * Returns -1, 0 or 1, suitable for Array.prototype.sort.
 */
export function compareHashes(a: Hash, b: Hash): number {
  return Buffer.compare(a, b);
}
