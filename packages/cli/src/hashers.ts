/**
 * @arbor/cli — Combining functions.
 *
 * The library takes any (left, right) => hash function; the CLI picks
 * one: digest(left || right) over a node:crypto algorithm with a
 * 32-byte output.
 */

import { createHash } from "node:crypto";
import type { HashFn } from "@arbor/merkle";
import type { HashAlgorithm } from "./config.js";

export function createCombiner(algorithm: HashAlgorithm): HashFn {
  return (left, right) =>
    new Uint8Array(createHash(algorithm).update(left).update(right).digest());
}
