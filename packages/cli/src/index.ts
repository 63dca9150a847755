/**
 * @arbor/cli — Programmatic entry points of the arbor command.
 *
 * @packageDocumentation
 */

export { loadConfig, ConfigSchema, HASH_ALGORITHMS } from "./config.js";
export type { AppConfig, HashAlgorithm } from "./config.js";
export { createLogger } from "./logger.js";
export { createCombiner } from "./hashers.js";
export { parseHexHash, parseLeafList, readLeafFile, sortLeaves } from "./leaves.js";
export { createProgram, runCli, VERSION, EXIT_FAILURE } from "./program.js";
export type { CliContext, CliDeps, CliIO } from "./program.js";
