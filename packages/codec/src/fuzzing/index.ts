/**
 * Property-test support: fast-check arbitraries for documents that
 * survive a write/read round trip unchanged.
 */

export * from "./arbitraries.js";
export * from "./primitives.js";
