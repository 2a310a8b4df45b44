/**
 * Barrel exports.
 *
 * Re-exports the computation core so consumers can import from `src`.
 * The CLI and server entry points are not re-exported: they run on import.
 */
export * from "./app";
export * from "./classifier";
export * from "./config";
export * from "./export";
export * from "./grid";
export * from "./numeric";
export * from "./quarterly";
export * from "./roster";
export * from "./row";
export * from "./text";
export * from "./types";
