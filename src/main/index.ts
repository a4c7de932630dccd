/**
 * @module main
 * Composition root and public entry point
 */

export * from "../core/index.js";
export * from "../adapters/index.js";
export * from "./config.js";
export * from "../scripts/apply-graph-schema.js";
