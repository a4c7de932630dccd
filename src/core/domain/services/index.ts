/**
 * Domain Services Index
 */

export * from "./parameter-binder.js";
export * from "./result-mapper.js";
export * from "./connection-lease.js";
export * from "./query-executor.js";
export * from "./graph-query-synthesizer.js";
