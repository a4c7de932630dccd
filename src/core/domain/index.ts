/**
 * @module core/domain
 * Parameters, record types, value types and the services built on them
 */

export * from "./entities/index.js";
export * from "./value-objects/index.js";
export * from "./services/index.js";
export * from "./errors/index.js";
