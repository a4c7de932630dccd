export * from "./query-parameter.js";
export * from "./record-type.js";
export * from "./graph-entity-reference.js";
