export * from "./sql-kind.js";
export * from "./parameter-direction.js";
export * from "./value-type.js";
export * from "./typed-value.js";
