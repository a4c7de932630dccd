/**
 * @module core/use-cases
 * Application use cases (orchestration layer)
 */

export * from "./data-context.js";
export * from "./crud.service.js";
