/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./db-connection.port.js";
