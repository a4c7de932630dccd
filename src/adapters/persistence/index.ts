/**
 * @module adapters/persistence
 * SQL Server and PostgreSQL drivers behind the DbConnection port
 */

export * from "./buffered-row-cursor.js";
export * from "./mssql-stream-cursor.js";
export * from "./mssql-connection.js";
export * from "./pg-connection.js";
