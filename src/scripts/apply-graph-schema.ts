/**
 * Graph Schema Script
 *
 * Applies node and edge table DDL. Batches are separated by `GO` lines, as
 * SQL Server tooling writes them; each batch runs as its own command.
 *
 * Usage: GRAPH_DB_SERVER=... tsx src/scripts/apply-graph-schema.ts [file.sql]
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { QueryExecutor } from "../core/domain/services/query-executor.js";
import type { DbConnection } from "../core/ports/db-connection.port.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const SCHEMA_FILE = path.join("sql", "graph-schema.sql");

/**
 * Nearest `sql/graph-schema.sql` at or above `startDir`, so the bundled
 * schema is found from the sources and from a build under dist/ alike.
 * Falls back to the package-root location when none exists.
 */
export function locateSchemaFile(startDir: string): string {
  for (let dir = path.resolve(startDir); ; dir = path.dirname(dir)) {
    const candidate = path.join(dir, SCHEMA_FILE);
    if (fs.existsSync(candidate)) return candidate;
    if (path.dirname(dir) === dir) break;
  }
  return path.resolve(startDir, "../..", SCHEMA_FILE);
}

export const DEFAULT_SCHEMA_PATH = locateSchemaFile(__dirname);

const BATCH_SEPARATOR = /^[ \t]*GO[ \t]*;?[ \t\r]*$/gim;

export function splitBatches(script: string): string[] {
  return script
    .split(BATCH_SEPARATOR)
    .map((batch) => batch.trim())
    .filter((batch) => batch !== "" && !isCommentOnly(batch));
}

function isCommentOnly(batch: string): boolean {
  return batch.split("\n").every((line) => {
    const trimmed = line.trim();
    return trimmed === "" || trimmed.startsWith("--");
  });
}

export interface ApplySchemaOptions {
  schemaPath?: string;
  timeoutSeconds?: number;
}

/**
 * Run every batch of the schema file in order. Returns the number of
 * batches executed.
 */
export async function applyGraphSchema(
  connection: DbConnection,
  options: ApplySchemaOptions = {},
): Promise<number> {
  const schemaPath = options.schemaPath ?? DEFAULT_SCHEMA_PATH;
  if (!fs.existsSync(schemaPath)) {
    throw new Error(`Schema file not found at: ${schemaPath}`);
  }

  const batches = splitBatches(fs.readFileSync(schemaPath, "utf-8"));
  console.log(`📦 Applying schema: ${path.basename(schemaPath)} (${batches.length} batches)`);

  for (const [index, batch] of batches.entries()) {
    await new QueryExecutor(
      { connection, timeoutSeconds: options.timeoutSeconds },
      batch,
    ).executeNonQuery();
    console.log(`[GraphSchema] Batch ${index + 1}/${batches.length} applied`);
  }

  console.log("✅ Schema applied");
  return batches.length;
}

async function main(): Promise<void> {
  const { loadConfig, toMssqlConfig } = await import("../main/config.js");
  const { MssqlConnection } = await import(
    "../adapters/persistence/mssql-connection.js"
  );

  const config = loadConfig();
  const connection = new MssqlConnection(toMssqlConfig(config));
  await connection.open();
  try {
    await applyGraphSchema(connection, {
      schemaPath: process.argv[2],
      timeoutSeconds: config.commandTimeoutSeconds,
    });
  } finally {
    await connection.close();
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  main().catch((error: unknown) => {
    console.error("❌ Schema application failed:", error);
    process.exit(1);
  });
}
