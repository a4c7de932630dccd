/**
 * Database Connection Port
 *
 * Abstracts the driver underneath the query executor so the same execution
 * discipline (connection ownership, cancellation, output parameters) applies
 * to every store the layer talks to.
 */

import type { QueryParameter } from "../domain/entities/query-parameter.js";

export type CommandType = "text" | "storedProcedure";

/**
 * Opaque handle of a transaction started on a connection
 */
export interface DbTransaction {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface CommandSpec {
  text: string;
  type: CommandType;
  parameters: readonly QueryParameter[];
  transaction?: DbTransaction;
  /** Seconds; 0 disables the timeout */
  timeoutSeconds: number;
}

/**
 * Columns and values of the current row of a forward-only cursor
 */
export interface RowSource {
  readonly fieldCount: number;
  getName(ordinal: number): string;
  getValue(ordinal: number): unknown;
  isNull(ordinal: number): boolean;
}

/**
 * Cursor over a buffered result: advancing never waits on the store
 */
export interface RowCursor extends RowSource {
  read(): boolean;
}

/**
 * Cursor over a live result stream: advancing may suspend
 */
export interface AsyncRowCursor extends RowSource {
  read(signal?: AbortSignal): Promise<boolean>;
  /**
   * Release the cursor. Waits for the remaining rows of the command
   * unless the command was cancelled first.
   */
  close(): Promise<void>;
}

export interface DbCommand {
  /** Execute and buffer the first result set */
  executeReader(): Promise<RowCursor>;
  /** Execute and stream the first result set */
  openReader(signal?: AbortSignal): Promise<AsyncRowCursor>;
  executeNonQuery(): Promise<number>;
  /** First column of the first row, or null */
  executeScalar(): Promise<unknown>;
  /** Ask the store to abort the in-flight command */
  cancel(): void;
  dispose(): void;
}

export interface DbConnection {
  readonly isOpen: boolean;
  /**
   * Open the connection. Resolves true only for the call that opened it;
   * a call made while another open is in flight waits for it and resolves false.
   */
  open(signal?: AbortSignal): Promise<boolean>;
  close(): Promise<void>;
  beginTransaction(): Promise<DbTransaction>;
  createCommand(spec: CommandSpec): DbCommand;
}

export interface ExecutionContext {
  connection: DbConnection;
  transaction?: DbTransaction;
  /** Seconds; 0 disables the timeout */
  timeoutSeconds?: number;
  /** Write command text to console.debug before execution */
  logQueries?: boolean;
}
