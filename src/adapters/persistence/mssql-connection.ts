/**
 * SQL Server Connection (Default)
 *
 * Implements the DbConnection port over the `mssql` driver. A connection is
 * either built from a driver config, in which case every open() creates and
 * connects a fresh pool, or wraps a pool the caller already manages.
 *
 * Commands time out by cancelling the request on the server.
 */

import sql from "mssql";
import type {
  ConnectionPool,
  IProcedureResult,
  IResult,
  ISqlType,
  Request,
  Transaction,
  config as MssqlConfig,
} from "mssql";
import type { QueryParameter } from "../../core/domain/entities/query-parameter.js";
import {
  ArgumentError,
  CommandTimeoutError,
  InvalidStateError,
} from "../../core/domain/errors/index.js";
import { isOutputDirection } from "../../core/domain/value-objects/parameter-direction.js";
import type {
  AsyncRowCursor,
  CommandSpec,
  DbCommand,
  DbConnection,
  DbTransaction,
  RowCursor,
} from "../../core/ports/db-connection.port.js";
import { BufferedRowCursor, isRow, type Row } from "./buffered-row-cursor.js";
import {
  columnNamesOf,
  MssqlStreamCursor,
  type StreamCursorOptions,
} from "./mssql-stream-cursor.js";

/**
 * Driver type of a parameter, from its declared kind and facets
 */
export function mssqlTypeFor(parameter: QueryParameter): ISqlType {
  switch (parameter.kind) {
    case "Int64":
      return sql.BigInt();
    case "Int32":
      return sql.Int();
    case "Byte":
      return sql.TinyInt();
    case "String":
      return sql.NVarChar(parameter.size > 0 ? parameter.size : sql.MAX);
    case "Float32":
      return sql.Real();
    case "Float64":
      return sql.Float();
    case "Boolean":
      return sql.Bit();
    case "Char":
      return sql.NChar(1);
    case "DateTime":
      return sql.DateTime2();
    case "Decimal":
      return sql.Decimal(
        parameter.precision > 0 ? parameter.precision : 18,
        parameter.scale,
      );
  }
}

/**
 * Value as the driver expects it for the parameter's kind
 */
export function mssqlValueFor(parameter: QueryParameter): unknown {
  const value = parameter.value;
  if (value === null || value === undefined) {
    return null;
  }
  if (parameter.kind === "Int64" && typeof value === "bigint") {
    return value.toString();
  }
  if (parameter.kind === "Decimal" && typeof value === "string") {
    return Number(value);
  }
  return value;
}

function bindRequest(request: Request, parameters: readonly QueryParameter[]): void {
  for (const parameter of parameters) {
    const type = mssqlTypeFor(parameter);
    switch (parameter.direction) {
      case "Input":
        request.input(parameter.name, type, mssqlValueFor(parameter));
        break;
      case "Output":
        request.output(parameter.name, type);
        break;
      case "InputOutput":
        request.output(parameter.name, type, mssqlValueFor(parameter));
        break;
      case "ReturnValue":
        break;
    }
  }
}

interface CompletedRequest {
  output?: Record<string, unknown>;
  returnValue?: unknown;
  rowsAffected?: number[];
}

function populateOutputs(
  parameters: readonly QueryParameter[],
  result: CompletedRequest | undefined,
): void {
  for (const parameter of parameters) {
    if (!isOutputDirection(parameter.direction)) continue;
    parameter.populate(
      parameter.direction === "ReturnValue"
        ? result?.returnValue
        : result?.output?.[parameter.name],
    );
  }
}

function rowsOf(result: IResult<unknown>): Row[] {
  return (result.recordset ?? []).filter(isRow);
}

export class MssqlTransaction implements DbTransaction {
  constructor(
    readonly connection: MssqlConnection,
    readonly transaction: Transaction,
  ) {}

  async commit(): Promise<void> {
    await this.transaction.commit();
  }

  async rollback(): Promise<void> {
    await this.transaction.rollback();
  }
}

export type MssqlConnectionOptions = StreamCursorOptions;

export class MssqlConnection implements DbConnection {
  private pool: ConnectionPool | null = null;
  private connecting: Promise<void> | null = null;
  /** Set when this connection creates its own pools */
  private readonly config: MssqlConfig | null = null;

  constructor(
    source: MssqlConfig | ConnectionPool,
    private readonly options: MssqlConnectionOptions = {},
  ) {
    if (source instanceof sql.ConnectionPool) {
      this.pool = source;
    } else {
      this.config = source;
    }
  }

  get isOpen(): boolean {
    return this.pool?.connected ?? false;
  }

  async open(signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    if (this.connecting) {
      await this.connecting;
      return false;
    }
    if (this.isOpen) return false;

    const pool = this.config ? new sql.ConnectionPool(this.config) : this.requirePool();
    this.pool = pool;
    const connecting = pool.connect().then(() => undefined);
    this.connecting = connecting;
    try {
      await connecting;
    } finally {
      this.connecting = null;
    }
    return true;
  }

  async close(): Promise<void> {
    const pool = this.pool;
    if (!pool?.connected) return;
    await pool.close();
    if (this.config) {
      this.pool = null;
    }
  }

  async beginTransaction(): Promise<MssqlTransaction> {
    const transaction = new sql.Transaction(this.requireOpenPool());
    await transaction.begin();
    return new MssqlTransaction(this, transaction);
  }

  createCommand(spec: CommandSpec): MssqlCommand {
    if (spec.transaction && !this.isOwnTransaction(spec.transaction)) {
      throw new ArgumentError(
        "transaction",
        "Transaction was not started on this connection",
      );
    }
    const request =
      spec.transaction instanceof MssqlTransaction
        ? new sql.Request(spec.transaction.transaction)
        : new sql.Request(this.requireOpenPool());
    bindRequest(request, spec.parameters);
    return new MssqlCommand(request, spec, this.options);
  }

  private isOwnTransaction(transaction: DbTransaction): boolean {
    return transaction instanceof MssqlTransaction && transaction.connection === this;
  }

  private requirePool(): ConnectionPool {
    if (!this.pool) {
      throw new InvalidStateError("Connection is not open");
    }
    return this.pool;
  }

  private requireOpenPool(): ConnectionPool {
    const pool = this.requirePool();
    if (!pool.connected) {
      throw new InvalidStateError("Connection is not open");
    }
    return pool;
  }
}

export class MssqlCommand implements DbCommand {
  private cursor: MssqlStreamCursor | undefined;
  private timer: NodeJS.Timeout | undefined;
  private disposed = false;

  constructor(
    private readonly request: Request,
    private readonly spec: CommandSpec,
    private readonly options: StreamCursorOptions = {},
  ) {}

  async executeReader(): Promise<RowCursor> {
    const result = await this.run();
    const columns = columnNamesOf(result.recordset?.columns);
    return new BufferedRowCursor(columns, rowsOf(result));
  }

  async openReader(signal?: AbortSignal): Promise<AsyncRowCursor> {
    this.request.stream = true;
    const cursor = new MssqlStreamCursor(this.request, this.options);
    this.cursor = cursor;

    const onComplete = (_error: unknown, result?: CompletedRequest) => {
      this.clearTimer();
      populateOutputs(this.spec.parameters, result);
      cursor.complete();
    };

    this.startTimer(() => cursor.fail(new CommandTimeoutError(this.spec.timeoutSeconds)));
    if (this.spec.type === "storedProcedure") {
      this.request.execute(this.spec.text, onComplete);
    } else {
      this.request.query(this.spec.text, onComplete);
    }

    await cursor.ready(signal);
    return cursor;
  }

  async executeNonQuery(): Promise<number> {
    const result = await this.run();
    return result.rowsAffected.reduce((total, count) => total + count, 0);
  }

  async executeScalar(): Promise<unknown> {
    const result = await this.run();
    const row = rowsOf(result)[0];
    const first = columnNamesOf(result.recordset?.columns)[0];
    if (!row || first === undefined) {
      return null;
    }
    return row[first] ?? null;
  }

  cancel(): void {
    this.request.cancel();
    this.cursor?.markCancelled();
  }

  dispose(): void {
    this.disposed = true;
    this.clearTimer();
  }

  private async run(): Promise<IResult<unknown>> {
    if (this.disposed) {
      throw new InvalidStateError("Command has been disposed");
    }

    const pending: Promise<IResult<unknown> | IProcedureResult<unknown>> =
      this.spec.type === "storedProcedure"
        ? this.request.execute<unknown>(this.spec.text)
        : this.request.query<unknown>(this.spec.text);

    const timeout = new Promise<never>((_resolve, reject) => {
      this.startTimer(() => reject(new CommandTimeoutError(this.spec.timeoutSeconds)));
    });

    try {
      const result = await Promise.race([pending, timeout]);
      populateOutputs(this.spec.parameters, {
        output: result.output,
        returnValue: "returnValue" in result ? result.returnValue : undefined,
      });
      return result;
    } finally {
      this.clearTimer();
      // after a timeout the cancelled request rejects too; the timeout is reported
      pending.catch(() => undefined);
    }
  }

  private startTimer(onTimeout: () => void): void {
    if (this.spec.timeoutSeconds <= 0) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      console.warn(
        `[MssqlCommand] Command timed out after ${this.spec.timeoutSeconds}s; cancelling`,
      );
      this.request.cancel();
      onTimeout();
    }, this.spec.timeoutSeconds * 1000);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
