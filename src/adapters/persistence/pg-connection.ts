/**
 * PostgreSQL Connection
 *
 * Implements the DbConnection port over a `pg` client, for stores that keep
 * plain tables rather than SQL Server graph tables. `@name` placeholders are
 * rewritten to positional `$n` parameters; stored procedures run as
 * `CALL name(...)` with OUT values read back from the returned row.
 *
 * Results are buffered; cancel() stops delivering rows but cannot stop the
 * statement on the server.
 */

import pg from "pg";
import type { Client, ClientConfig, QueryResult } from "pg";
import type { QueryParameter } from "../../core/domain/entities/query-parameter.js";
import {
  ArgumentError,
  CommandTimeoutError,
  InvalidStateError,
  UnsupportedOperationError,
} from "../../core/domain/errors/index.js";
import { carriesInputValue, isOutputDirection } from "../../core/domain/value-objects/parameter-direction.js";
import type {
  AsyncRowCursor,
  CommandSpec,
  DbCommand,
  DbConnection,
  DbTransaction,
  RowCursor,
} from "../../core/ports/db-connection.port.js";
import {
  BufferedAsyncRowCursor,
  BufferedRowCursor,
  isRow,
} from "./buffered-row-cursor.js";

const PLACEHOLDER = /(?<!@)@([A-Za-z_]\w*)/g;

export interface PositionalCommand {
  text: string;
  values: unknown[];
}

function pgValueFor(parameter: QueryParameter): unknown {
  const value = parameter.value;
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return value.toString();
  return value;
}

/**
 * Rewrite `@name` placeholders to `$n`. A name used twice binds once.
 * Placeholders without a bound parameter are left as written.
 */
export function toPositional(
  text: string,
  parameters: readonly QueryParameter[],
): PositionalCommand {
  const byName = new Map(
    parameters.map((parameter): [string, QueryParameter] => [
      parameter.name.toLowerCase(),
      parameter,
    ]),
  );
  const positions = new Map<string, number>();
  const values: unknown[] = [];

  const rewritten = text.replace(PLACEHOLDER, (placeholder, name: string) => {
    const key = name.toLowerCase();
    const parameter = byName.get(key);
    if (!parameter) return placeholder;

    let position = positions.get(key);
    if (position === undefined) {
      values.push(pgValueFor(parameter));
      position = values.length;
      positions.set(key, position);
    }
    return `$${position}`;
  });

  return { text: rewritten, values };
}

/**
 * `CALL name($1, ...)` with one argument per input, input/output and
 * output parameter, in binding order. Output arguments are sent as NULL.
 */
export function toProcedureCall(
  name: string,
  parameters: readonly QueryParameter[],
): PositionalCommand {
  const values = parameters.map((parameter) =>
    carriesInputValue(parameter.direction) ? pgValueFor(parameter) : null,
  );
  const placeholders = values.map((_value, index) => `$${index + 1}`);
  return { text: `CALL ${name}(${placeholders.join(", ")})`, values };
}

export class PgTransaction implements DbTransaction {
  constructor(
    readonly connection: PgConnection,
    private readonly client: Client,
  ) {}

  async commit(): Promise<void> {
    await this.client.query("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.client.query("ROLLBACK");
  }
}

export class PgConnection implements DbConnection {
  private client: Client | null = null;
  private connecting: Promise<void> | null = null;

  constructor(private readonly config: ClientConfig | string) {}

  get isOpen(): boolean {
    return this.client !== null;
  }

  async open(signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    if (this.connecting) {
      await this.connecting;
      return false;
    }
    if (this.client) return false;

    const client = new pg.Client(this.config);
    const connecting = client.connect().then(() => {
      this.client = client;
    });
    this.connecting = connecting;
    try {
      await connecting;
    } finally {
      this.connecting = null;
    }
    return true;
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.end();
  }

  async beginTransaction(): Promise<PgTransaction> {
    const client = this.requireClient();
    await client.query("BEGIN");
    return new PgTransaction(this, client);
  }

  createCommand(spec: CommandSpec): PgCommand {
    if (
      spec.transaction &&
      !(spec.transaction instanceof PgTransaction && spec.transaction.connection === this)
    ) {
      throw new ArgumentError(
        "transaction",
        "Transaction was not started on this connection",
      );
    }
    if (spec.parameters.some((parameter) => parameter.direction === "ReturnValue")) {
      throw new UnsupportedOperationError(
        "PostgreSQL procedures have no return value; use an OUT parameter",
      );
    }
    return new PgCommand(this.requireClient(), spec);
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new InvalidStateError("Connection is not open");
    }
    return this.client;
  }
}

export class PgCommand implements DbCommand {
  private cursor: BufferedRowCursor | undefined;
  private cancelled = false;
  private disposed = false;

  constructor(
    private readonly client: Client,
    private readonly spec: CommandSpec,
  ) {}

  executeReader(): Promise<RowCursor> {
    return this.executeReaderBuffered();
  }

  async openReader(signal?: AbortSignal): Promise<AsyncRowCursor> {
    signal?.throwIfAborted();
    return new BufferedAsyncRowCursor(await this.executeReaderBuffered());
  }

  async executeNonQuery(): Promise<number> {
    const result = await this.run();
    return result.rowCount ?? 0;
  }

  async executeScalar(): Promise<unknown> {
    const result = await this.run();
    const row = result.rows.filter(isRow)[0];
    const first = result.fields[0]?.name;
    if (!row || first === undefined) {
      return null;
    }
    return row[first] ?? null;
  }

  cancel(): void {
    this.cancelled = true;
    this.cursor?.exhaust();
  }

  dispose(): void {
    this.disposed = true;
  }

  private async executeReaderBuffered(): Promise<BufferedRowCursor> {
    const result = await this.run();
    const cursor = new BufferedRowCursor(
      result.fields.map((field) => field.name),
      this.cancelled ? [] : result.rows.filter(isRow),
    );
    this.cursor = cursor;
    return cursor;
  }

  private async run(): Promise<QueryResult> {
    if (this.disposed) {
      throw new InvalidStateError("Command has been disposed");
    }

    const command =
      this.spec.type === "storedProcedure"
        ? toProcedureCall(this.spec.text, this.spec.parameters)
        : toPositional(this.spec.text, this.spec.parameters);

    const pending = this.client.query(command.text, command.values);
    const result = await this.withTimeout(pending);
    this.populateOutputs(result);
    return result;
  }

  private populateOutputs(result: QueryResult): void {
    const row = result.rows.filter(isRow)[0];
    for (const parameter of this.spec.parameters) {
      if (!isOutputDirection(parameter.direction)) continue;
      parameter.populate(row?.[parameter.name.toLowerCase()]);
    }
  }

  private async withTimeout<R>(pending: Promise<R>): Promise<R> {
    const seconds = this.spec.timeoutSeconds;
    if (seconds <= 0) {
      return pending;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        console.warn(`[PgCommand] Command timed out after ${seconds}s`);
        this.cancel();
        reject(new CommandTimeoutError(seconds));
      }, seconds * 1000);
    });

    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
      // a statement that outlives its timeout may still fail; the timeout is reported
      pending.catch(() => undefined);
    }
  }
}
