/**
 * Query Executor
 *
 * Executes exactly one command (free text or a stored procedure) against the
 * connection of an ExecutionContext. Parameters are added fluently; output,
 * input/output and return-value parameters hand back an OutputParameter whose
 * value becomes readable once the command has completed.
 *
 * Every execution opens the connection if it is closed and closes it again
 * only if it was the one that opened it. Streaming executions that stop early
 * (callback failure, abort, consumer break) cancel the command on the server
 * before releasing the cursor.
 */

import {
  OutputParameter,
  QueryParameter,
} from "../entities/query-parameter.js";
import {
  ArgumentError,
  InvalidStateError,
} from "../errors/index.js";
import type { SqlKind } from "../value-objects/sql-kind.js";
import { fromSqlValue, type ValueType } from "../value-objects/value-type.js";
import type {
  AsyncRowCursor,
  CommandSpec,
  CommandType,
  DbCommand,
  ExecutionContext,
  RowCursor,
} from "../../ports/db-connection.port.js";
import { ConnectionLease } from "./connection-lease.js";
import {
  bindParameters,
  inferValue,
  type ParameterBag,
} from "./parameter-binder.js";

export const RETURN_VALUE_PARAMETER = "_retParam";

export interface ParameterOptions {
  /** Overrides the kind inferred from the value */
  kind?: SqlKind;
  size?: number;
  precision?: number;
  scale?: number;
}

type ExecutorState = "pending" | "executing" | "completed";

function requireName(name: string, argumentName = "name"): void {
  if (typeof name !== "string" || name.trim() === "") {
    throw new ArgumentError(argumentName);
  }
}

export class QueryExecutor {
  private readonly parameters: QueryParameter[] = [];
  private timeoutSeconds: number;
  private state: ExecutorState = "pending";

  constructor(
    private readonly context: ExecutionContext,
    private readonly commandText: string,
    private readonly commandType: CommandType = "text",
  ) {
    requireName(commandText, "commandText");
    this.timeoutSeconds = context.timeoutSeconds ?? 0;
  }

  get isExecuted(): boolean {
    return this.state !== "pending";
  }

  addParameter(name: string, value: unknown, options: ParameterOptions = {}): this {
    requireName(name);
    const inferred = inferValue(value);
    this.parameters.push(
      new QueryParameter({
        ...inferred,
        name,
        direction: "Input",
        kind: options.kind ?? inferred.kind,
        size: options.size ?? inferred.size,
        precision: options.precision ?? inferred.precision,
        scale: options.scale ?? inferred.scale,
      }),
    );
    return this;
  }

  /**
   * Bind every entry of a parameter bag as an input parameter
   */
  addParameters(bag: ParameterBag | null | undefined): this {
    this.parameters.push(...bindParameters(bag));
    return this;
  }

  addRawParameter(parameter: QueryParameter): this {
    if (!(parameter instanceof QueryParameter)) {
      throw new ArgumentError("parameter");
    }
    this.parameters.push(parameter);
    return this;
  }

  addOutputParameter<T>(
    name: string,
    type: ValueType<T>,
    options: Omit<ParameterOptions, "kind"> = {},
  ): OutputParameter<T> {
    requireName(name);
    return this.bindOutput(name, null, type, "Output", options);
  }

  addInputOutputParameter<T>(
    name: string,
    value: T,
    type: ValueType<T>,
    options: Omit<ParameterOptions, "kind"> = {},
  ): OutputParameter<T> {
    requireName(name);
    return this.bindOutput(name, value, type, "InputOutput", options);
  }

  addReturnValue<T>(type: ValueType<T>): OutputParameter<T> {
    return this.bindOutput(RETURN_VALUE_PARAMETER, null, type, "ReturnValue", {});
  }

  setTimeout(seconds: number): this {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new ArgumentError(
        "seconds",
        `Timeout must be a non-negative integer, got ${seconds}`,
      );
    }
    this.timeoutSeconds = seconds;
    return this;
  }

  /**
   * Execute and hand a buffered cursor to the callback
   */
  async execute(callback: (cursor: RowCursor) => void): Promise<void> {
    await this.run(undefined, async (command) => {
      const cursor = await command.executeReader();
      callback(cursor);
    });
  }

  /**
   * Execute and hand a streaming cursor to the callback. If the callback
   * fails or the signal aborts, the command is cancelled before the cursor
   * is closed and the originating failure is rethrown.
   */
  async executeAsync(
    callback: (cursor: AsyncRowCursor, signal?: AbortSignal) => Promise<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.run(signal, async (command) => {
      const cursor = await this.withCancellation(command, signal, () =>
        command.openReader(signal),
      );

      try {
        await callback(cursor, signal);
      } catch (error) {
        this.cancelInFlight(command, error);
        throw error;
      } finally {
        await cursor.close();
      }
    });
  }

  /**
   * Lazy sequence of items produced from the streaming cursor. Finite and
   * not restartable; stopping early cancels the command.
   */
  executeStream<T>(
    rowsFrom: (cursor: AsyncRowCursor, signal?: AbortSignal) => AsyncIterable<T>,
    signal?: AbortSignal,
  ): AsyncIterable<T> {
    this.beginExecution();
    return this.stream(rowsFrom, signal);
  }

  async executeNonQuery(signal?: AbortSignal): Promise<number> {
    return this.run(signal, (command) =>
      this.withCancellation(command, signal, () => command.executeNonQuery()),
    );
  }

  /**
   * First column of the first row. SQL null, or no row, yields the
   * type's zero value.
   */
  async executeScalar<T>(type: ValueType<T>, signal?: AbortSignal): Promise<T> {
    const raw = await this.run(signal, (command) =>
      this.withCancellation(command, signal, () => command.executeScalar()),
    );
    return fromSqlValue(type, raw);
  }

  private bindOutput<T>(
    name: string,
    value: unknown,
    type: ValueType<T>,
    direction: "Output" | "InputOutput" | "ReturnValue",
    options: Omit<ParameterOptions, "kind">,
  ): OutputParameter<T> {
    const parameter = new QueryParameter({
      name,
      value,
      kind: type.kind,
      direction,
      nullable: type.nullable,
      ...options,
    });
    this.parameters.push(parameter);
    return new OutputParameter(parameter, type);
  }

  private beginExecution(): void {
    if (this.state !== "pending") {
      throw new InvalidStateError(
        "QueryExecutor has already been executed; create a new one per command",
      );
    }
    this.state = "executing";
  }

  private commandSpec(): CommandSpec {
    if (this.context.logQueries) {
      console.debug(`[QueryExecutor] ${this.commandType}: ${this.commandText}`);
    }
    return {
      text: this.commandText,
      type: this.commandType,
      parameters: this.parameters,
      transaction: this.context.transaction,
      timeoutSeconds: this.timeoutSeconds,
    };
  }

  private async run<R>(
    signal: AbortSignal | undefined,
    work: (command: DbCommand) => Promise<R>,
  ): Promise<R> {
    this.beginExecution();
    signal?.throwIfAborted();

    const lease = await ConnectionLease.acquire(this.context.connection, signal);
    let command: DbCommand | undefined;
    let failed = false;
    try {
      command = this.context.connection.createCommand(this.commandSpec());
      return await work(command);
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      command?.dispose();
      this.state = "completed";
      await this.release(lease, failed);
    }
  }

  private async *stream<T>(
    rowsFrom: (cursor: AsyncRowCursor, signal?: AbortSignal) => AsyncIterable<T>,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<T, void, undefined> {
    signal?.throwIfAborted();

    const lease = await ConnectionLease.acquire(this.context.connection, signal);
    let command: DbCommand | undefined;
    let cursor: AsyncRowCursor | undefined;
    let completed = false;
    let failed = false;
    try {
      const active = this.context.connection.createCommand(this.commandSpec());
      command = active;
      cursor = await this.withCancellation(active, signal, () =>
        active.openReader(signal),
      );

      for await (const item of rowsFrom(cursor, signal)) {
        yield item;
      }
      completed = true;
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      if (!completed && cursor && command) {
        this.cancelInFlight(command, signal?.reason ?? "iteration stopped");
      }
      try {
        await cursor?.close();
      } finally {
        command?.dispose();
        this.state = "completed";
        await this.release(lease, failed);
      }
    }
  }

  /**
   * Release the lease. While a failure is already propagating, a close
   * error is logged and the original failure wins.
   */
  private async release(lease: ConnectionLease, failed: boolean): Promise<void> {
    try {
      await lease.release();
    } catch (error) {
      if (!failed) throw error;
      console.error("[QueryExecutor] Failed to close connection:", error);
    }
  }

  /**
   * Run a driver call, cancelling the command if the signal aborts
   * meanwhile. An abort surfaces as the signal's own reason.
   */
  private async withCancellation<R>(
    command: DbCommand,
    signal: AbortSignal | undefined,
    call: () => Promise<R>,
  ): Promise<R> {
    if (!signal) {
      return call();
    }

    signal.throwIfAborted();
    const onAbort = () => this.cancelInFlight(command, signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      return await call();
    } catch (error) {
      signal.throwIfAborted();
      throw error;
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private cancelInFlight(command: DbCommand, reason: unknown): void {
    const message = reason instanceof Error ? reason.message : String(reason);
    console.warn(`[QueryExecutor] Cancelling in-flight command: ${message}`);
    command.cancel();
  }
}
