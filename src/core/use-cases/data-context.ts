/**
 * Data Context
 *
 * Convenience entry points over one ExecutionContext: each call prepares a
 * fresh QueryExecutor, binds the parameter bag and maps the result.
 */

import type { RecordType } from "../domain/entities/record-type.js";
import type { ParameterBag } from "../domain/services/parameter-binder.js";
import { QueryExecutor } from "../domain/services/query-executor.js";
import {
  firstOrDefault,
  singleOrDefault,
  streamRows,
  toList,
  toListAsync,
} from "../domain/services/result-mapper.js";
import type { ValueType } from "../domain/value-objects/value-type.js";
import type {
  CommandType,
  ExecutionContext,
} from "../ports/db-connection.port.js";

export class DataContext {
  constructor(readonly executionContext: ExecutionContext) {}

  /**
   * Prepare an executor with the bag bound as input parameters
   */
  query(
    text: string,
    parameters?: ParameterBag | null,
    commandType: CommandType = "text",
  ): QueryExecutor {
    return new QueryExecutor(this.executionContext, text, commandType).addParameters(
      parameters,
    );
  }

  /**
   * Prepare an executor binding the endpoint bags and the edge bag in order
   */
  edgeQuery(
    text: string,
    fromParameters: ParameterBag | null | undefined,
    toParameters: ParameterBag | null | undefined,
    parameters: ParameterBag | null | undefined,
    commandType: CommandType = "text",
  ): QueryExecutor {
    return this.query(text, fromParameters, commandType)
      .addParameters(toParameters)
      .addParameters(parameters);
  }

  async executeList<T>(
    text: string,
    recordType: RecordType<T>,
    parameters?: ParameterBag | null,
    commandType: CommandType = "text",
  ): Promise<T[]> {
    let records: T[] = [];
    await this.query(text, parameters, commandType).execute((cursor) => {
      records = toList(cursor, recordType);
    });
    return records;
  }

  async executeListAsync<T>(
    text: string,
    recordType: RecordType<T>,
    parameters?: ParameterBag | null,
    signal?: AbortSignal,
  ): Promise<T[]> {
    let records: T[] = [];
    await this.query(text, parameters).executeAsync(async (cursor, active) => {
      records = await toListAsync(cursor, recordType, active);
    }, signal);
    return records;
  }

  executeStream<T>(
    text: string,
    recordType: RecordType<T>,
    parameters?: ParameterBag | null,
    signal?: AbortSignal,
  ): AsyncIterable<T> {
    return this.query(text, parameters).executeStream(
      (cursor, active) => streamRows(cursor, recordType, active),
      signal,
    );
  }

  async firstOrDefault<T>(
    text: string,
    recordType: RecordType<T>,
    parameters?: ParameterBag | null,
    commandType: CommandType = "text",
  ): Promise<T | null> {
    let record: T | null = null;
    await this.query(text, parameters, commandType).execute((cursor) => {
      record = firstOrDefault(cursor, recordType);
    });
    return record;
  }

  async singleOrDefault<T>(
    text: string,
    recordType: RecordType<T>,
    parameters?: ParameterBag | null,
    commandType: CommandType = "text",
  ): Promise<T | null> {
    let record: T | null = null;
    await this.query(text, parameters, commandType).execute((cursor) => {
      record = singleOrDefault(cursor, recordType);
    });
    return record;
  }

  executeNonQuery(
    text: string,
    parameters?: ParameterBag | null,
    commandType: CommandType = "text",
    signal?: AbortSignal,
  ): Promise<number> {
    return this.query(text, parameters, commandType).executeNonQuery(signal);
  }

  executeScalar<T>(
    text: string,
    type: ValueType<T>,
    parameters?: ParameterBag | null,
    signal?: AbortSignal,
  ): Promise<T> {
    return this.query(text, parameters).executeScalar(type, signal);
  }
}
