/**
 * Result Mapper
 *
 * Binds the rows of a forward-only cursor to records of a RecordType.
 * Column-to-field bindings are computed once per (record type, column
 * sequence) and cached on the record type for the lifetime of the process.
 */

import type {
  ColumnBinding,
  FieldBindingSet,
  RecordField,
  RecordType,
} from "../entities/record-type.js";
import { InvalidStateError } from "../errors/index.js";
import type {
  AsyncRowCursor,
  RowCursor,
  RowSource,
} from "../../ports/db-connection.port.js";

/**
 * 32-bit polynomial hash of a string (h = h * 31 + code, wrapping)
 */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Order-sensitive key of a column sequence: seed 17, then
 * key = key * 31 + hash(column) for each column, wrapping at 32 bits.
 */
export function computeColumnKey(columns: Iterable<string>): number {
  let key = 17;
  for (const column of columns) {
    key = (Math.imul(key, 31) + hashString(column)) | 0;
  }
  return key;
}

/**
 * Strip separators and case so `node_id` matches a `nodeId` field
 */
export function normalizeName(name: string): string {
  return name.replace(/[_-]/g, "").toLowerCase();
}

export function columnsOf(source: RowSource): string[] {
  const columns: string[] = [];
  for (let i = 0; i < source.fieldCount; i++) {
    columns.push(source.getName(i));
  }
  return columns;
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, i) => column === b[i]);
}

function buildBindingSet<T>(
  recordType: RecordType<T>,
  key: number,
  columns: readonly string[],
): FieldBindingSet<T> {
  const fieldsByName = new Map(
    recordType.fields.map((field): [string, RecordField<T>] => [
      normalizeName(field.name),
      field,
    ]),
  );

  const bindings: ColumnBinding<T>[] = [];
  columns.forEach((column, ordinal) => {
    const field = fieldsByName.get(normalizeName(column));
    // Columns without a matching field are not bound
    if (field) {
      bindings.push(Object.freeze({ ordinal, field }));
    }
  });

  return Object.freeze({
    key,
    columns: Object.freeze([...columns]),
    bindings: Object.freeze(bindings),
  });
}

/**
 * Cached bindings for a column sequence, computing them on first use.
 * A key hit is only reused when the stored column sequence is identical;
 * a colliding sequence gets its own entry under the same key.
 */
export function getBindingSet<T>(
  recordType: RecordType<T>,
  columns: readonly string[],
): FieldBindingSet<T> {
  const key = computeColumnKey(columns);
  const bucket = recordType.bindingSets.get(key) ?? [];

  const cached = bucket.find((set) => sameColumns(set.columns, columns));
  if (cached) {
    return cached;
  }

  const created = buildBindingSet(recordType, key, columns);
  bucket.push(created);
  recordType.bindingSets.set(key, bucket);
  return created;
}

export class ResultMapper<T> {
  readonly bindingSet: FieldBindingSet<T>;

  constructor(
    private readonly recordType: RecordType<T>,
    private readonly source: RowSource,
  ) {
    this.bindingSet = getBindingSet(recordType, columnsOf(source));
  }

  /**
   * Materialize the cursor's current row
   */
  mapCurrentRow(): T {
    const record = this.recordType.create();
    for (const { ordinal, field } of this.bindingSet.bindings) {
      const raw = this.source.isNull(ordinal)
        ? null
        : this.source.getValue(ordinal);
      field.assign(record, raw);
    }
    return record;
  }
}

export function mapRows<T>(
  cursor: RowCursor,
  recordType: RecordType<T>,
  action: (record: T) => void,
): void {
  const mapper = new ResultMapper(recordType, cursor);
  while (cursor.read()) {
    action(mapper.mapCurrentRow());
  }
}

export async function mapRowsAsync<T>(
  cursor: AsyncRowCursor,
  recordType: RecordType<T>,
  action: (record: T) => void | Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  const mapper = new ResultMapper(recordType, cursor);
  while (await cursor.read(signal)) {
    await action(mapper.mapCurrentRow());
  }
}

/**
 * Lazy sequence over the cursor. Consumes it once; not restartable.
 */
export async function* streamRows<T>(
  cursor: AsyncRowCursor,
  recordType: RecordType<T>,
  signal?: AbortSignal,
): AsyncGenerator<T, void, undefined> {
  const mapper = new ResultMapper(recordType, cursor);
  while (await cursor.read(signal)) {
    yield mapper.mapCurrentRow();
  }
}

export function toList<T>(cursor: RowCursor, recordType: RecordType<T>): T[] {
  const records: T[] = [];
  mapRows(cursor, recordType, (record) => records.push(record));
  return records;
}

export async function toListAsync<T>(
  cursor: AsyncRowCursor,
  recordType: RecordType<T>,
  signal?: AbortSignal,
): Promise<T[]> {
  const records: T[] = [];
  await mapRowsAsync(cursor, recordType, (record) => {
    records.push(record);
  }, signal);
  return records;
}

export function firstOrDefault<T>(
  cursor: RowCursor,
  recordType: RecordType<T>,
): T | null {
  const mapper = new ResultMapper(recordType, cursor);
  return cursor.read() ? mapper.mapCurrentRow() : null;
}

export function singleOrDefault<T>(
  cursor: RowCursor,
  recordType: RecordType<T>,
): T | null {
  const mapper = new ResultMapper(recordType, cursor);
  if (!cursor.read()) {
    return null;
  }
  const record = mapper.mapCurrentRow();
  if (cursor.read()) {
    throw new InvalidStateError(
      `Expected at most one ${recordType.name} but the result has more rows`,
    );
  }
  return record;
}
