/**
 * Record Type
 *
 * Describes a record the mapper can materialize: a parameterless factory and
 * the fields it exposes for binding. Records declare their own field set, so
 * mapping never inspects objects at run time.
 */

import { fromSqlValue, type ValueType } from "../value-objects/value-type.js";

export interface RecordField<T> {
  readonly name: string;
  readonly type: ValueType<unknown>;
  /** Assign a raw column value; SQL null assigns the type's zero value */
  assign(target: T, raw: unknown): void;
}

export interface ColumnBinding<T> {
  readonly ordinal: number;
  readonly field: RecordField<T>;
}

export interface FieldBindingSet<T> {
  readonly key: number;
  readonly columns: readonly string[];
  readonly bindings: readonly ColumnBinding<T>[];
}

export interface RecordType<T> {
  readonly name: string;
  create(): T;
  readonly fields: readonly RecordField<T>[];
  /**
   * Binding sets computed for this type, by column key. Append-only;
   * entries sharing a key are told apart by their column sequence.
   */
  readonly bindingSets: Map<number, FieldBindingSet<T>[]>;
}

export type FieldFactory<T> = <K extends keyof T & string>(
  name: K,
  type: ValueType<T[K]>,
) => RecordField<T>;

/**
 * Define a record type.
 *
 * @example
 * ```typescript
 * class Person {
 *   nodeId: string | null = null;
 *   name = "";
 *   age = 0;
 * }
 *
 * const PersonRecord = defineRecord("Person", () => new Person(), (field) => [
 *   field("nodeId", nullable(SqlTypes.string)),
 *   field("name", SqlTypes.string),
 *   field("age", SqlTypes.int32),
 * ]);
 * ```
 */
export function defineRecord<T>(
  name: string,
  create: () => T,
  fields: (field: FieldFactory<T>) => readonly RecordField<T>[],
): RecordType<T> {
  function field<K extends keyof T & string>(
    fieldName: K,
    type: ValueType<T[K]>,
  ): RecordField<T> {
    return {
      name: fieldName,
      type,
      assign: (target, raw) => {
        target[fieldName] = fromSqlValue(type, raw);
      },
    };
  }

  return Object.freeze({
    name,
    create,
    fields: Object.freeze([...fields(field)]),
    bindingSets: new Map<number, FieldBindingSet<T>[]>(),
  });
}
