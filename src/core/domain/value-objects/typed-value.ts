/**
 * Typed Value
 *
 * Carries an explicit SQL kind next to a value. JavaScript values cannot
 * express Byte, Float32, Char or Decimal at run time, and a bare `null`
 * has no type at all, so parameter bags use this wrapper for them.
 */

import type { SqlKind } from "./sql-kind.js";

export interface TypedValueOptions {
  size?: number;
  precision?: number;
  scale?: number;
}

export class TypedValue {
  constructor(
    readonly kind: SqlKind,
    readonly value: unknown,
    readonly options: TypedValueOptions = {},
  ) {}

  get isNull(): boolean {
    return this.value === null || this.value === undefined;
  }

  toString(): string {
    return this.isNull ? "" : String(this.value);
  }
}

export function sqlValue(
  kind: SqlKind,
  value: unknown,
  options?: TypedValueOptions,
): TypedValue {
  return new TypedValue(kind, value, options);
}

export function isTypedValue(value: unknown): value is TypedValue {
  return value instanceof TypedValue;
}
