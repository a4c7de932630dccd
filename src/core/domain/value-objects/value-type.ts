/**
 * Value Type Descriptors
 *
 * A ValueType<T> tells the executor and the mapper how a raw driver value
 * becomes a T, which SQL kind it is declared as, and what its zero value is.
 * Nullable types use `null` as zero value; non-nullable types use the
 * kind's natural zero (0, 0n, "", false, epoch).
 */

import { TypeConversionError } from "../errors/index.js";
import { isInt32, type SqlKind } from "./sql-kind.js";

export interface ValueType<T> {
  readonly kind: SqlKind;
  readonly nullable: boolean;
  /** Value used when the store returns SQL null */
  defaultValue(): T;
  /** Convert a non-null raw driver value */
  convert(raw: unknown): T;
}

function define<T>(
  kind: SqlKind,
  defaultValue: () => T,
  convert: (raw: unknown) => T,
): ValueType<T> {
  return { kind, nullable: false, defaultValue, convert };
}

function toFiniteNumber(raw: unknown, kind: SqlKind): number {
  if (typeof raw === "number" && Number.isFinite(raw)) return raw;
  if (typeof raw === "bigint") return Number(raw);
  if (typeof raw === "boolean") return raw ? 1 : 0;
  if (typeof raw === "string" && raw.trim() !== "") {
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new TypeConversionError(raw, kind);
}

function toInteger(raw: unknown, kind: SqlKind, min: number, max: number): number {
  const value = toFiniteNumber(raw, kind);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new TypeConversionError(raw, kind);
  }
  return value;
}

const DECIMAL_PATTERN = /^[-+]?\d+(\.\d+)?$/;

export const SqlTypes = {
  int64: define<bigint>(
    "Int64",
    () => 0n,
    (raw) => {
      if (typeof raw === "bigint") return raw;
      if (typeof raw === "number" && Number.isInteger(raw)) return BigInt(raw);
      if (typeof raw === "string" && /^[-+]?\d+$/.test(raw.trim())) {
        return BigInt(raw.trim());
      }
      throw new TypeConversionError(raw, "Int64");
    },
  ),

  int32: define<number>(
    "Int32",
    () => 0,
    (raw) => {
      const value = toFiniteNumber(raw, "Int32");
      if (!isInt32(value)) throw new TypeConversionError(raw, "Int32");
      return value;
    },
  ),

  byte: define<number>("Byte", () => 0, (raw) => toInteger(raw, "Byte", 0, 255)),

  string: define<string>(
    "String",
    () => "",
    (raw) => {
      if (typeof raw === "string") return raw;
      if (
        typeof raw === "number" ||
        typeof raw === "bigint" ||
        typeof raw === "boolean"
      ) {
        return String(raw);
      }
      if (raw instanceof Date) return raw.toISOString();
      if (Buffer.isBuffer(raw)) return raw.toString("utf-8");
      throw new TypeConversionError(raw, "String");
    },
  ),

  float32: define<number>("Float32", () => 0, (raw) =>
    Math.fround(toFiniteNumber(raw, "Float32")),
  ),

  float64: define<number>("Float64", () => 0, (raw) =>
    toFiniteNumber(raw, "Float64"),
  ),

  boolean: define<boolean>(
    "Boolean",
    () => false,
    (raw) => {
      if (typeof raw === "boolean") return raw;
      if (raw === 0 || raw === 1) return raw === 1;
      if (typeof raw === "string") {
        const normalized = raw.trim().toLowerCase();
        if (normalized === "true" || normalized === "1") return true;
        if (normalized === "false" || normalized === "0") return false;
      }
      throw new TypeConversionError(raw, "Boolean");
    },
  ),

  char: define<string>(
    "Char",
    () => "\u0000",
    (raw) => {
      if (typeof raw === "string" && raw.length === 1) return raw;
      throw new TypeConversionError(raw, "Char");
    },
  ),

  dateTime: define<Date>(
    "DateTime",
    () => new Date(0),
    (raw) => {
      if (raw instanceof Date && !Number.isNaN(raw.getTime())) return raw;
      if (typeof raw === "string" || typeof raw === "number") {
        const date = new Date(raw);
        if (!Number.isNaN(date.getTime())) return date;
      }
      throw new TypeConversionError(raw, "DateTime");
    },
  ),

  /** Decimals travel as strings so no precision is lost */
  decimal: define<string>(
    "Decimal",
    () => "0",
    (raw) => {
      if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
      if (typeof raw === "bigint") return raw.toString();
      if (typeof raw === "string" && DECIMAL_PATTERN.test(raw.trim())) {
        return raw.trim();
      }
      throw new TypeConversionError(raw, "Decimal");
    },
  ),
};

/**
 * Wrap a type so SQL null maps to `null` instead of the zero value
 */
export function nullable<T>(type: ValueType<T>): ValueType<T | null> {
  return {
    kind: type.kind,
    nullable: true,
    defaultValue: () => null,
    convert: (raw) => type.convert(raw),
  };
}

/**
 * Resolve a raw value that may be SQL null (null or undefined)
 */
export function fromSqlValue<T>(type: ValueType<T>, raw: unknown): T {
  return raw === null || raw === undefined
    ? type.defaultValue()
    : type.convert(raw);
}
