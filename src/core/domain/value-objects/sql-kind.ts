/**
 * SQL Kind Value Object
 *
 * Closed set of scalar kinds a parameter or column can be declared as.
 */

export type SqlKind =
  | "Int64"
  | "Int32"
  | "Byte"
  | "String"
  | "Float32"
  | "Float64"
  | "Boolean"
  | "Char"
  | "DateTime"
  | "Decimal";

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}
