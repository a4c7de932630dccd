/**
 * Parameter Binder
 *
 * Turns a parameter bag (a Map, an object exposing its own parameters, or a
 * plain object) into input QueryParameters. The value's run-time type picks
 * the declared kind.
 */

import { QueryParameter } from "../entities/query-parameter.js";
import { isInt32, type SqlKind } from "../value-objects/sql-kind.js";
import { isTypedValue } from "../value-objects/typed-value.js";

/**
 * Implemented by objects that expose their own parameter set
 */
export interface ParameterSource {
  toParameters(): Iterable<readonly [string, unknown]>;
}

export type ParameterBag = ReadonlyMap<string, unknown> | ParameterSource | object;

export function isParameterSource(value: unknown): value is ParameterSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "toParameters" in value &&
    typeof value.toParameters === "function"
  );
}

/**
 * Name/value pairs of a bag, in enumeration order. A class instance whose
 * prototype chain declares getters binds those getters only; one without
 * binds its own enumerable fields.
 */
export function entriesOf(
  bag: ParameterBag | null | undefined,
): Array<[string, unknown]> {
  if (bag === null || bag === undefined) {
    return [];
  }
  if (bag instanceof Map) {
    const entries: Array<[string, unknown]> = [];
    for (const [key, value] of bag) {
      entries.push([String(key), value]);
    }
    return entries;
  }
  if (isParameterSource(bag)) {
    return Array.from(
      bag.toParameters(),
      ([name, value]): [string, unknown] => [name, value],
    );
  }
  const entries: Array<[string, unknown]> = Object.entries(bag);
  if (isPlainObject(bag)) {
    return entries;
  }
  const accessors = accessorEntries(bag);
  return accessors.length > 0 ? accessors : entries;
}

function isPlainObject(bag: object): boolean {
  const proto: object | null = Object.getPrototypeOf(bag);
  return proto === null || proto === Object.prototype;
}

/**
 * Getters declared along a class instance's prototype chain, nearest first
 */
function accessorEntries(bag: object): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];
  const seen = new Set<string>();
  let proto: object | null = Object.getPrototypeOf(bag);
  while (proto !== null && proto !== Object.prototype) {
    for (const [name, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(proto))) {
      if (!descriptor.get || seen.has(name)) continue;
      seen.add(name);
      entries.push([name, Reflect.get(bag, name)]);
    }
    proto = Object.getPrototypeOf(proto);
  }
  return entries;
}

export function isEmptyBag(bag: ParameterBag | null | undefined): boolean {
  return entriesOf(bag).length === 0;
}

/**
 * Find a property by name, ignoring case
 */
export function findEntry(
  bag: ParameterBag | null | undefined,
  name: string,
): [string, unknown] | undefined {
  const wanted = name.toLowerCase();
  return entriesOf(bag).find(([key]) => key.toLowerCase() === wanted);
}

interface InferredValue {
  kind: SqlKind;
  value: unknown;
  nullable: boolean;
  size?: number;
  precision?: number;
  scale?: number;
}

export function inferValue(value: unknown): InferredValue {
  if (isTypedValue(value)) {
    return {
      kind: value.kind,
      value: value.isNull ? null : value.value,
      nullable: true,
      ...value.options,
    };
  }

  switch (typeof value) {
    case "bigint":
      return { kind: "Int64", value, nullable: false };
    case "number":
      return {
        kind: isInt32(value) ? "Int32" : "Float64",
        value,
        nullable: false,
      };
    case "boolean":
      return { kind: "Boolean", value, nullable: false };
    case "string":
      return { kind: "String", value, nullable: false };
    case "undefined":
      return { kind: "String", value: null, nullable: true };
    default:
      break;
  }

  if (value === null) {
    return { kind: "String", value: null, nullable: true };
  }
  if (value instanceof Date) {
    return { kind: "DateTime", value, nullable: false };
  }

  // Anything else is sent as its textual representation
  return { kind: "String", value: String(value), nullable: false };
}

export function toQueryParameter(name: string, value: unknown): QueryParameter {
  const inferred = inferValue(value);
  return new QueryParameter({ name, direction: "Input", ...inferred });
}

export function bindParameters(
  bag: ParameterBag | null | undefined,
): QueryParameter[] {
  return entriesOf(bag).map(([name, value]) => toQueryParameter(name, value));
}
