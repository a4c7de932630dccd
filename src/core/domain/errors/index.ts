/**
 * Data Access Errors
 *
 * Driver errors are never wrapped in these: they reach the caller as thrown.
 */

export class DataAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataAccessError";
  }
}

/**
 * A required argument was missing or empty. Raised before any I/O.
 */
export class ArgumentError extends DataAccessError {
  constructor(
    readonly argumentName: string,
    message = `${argumentName} is required`,
  ) {
    super(message);
    this.name = "ArgumentError";
  }
}

export class InvalidStateError extends DataAccessError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class NullValueError extends InvalidStateError {
  constructor(name: string) {
    super(`${name} is null and can't be assigned to a non-nullable type`);
    this.name = "NullValueError";
  }
}

export class TypeConversionError extends DataAccessError {
  constructor(
    readonly value: unknown,
    readonly targetKind: string,
  ) {
    super(`Cannot convert ${describeValue(value)} to ${targetKind}`);
    this.name = "TypeConversionError";
  }
}

export class CommandTimeoutError extends DataAccessError {
  constructor(timeoutSeconds: number) {
    super(`Command did not complete within ${timeoutSeconds}s`);
    this.name = "CommandTimeoutError";
  }
}

export class UnsupportedOperationError extends DataAccessError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedOperationError";
  }
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return `"${value}"`;
  if (value instanceof Date) return `Date(${value.toISOString()})`;
  return `${typeof value} ${String(value)}`;
}
