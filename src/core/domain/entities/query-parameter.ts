/**
 * QueryParameter Entity
 *
 * A named, typed, directional parameter of one command. Created when bound,
 * read by the driver at execution, and written back by the driver for
 * output, input/output and return-value directions.
 */

import { ArgumentError, InvalidStateError, NullValueError } from "../errors/index.js";
import type { ParameterDirection } from "../value-objects/parameter-direction.js";
import type { SqlKind } from "../value-objects/sql-kind.js";
import type { ValueType } from "../value-objects/value-type.js";

export interface QueryParameterProps {
  name: string;
  value: unknown;
  kind: SqlKind;
  direction?: ParameterDirection;
  nullable?: boolean;
  size?: number;
  precision?: number;
  scale?: number;
}

export class QueryParameter {
  readonly name: string;
  readonly kind: SqlKind;
  readonly direction: ParameterDirection;
  readonly nullable: boolean;
  readonly size: number;
  readonly precision: number;
  readonly scale: number;

  private currentValue: unknown;
  private populated = false;

  constructor(props: QueryParameterProps) {
    if (!props.name) {
      throw new ArgumentError("name", "Parameter name is required");
    }
    this.name = props.name;
    this.kind = props.kind;
    this.direction = props.direction ?? "Input";
    this.nullable = props.nullable ?? false;
    this.size = props.size ?? 0;
    this.precision = props.precision ?? 0;
    this.scale = props.scale ?? 0;
    this.currentValue = props.value ?? null;
  }

  get value(): unknown {
    return this.currentValue;
  }

  /**
   * Whether the driver has written an output value back
   */
  get isPopulated(): boolean {
    return this.populated;
  }

  /**
   * Called by drivers once the command has completed
   */
  populate(value: unknown): void {
    this.currentValue = value ?? null;
    this.populated = true;
  }
}

/**
 * Read-only typed view of an output, input/output or return-value parameter
 */
export class OutputParameter<T> {
  constructor(
    private readonly parameter: QueryParameter,
    private readonly type: ValueType<T>,
  ) {}

  get name(): string {
    return this.parameter.name;
  }

  get isAvailable(): boolean {
    return this.parameter.isPopulated;
  }

  get value(): T {
    if (!this.parameter.isPopulated) {
      throw new InvalidStateError(
        `${this.parameter.name} is not available until the command has executed`,
      );
    }

    const raw = this.parameter.value;
    if (raw === null || raw === undefined) {
      if (this.type.nullable) {
        return this.type.defaultValue();
      }
      throw new NullValueError(this.parameter.name);
    }

    return this.type.convert(raw);
  }

  toString(): string {
    const raw = this.parameter.value;
    return raw === null || raw === undefined ? "" : String(raw);
  }
}
