/**
 * Value Type and Output Parameter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  OutputParameter,
  QueryParameter,
} from '../../src/core/domain/entities/query-parameter.js';
import {
  ArgumentError,
  InvalidStateError,
  NullValueError,
  TypeConversionError,
} from '../../src/core/domain/errors/index.js';
import {
  fromSqlValue,
  nullable,
  SqlTypes,
  type ValueType,
} from '../../src/core/domain/value-objects/value-type.js';

describe('SqlTypes', () => {
  it('should use natural zero values for non-nullable types', () => {
    expect(fromSqlValue(SqlTypes.int32, null)).toBe(0);
    expect(fromSqlValue(SqlTypes.int64, null)).toBe(0n);
    expect(fromSqlValue(SqlTypes.string, undefined)).toBe('');
    expect(fromSqlValue(SqlTypes.boolean, null)).toBe(false);
    expect(fromSqlValue(SqlTypes.dateTime, null).getTime()).toBe(0);
  });

  it('should use null for nullable types', () => {
    expect(fromSqlValue(nullable(SqlTypes.int32), null)).toBeNull();
    expect(nullable(SqlTypes.int32).nullable).toBe(true);
  });

  it('should convert driver representations', () => {
    expect(SqlTypes.int64.convert('9007199254740993')).toBe(9007199254740993n);
    expect(SqlTypes.int32.convert('15')).toBe(15);
    expect(SqlTypes.boolean.convert(1)).toBe(true);
    expect(SqlTypes.string.convert(Buffer.from('graph', 'utf-8'))).toBe('graph');
    expect(SqlTypes.decimal.convert(' 12.50 ')).toBe('12.50');
    expect(SqlTypes.dateTime.convert('2024-01-02T03:04:05.000Z').toISOString()).toBe(
      '2024-01-02T03:04:05.000Z',
    );
  });

  it('should reject values outside the kind', () => {
    expect(() => SqlTypes.int32.convert(2147483648)).toThrow(TypeConversionError);
    expect(() => SqlTypes.byte.convert(256)).toThrow(TypeConversionError);
    expect(() => SqlTypes.char.convert('ab')).toThrow(TypeConversionError);
    expect(() => SqlTypes.int32.convert('abc')).toThrow('Cannot convert "abc" to Int32');
  });
});

describe('QueryParameter', () => {
  it('should require a name', () => {
    expect(() => new QueryParameter({ name: '', value: 1, kind: 'Int32' })).toThrow(
      ArgumentError,
    );
  });

  it('should default to an input parameter without facets', () => {
    const parameter = new QueryParameter({ name: 'age', value: 30, kind: 'Int32' });

    expect(parameter.direction).toBe('Input');
    expect(parameter.size).toBe(0);
    expect(parameter.isPopulated).toBe(false);
  });
});

describe('OutputParameter', () => {
  const outputOf = <T>(type: ValueType<T>) => {
    const parameter = new QueryParameter({
      name: 'total',
      value: null,
      kind: type.kind,
      direction: 'Output',
    });
    return { parameter, output: new OutputParameter(parameter, type) };
  };

  it('should fail when read before execution', () => {
    const { output } = outputOf(SqlTypes.int32);

    expect(() => output.value).toThrow(InvalidStateError);
    expect(output.isAvailable).toBe(false);
  });

  it('should convert the populated value', () => {
    const { parameter, output } = outputOf(SqlTypes.int32);
    parameter.populate('12');

    expect(output.value).toBe(12);
    expect(output.toString()).toBe('12');
  });

  it('should yield null for a nullable type over SQL null', () => {
    const { parameter, output } = outputOf(nullable(SqlTypes.int32));
    parameter.populate(null);

    expect(output.value).toBeNull();
    expect(output.toString()).toBe('');
  });

  it('should fail for a non-nullable type over SQL null', () => {
    const { parameter, output } = outputOf(SqlTypes.int32);
    parameter.populate(undefined);

    expect(() => output.value).toThrow(NullValueError);
    expect(() => output.value).toThrow(
      "total is null and can't be assigned to a non-nullable type",
    );
  });
});
