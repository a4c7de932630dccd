/**
 * DataContext Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { defineRecord } from '../../src/core/domain/entities/record-type.js';
import { InvalidStateError } from '../../src/core/domain/errors/index.js';
import { nullable, SqlTypes } from '../../src/core/domain/value-objects/value-type.js';
import { DataContext } from '../../src/core/use-cases/data-context.js';
import { FakeConnection } from '../support/fake-connection.js';

class Person {
  name = '';
  age: number | null = null;
}

const PersonRecord = defineRecord('Person', () => new Person(), (field) => [
  field('name', SqlTypes.string),
  field('age', nullable(SqlTypes.int32)),
]);

const people = () => ({
  columns: ['name', 'age'],
  rows: [
    { name: 'Alice', age: 30 },
    { name: 'Bob', age: null },
  ],
});

describe('DataContext', () => {
  it('should bind the bags of an edge query in order', async () => {
    const connection = new FakeConnection();
    const context = new DataContext({ connection });

    await context
      .edgeQuery('usp_link', { fromName: 'Alice' }, { toName: 'Rome' }, { since: 2020 }, 'storedProcedure')
      .executeNonQuery();

    expect(connection.commands[0]?.parameters.map((p) => p.name)).toEqual([
      'fromName',
      'toName',
      'since',
    ]);
    expect(connection.commands[0]?.type).toBe('storedProcedure');
  });

  it('should map lists through the buffered and streaming paths', async () => {
    const context = new DataContext({ connection: new FakeConnection(people) });

    const buffered = await context.executeList('SELECT name, age FROM Person', PersonRecord);
    const streamed = await context.executeListAsync('SELECT name, age FROM Person', PersonRecord);

    const expected = [
      { name: 'Alice', age: 30 },
      { name: 'Bob', age: null },
    ];
    expect(buffered).toEqual(expected);
    expect(streamed).toEqual(expected);
  });

  it('should return the first record or null', async () => {
    const context = new DataContext({ connection: new FakeConnection(people) });
    const empty = new DataContext({ connection: new FakeConnection(() => ({ columns: ['name'] })) });

    expect(await context.firstOrDefault('SELECT * FROM Person', PersonRecord)).toEqual({
      name: 'Alice',
      age: 30,
    });
    expect(await empty.firstOrDefault('SELECT * FROM Person', PersonRecord)).toBeNull();
  });

  it('should fail a single-record read over several rows', async () => {
    const context = new DataContext({ connection: new FakeConnection(people) });

    await expect(context.singleOrDefault('SELECT * FROM Person', PersonRecord)).rejects.toThrow(
      InvalidStateError,
    );
  });

  it('should run scalars and non-queries with bound parameters', async () => {
    const connection = new FakeConnection((spec) =>
      spec.text.startsWith('SELECT')
        ? { columns: ['total'], rows: [{ total: 2 }] }
        : { rowsAffected: 4 },
    );
    const context = new DataContext({ connection });

    const total = await context.executeScalar(
      'SELECT COUNT(*) AS total FROM Person WHERE age > @age',
      SqlTypes.int32,
      { age: 18 },
    );
    const affected = await context.executeNonQuery('DELETE FROM Person WHERE age > @age', { age: 99 });

    expect(total).toBe(2);
    expect(affected).toBe(4);
    expect(connection.commands.map((c) => c.parameters[0]?.value)).toEqual([18, 99]);
  });
});
