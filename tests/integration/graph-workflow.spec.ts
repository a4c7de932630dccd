/**
 * Graph Workflow Integration Tests
 *
 * Drives CrudService end to end against an in-process store that answers
 * the generated graph commands, over one connection kept open for the
 * whole session.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { defineRecord } from '../../src/core/domain/entities/record-type.js';
import { SqlTypes } from '../../src/core/domain/value-objects/value-type.js';
import type { CommandSpec } from '../../src/core/ports/db-connection.port.js';
import { CrudService } from '../../src/core/use-cases/crud.service.js';
import { FakeConnection, type FakeResult } from '../support/fake-connection.js';

type Properties = Record<string, unknown>;

interface StoredNode {
  id: string;
  properties: Properties;
}

interface StoredEdge {
  table: string;
  fromId: unknown;
  toId: unknown;
  properties: Properties;
}

/**
 * Just enough of a graph store to answer the commands CrudService emits
 */
class InMemoryGraph {
  private readonly nodes = new Map<string, StoredNode[]>();
  private edges: StoredEdge[] = [];
  private nextId = 1;

  readonly respond = (spec: CommandSpec): FakeResult => {
    const values: Properties = Object.fromEntries(
      spec.parameters.map((p): [string, unknown] => [p.name, p.value]),
    );
    const { __from_id: fromId, __to_id: toId, ...properties } = values;
    const table = /(?:INTO|FROM) (\w+)/.exec(spec.text)?.[1] ?? '';

    if (spec.text.startsWith('INSERT') && '__from_id' in values) {
      this.edges.push({ table, fromId, toId, properties });
      return { rowsAffected: 1 };
    }
    if (spec.text.startsWith('INSERT')) {
      const node = { id: `${table}-${this.nextId++}`, properties };
      this.nodes.set(table, [...this.nodesOf(table), node]);
      return { rowsAffected: 1 };
    }
    if (spec.text.startsWith('SELECT $node_id')) {
      const rows = this.matchNodes(table, properties).map((node) => ({ $node_id: node.id }));
      return { columns: ['$node_id'], rows };
    }
    if (spec.text.startsWith('SELECT COUNT(*)')) {
      const isEdge = '__from_id' in values || '__to_id' in values;
      const matched = isEdge
        ? this.matchEdges(table, values).length
        : this.matchNodes(table, properties).length;
      return { columns: ['count'], rows: [{ count: Math.min(matched, 1) }] };
    }
    if (spec.text.startsWith('SELECT target.*')) {
      const [, , edgeTable = '', targetTable = ''] =
        /FROM (\w+) AS source, (\w+) AS link, (\w+) AS target/.exec(spec.text) ?? [];
      const targets = new Set(this.matchEdges(edgeTable, { __from_id: fromId }).map((e) => e.toId));
      const rows = this.nodesOf(targetTable)
        .filter((node) => targets.has(node.id))
        .map((node) => node.properties);
      return { columns: ['name'], rows };
    }
    if (spec.text.startsWith('SELECT *')) {
      return { columns: ['name'], rows: this.matchNodes(table, properties).map((node) => node.properties) };
    }
    if (spec.text.startsWith('DELETE') && spec.text.includes('$from_id')) {
      const removed = this.matchEdges(table, values);
      this.edges = this.edges.filter((edge) => !removed.includes(edge));
      return { rowsAffected: removed.length };
    }
    if (spec.text.startsWith('DELETE')) {
      const removed = this.matchNodes(table, properties);
      this.nodes.set(table, this.nodesOf(table).filter((node) => !removed.includes(node)));
      return { rowsAffected: removed.length };
    }
    throw new Error(`Unexpected command: ${spec.text}`);
  };

  private nodesOf(table: string): StoredNode[] {
    return this.nodes.get(table) ?? [];
  }

  private matchNodes(table: string, properties: Properties): StoredNode[] {
    return this.nodesOf(table).filter((node) =>
      Object.entries(properties).every(([key, value]) => node.properties[key] === value),
    );
  }

  private matchEdges(table: string, values: Properties): StoredEdge[] {
    return this.edges.filter(
      (edge) =>
        edge.table === table &&
        (!('__from_id' in values) || edge.fromId === values.__from_id) &&
        (!('__to_id' in values) || edge.toId === values.__to_id),
    );
  }
}

const NameRecord = defineRecord('Name', () => ({ name: '' }), (field) => [
  field('name', SqlTypes.string),
]);

describe('Graph workflow', () => {
  let connection: FakeConnection;
  let service: CrudService;

  beforeEach(async () => {
    connection = new FakeConnection(new InMemoryGraph().respond);
    await connection.open();
    service = new CrudService({ connect: () => connection, timeoutSeconds: 30 });

    await service.insertNode('Person', { name: 'Alice' });
    await service.insertNode('Person', { name: 'Bob' });
    await service.insertNode('City', { name: 'Rome' });
  });

  it('should link nodes and traverse the edges', async () => {
    expect(
      await service.insertEdge('Knows', 'Person', 'Person', { name: 'Alice' }, { name: 'Bob' }, {}),
    ).toBe(1);
    expect(
      await service.insertEdge('LivesIn', 'Person', 'City', { name: 'Alice' }, { name: 'Rome' }, {}),
    ).toBe(1);

    const friends = await service.findConnected('Person', 'Knows', 'Person', { name: 'Alice' }, NameRecord);
    const cities = await service.findConnected('Person', 'LivesIn', 'City', { name: 'Alice' }, NameRecord);

    expect(friends).toEqual([{ name: 'Bob' }]);
    expect(cities).toEqual([{ name: 'Rome' }]);
    expect(
      await service.anyEdge('Knows', 'Person', 'Person', { name: 'Alice' }, { name: 'Bob' }, {}),
    ).toBe(true);
    expect(
      await service.anyEdge('Knows', 'Person', 'Person', { name: 'Bob' }, { name: 'Alice' }, {}),
    ).toBe(false);
  });

  it('should remove edges and nodes', async () => {
    await service.insertEdge('Knows', 'Person', 'Person', { name: 'Alice' }, { name: 'Bob' }, {});

    expect(
      await service.deleteEdge('Knows', 'Person', 'Person', { name: 'Alice' }, { name: 'Bob' }, {}),
    ).toBe(1);
    expect(
      await service.findConnected('Person', 'Knows', 'Person', { name: 'Alice' }, NameRecord),
    ).toEqual([]);

    expect(await service.deleteNode('Person', { name: 'Bob' })).toBe(1);
    expect(await service.resolveNodeId('Person', { name: 'Bob' })).toBeNull();
    expect(await service.anyNode('Person', { name: 'Alice' })).toBe(true);
  });

  it('should keep a shared open connection open across operations', async () => {
    const people: string[] = [];
    for await (const person of service.streamNodes('Person', { name: 'Alice' }, NameRecord)) {
      people.push(person.name);
    }

    expect(people).toEqual(['Alice']);
    expect(connection.isOpen).toBe(true);
    expect(connection.events.filter((event) => event === 'open' || event === 'close')).toEqual([
      'open',
    ]);
    expect(connection.commands.every((spec) => spec.timeoutSeconds === 30)).toBe(true);
  });
});
