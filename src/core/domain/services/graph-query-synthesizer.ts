/**
 * Graph Query Synthesizer
 *
 * Builds SQL text for graph node and edge tables from parameter bags.
 * System columns (node_id, edge_id, from_id, to_id) are written with the
 * dialect sigil, e.g. `$node_id`. Every value is referenced as an `@name`
 * placeholder; resolved identifiers are bound under reserved names
 * (`__from_id`, `__to_id`, `__node_id`, `__id`) rather than spliced in.
 *
 * Table and column names are emitted as given.
 */

import { entriesOf, type ParameterBag } from "./parameter-binder.js";

export const SYSTEM_COLUMNS = ["node_id", "edge_id", "from_id", "to_id"] as const;

export type SystemColumn = (typeof SYSTEM_COLUMNS)[number];

export const FROM_ID_PARAMETER = "__from_id";
export const TO_ID_PARAMETER = "__to_id";
export const NODE_ID_PARAMETER = "__node_id";
export const ID_PARAMETER = "__id";
export const WHERE_PARAMETER_PREFIX = "__w_";

export interface GraphCommand {
  text: string;
  parameters: Map<string, unknown>;
}

export type IdentifierLookup =
  | { found: true; column: SystemColumn; value: unknown }
  | { found: false };

export interface SynthesizerOptions {
  /** Prefix of system columns in the dialect's graph syntax */
  sigil?: string;
}

export interface EdgeEndpoints {
  fromId?: unknown;
  toId?: unknown;
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

export function isSystemColumn(name: string): boolean {
  const lower = name.toLowerCase();
  return SYSTEM_COLUMNS.some((column) => column === lower);
}

export class GraphQuerySynthesizer {
  readonly sigil: string;

  constructor(options: SynthesizerOptions = {}) {
    this.sigil = options.sigil ?? "$";
  }

  formatColumnName(name: string): string {
    return isSystemColumn(name) ? `${this.sigil}${name}` : name;
  }

  // ============================================
  // Fragments
  // ============================================

  /**
   * `col = @col` per non-null property, `col IS NULL` per null one
   */
  buildPredicates(bag: ParameterBag | null | undefined, parameterPrefix = ""): string[] {
    return entriesOf(bag).map(([name, value]) =>
      isPresent(value)
        ? `${this.formatColumnName(name)} = @${parameterPrefix}${name}`
        : `${this.formatColumnName(name)} IS NULL`,
    );
  }

  buildWhereClause(
    bag: ParameterBag | null | undefined,
    prependWhere = true,
    parameterPrefix = "",
  ): string {
    const predicates = this.buildPredicates(bag, parameterPrefix);
    if (predicates.length === 0) {
      return "";
    }
    return (prependWhere ? " WHERE " : "") + predicates.join(" AND ");
  }

  /**
   * SET list of an UPDATE. Null-valued properties are skipped, not assigned.
   */
  buildAssignments(bag: ParameterBag | null | undefined): string {
    return entriesOf(bag)
      .filter(([, value]) => isPresent(value))
      .map(([name]) => `${this.formatColumnName(name)} = @${name}`)
      .join(" , ");
  }

  /**
   * Endpoint predicates followed by the bag's predicates; absent parts are
   * left out. Empty when neither endpoint is given.
   */
  buildEdgeWhereClause(
    endpoints: EdgeEndpoints,
    bag: ParameterBag | null | undefined,
    parameterPrefix = "",
  ): string {
    const hasFrom = isPresent(endpoints.fromId);
    const hasTo = isPresent(endpoints.toId);
    if (!hasFrom && !hasTo) {
      return "";
    }

    const predicates: string[] = [];
    if (hasFrom) {
      predicates.push(`${this.sigil}from_id = @${FROM_ID_PARAMETER}`);
    }
    if (hasTo) {
      predicates.push(`${this.sigil}to_id = @${TO_ID_PARAMETER}`);
    }
    predicates.push(...this.buildPredicates(bag, parameterPrefix));
    return " WHERE " + predicates.join(" AND ");
  }

  buildMatchClause(fromNode: string, edge: string, toNode: string): string {
    return ` FROM ${fromNode}, ${edge}, ${toNode} WHERE MATCH(${fromNode}-(${edge})->${toNode})`;
  }

  columnList(bag: ParameterBag | null | undefined): string {
    return entriesOf(bag)
      .map(([name]) => this.formatColumnName(name))
      .join(",");
  }

  valueList(bag: ParameterBag | null | undefined): string {
    return entriesOf(bag)
      .map(([name]) => `@${name}`)
      .join(",");
  }

  // ============================================
  // Identifier resolution
  // ============================================

  /**
   * First system column present in the bag, scanning node_id, edge_id,
   * from_id, to_id in that order
   */
  findIdentifier(bag: ParameterBag | null | undefined): IdentifierLookup {
    const entries = entriesOf(bag);
    for (const column of SYSTEM_COLUMNS) {
      const entry = entries.find(([name]) => name.toLowerCase() === column);
      if (entry) {
        return { found: true, column, value: entry[1] };
      }
    }
    return { found: false };
  }

  /**
   * Scalar lookup of a node's identifier from its non-system properties
   */
  nodeIdLookup(table: string, bag: ParameterBag | null | undefined): GraphCommand {
    const filtered = entriesOf(bag).filter(([name]) => !isSystemColumn(name));
    return {
      text: `SELECT ${this.sigil}node_id FROM ${table}${this.buildWhereClause(new Map(filtered))}`,
      parameters: new Map(filtered),
    };
  }

  // ============================================
  // Commands
  // ============================================

  exists(table: string, bag: ParameterBag | null | undefined): GraphCommand {
    return {
      text: `SELECT COUNT(*) FROM (SELECT TOP 1 * FROM ${table}${this.buildWhereClause(bag)}) d`,
      parameters: new Map(entriesOf(bag)),
    };
  }

  edgeExists(
    edge: string,
    endpoints: EdgeEndpoints,
    bag: ParameterBag | null | undefined,
  ): GraphCommand {
    const where = this.buildEdgeWhereClause(endpoints, bag);
    return {
      text: `SELECT COUNT(*) FROM (SELECT TOP 1 * FROM ${edge}${where}) d`,
      parameters: withEndpoints(entriesOf(bag), endpoints),
    };
  }

  /**
   * Without a column list the values follow the table's declared order
   */
  insertNode(
    table: string,
    bag: ParameterBag | null | undefined,
    positional = false,
  ): GraphCommand {
    const columns = positional ? "" : `(${this.columnList(bag)})`;
    return {
      text: `INSERT INTO ${table}${columns} VALUES(${this.valueList(bag)})`,
      parameters: new Map(entriesOf(bag)),
    };
  }

  insertEdge(
    edge: string,
    endpoints: Required<EdgeEndpoints>,
    bag: ParameterBag | null | undefined,
  ): GraphCommand {
    const columns = [`${this.sigil}from_id`, `${this.sigil}to_id`];
    const values = [`@${FROM_ID_PARAMETER}`, `@${TO_ID_PARAMETER}`];
    for (const [name] of entriesOf(bag)) {
      columns.push(this.formatColumnName(name));
      values.push(`@${name}`);
    }
    return {
      text: `INSERT INTO ${edge}(${columns.join(", ")}) VALUES(${values.join(", ")})`,
      parameters: withEndpoints(entriesOf(bag), endpoints),
    };
  }

  /**
   * Null when no property carries a value to assign
   */
  updateNode(
    table: string,
    bag: ParameterBag | null | undefined,
    whereBag: ParameterBag | null | undefined,
  ): GraphCommand | null {
    const assignments = this.buildAssignments(bag);
    if (!assignments) {
      return null;
    }
    const where = this.buildWhereClause(whereBag, true, WHERE_PARAMETER_PREFIX);
    return {
      text: `UPDATE ${table} SET ${assignments}${where};`,
      parameters: new Map<string, unknown>([
        ...presentEntries(bag),
        ...prefixed(entriesOf(whereBag)),
      ]),
    };
  }

  updateNodeById(
    table: string,
    bag: ParameterBag | null | undefined,
    nodeId: unknown,
  ): GraphCommand | null {
    const assignments = this.buildAssignments(bag);
    if (!assignments) {
      return null;
    }
    return {
      text: `UPDATE ${table} SET ${assignments} WHERE ${this.sigil}node_id = @${NODE_ID_PARAMETER};`,
      parameters: new Map<string, unknown>([
        ...presentEntries(bag),
        [NODE_ID_PARAMETER, nodeId],
      ]),
    };
  }

  updateEdge(
    edge: string,
    endpoints: Required<EdgeEndpoints>,
    bag: ParameterBag | null | undefined,
    whereBag: ParameterBag | null | undefined,
  ): GraphCommand | null {
    const assignments = this.buildAssignments(bag);
    if (!assignments) {
      return null;
    }
    const where = this.buildEdgeWhereClause(endpoints, whereBag, WHERE_PARAMETER_PREFIX);
    return {
      text: `UPDATE ${edge} SET ${assignments}${where};`,
      parameters: withEndpoints(
        [...presentEntries(bag), ...prefixed(entriesOf(whereBag))],
        endpoints,
      ),
    };
  }

  deleteNode(table: string, bag: ParameterBag | null | undefined): GraphCommand {
    return {
      text: `DELETE FROM ${table}${this.buildWhereClause(bag)}`,
      parameters: new Map(entriesOf(bag)),
    };
  }

  /**
   * Null when neither endpoint is given
   */
  deleteEdge(
    edge: string,
    endpoints: EdgeEndpoints,
    bag: ParameterBag | null | undefined,
  ): GraphCommand | null {
    const where = this.buildEdgeWhereClause(endpoints, bag);
    if (!where) {
      return null;
    }
    return {
      text: `DELETE FROM ${edge}${where}`,
      parameters: withEndpoints(entriesOf(bag), endpoints),
    };
  }

  deleteById(entity: string, id: unknown, isNode = true): GraphCommand {
    const column = isNode ? "node_id" : "edge_id";
    return {
      text: `DELETE FROM ${entity} WHERE ${this.sigil}${column} = @${ID_PARAMETER}`,
      parameters: new Map<string, unknown>([[ID_PARAMETER, id]]),
    };
  }

  selectNodes(table: string, bag: ParameterBag | null | undefined): GraphCommand {
    return {
      text: `SELECT * FROM ${table}${this.buildWhereClause(bag)}`,
      parameters: new Map(entriesOf(bag)),
    };
  }

  /**
   * Target nodes reached from one source node over an edge table.
   * Aliases keep self-referencing edges (Person -knows-> Person) valid.
   */
  selectConnected(
    fromNode: string,
    edge: string,
    toNode: string,
    fromId: unknown,
    edgeBag: ParameterBag | null | undefined,
  ): GraphCommand {
    const predicates = [
      `MATCH(source-(link)->target)`,
      `source.${this.sigil}node_id = @${FROM_ID_PARAMETER}`,
      ...this.buildPredicates(edgeBag).map((predicate) => `link.${predicate}`),
    ];
    return {
      text:
        `SELECT target.* FROM ${fromNode} AS source, ${edge} AS link, ${toNode} AS target` +
        ` WHERE ${predicates.join(" AND ")}`,
      parameters: withEndpoints(entriesOf(edgeBag), { fromId }),
    };
  }
}

function presentEntries(
  bag: ParameterBag | null | undefined,
): Array<[string, unknown]> {
  return entriesOf(bag).filter(([, value]) => isPresent(value));
}

function prefixed(entries: Array<[string, unknown]>): Array<[string, unknown]> {
  return entries
    .filter(([, value]) => isPresent(value))
    .map(([name, value]): [string, unknown] => [
      `${WHERE_PARAMETER_PREFIX}${name}`,
      value,
    ]);
}

function withEndpoints(
  entries: Array<[string, unknown]>,
  endpoints: EdgeEndpoints,
): Map<string, unknown> {
  const parameters = new Map<string, unknown>(entries);
  if (isPresent(endpoints.fromId)) {
    parameters.set(FROM_ID_PARAMETER, endpoints.fromId);
  }
  if (isPresent(endpoints.toId)) {
    parameters.set(TO_ID_PARAMETER, endpoints.toId);
  }
  return parameters;
}
