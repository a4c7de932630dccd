/**
 * Graph CRUD Service
 *
 * Node and edge operations over SQL Server graph tables. Each operation
 * builds its text with the GraphQuerySynthesizer, binds its bag through a
 * fresh QueryExecutor and maps reads through the ResultMapper.
 *
 * Operations given a null or empty bag return a zero result (0, false, null
 * or an empty list) without touching the store.
 */

import {
  GraphEntityReference,
  type NodeIdResolver,
} from "../domain/entities/graph-entity-reference.js";
import type { RecordType } from "../domain/entities/record-type.js";
import { ArgumentError, InvalidStateError } from "../domain/errors/index.js";
import {
  GraphQuerySynthesizer,
  type EdgeEndpoints,
  type GraphCommand,
} from "../domain/services/graph-query-synthesizer.js";
import {
  isEmptyBag,
  type ParameterBag,
} from "../domain/services/parameter-binder.js";
import { SqlTypes, type ValueType } from "../domain/value-objects/value-type.js";
import type { DbConnection } from "../ports/db-connection.port.js";
import { DataContext } from "./data-context.js";

type Bag = ParameterBag | null | undefined;

/**
 * Anything the service must release when it is disposed
 */
export interface Releasable {
  release(): void | Promise<void>;
}

export interface CrudServiceOptions {
  /** Connection for one operation; closed afterwards only if it was closed before */
  connect: () => DbConnection;
  timeoutSeconds?: number;
  logQueries?: boolean;
  synthesizer?: GraphQuerySynthesizer;
}

/**
 * Node identifiers are passed through as the store returns them
 */
const identifierType: ValueType<unknown> = {
  kind: "String",
  nullable: true,
  defaultValue: () => null,
  convert: (raw) => raw,
};

function requireName(value: string, argumentName: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ArgumentError(argumentName);
  }
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined;
}

export class CrudService implements NodeIdResolver {
  private readonly resources = new Set<Releasable>();
  private readonly synthesizer: GraphQuerySynthesizer;
  private disposed = false;

  constructor(private readonly options: CrudServiceOptions) {
    this.synthesizer = options.synthesizer ?? new GraphQuerySynthesizer();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Context for one operation
   */
  createContext(): DataContext {
    if (this.disposed) {
      throw new InvalidStateError("CrudService has been disposed");
    }
    return new DataContext({
      connection: this.options.connect(),
      timeoutSeconds: this.options.timeoutSeconds,
      logQueries: this.options.logQueries,
    });
  }

  registerResource(resource: Releasable): void {
    this.resources.add(resource);
  }

  // ============================================
  // Retrieve
  // ============================================

  async anyNode(nodeName: string, parameters: Bag): Promise<boolean> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return false;
    }
    return this.count(this.synthesizer.exists(nodeName, parameters));
  }

  async anyEdge(
    edgeName: string,
    fromNode: string,
    toNode: string,
    fromParameters: Bag,
    toParameters: Bag,
    parameters: Bag,
  ): Promise<boolean> {
    requireName(edgeName, "edgeName");
    if (isMissing(parameters)) {
      return false;
    }
    const { fromId, toId } = await this.resolveEndpoints(
      new GraphEntityReference(fromNode, fromParameters),
      new GraphEntityReference(toNode, toParameters),
    );
    if (isMissing(fromId) && isMissing(toId)) {
      return false;
    }
    return this.count(
      this.synthesizer.edgeExists(edgeName, { fromId, toId }, parameters),
    );
  }

  /**
   * Identifier of a node: a system column already in the bag, or the
   * result of a `SELECT $node_id` lookup on the other properties
   */
  async resolveNodeId(nodeName: string, parameters: Bag): Promise<unknown> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return null;
    }

    const lookup = this.synthesizer.findIdentifier(parameters);
    if (lookup.found) {
      return lookup.value ?? null;
    }

    const command = this.synthesizer.nodeIdLookup(nodeName, parameters);
    return this.createContext().executeScalar(
      command.text,
      identifierType,
      command.parameters,
    );
  }

  async findNodes<T>(
    nodeName: string,
    parameters: Bag,
    recordType: RecordType<T>,
  ): Promise<T[]> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return [];
    }
    const command = this.synthesizer.selectNodes(nodeName, parameters);
    return this.createContext().executeList(
      command.text,
      recordType,
      command.parameters,
    );
  }

  /**
   * Lazily stream matching nodes; stopping early cancels the query
   */
  streamNodes<T>(
    nodeName: string,
    parameters: Bag,
    recordType: RecordType<T>,
    signal?: AbortSignal,
  ): AsyncIterable<T> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return emptySequence<T>();
    }
    const command = this.synthesizer.selectNodes(nodeName, parameters);
    return this.createContext().executeStream(
      command.text,
      recordType,
      command.parameters,
      signal,
    );
  }

  /**
   * Nodes of `toNode` reached from the node described by `fromParameters`
   */
  async findConnected<T>(
    fromNode: string,
    edgeName: string,
    toNode: string,
    fromParameters: Bag,
    recordType: RecordType<T>,
    edgeParameters?: Bag,
  ): Promise<T[]> {
    requireName(edgeName, "edgeName");
    requireName(toNode, "toNode");
    const fromId = await this.resolveNodeId(fromNode, fromParameters);
    if (isMissing(fromId)) {
      return [];
    }
    const command = this.synthesizer.selectConnected(
      fromNode,
      edgeName,
      toNode,
      fromId,
      edgeParameters,
    );
    return this.createContext().executeList(
      command.text,
      recordType,
      command.parameters,
    );
  }

  // ============================================
  // Insert
  // ============================================

  async insertNode(nodeName: string, parameters: Bag): Promise<number> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return 0;
    }
    return this.nonQuery(this.synthesizer.insertNode(nodeName, parameters));
  }

  /**
   * Insert without a column list; values follow the table's column order
   */
  async insertNodePositional(nodeName: string, parameters: Bag): Promise<number> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return 0;
    }
    return this.nonQuery(this.synthesizer.insertNode(nodeName, parameters, true));
  }

  async insertEdge(
    edgeName: string,
    fromNode: string,
    toNode: string,
    fromParameters: Bag,
    toParameters: Bag,
    parameters: Bag,
  ): Promise<number> {
    requireName(edgeName, "edgeName");
    if (isMissing(parameters)) {
      return 0;
    }
    const { fromId, toId } = await this.resolveEndpoints(
      new GraphEntityReference(fromNode, fromParameters),
      new GraphEntityReference(toNode, toParameters),
    );
    if (isMissing(fromId) || isMissing(toId)) {
      return 0;
    }
    return this.nonQuery(
      this.synthesizer.insertEdge(edgeName, { fromId, toId }, parameters),
    );
  }

  // ============================================
  // Update
  // ============================================

  async updateNode(
    nodeName: string,
    parameters: Bag,
    whereParameters: Bag,
  ): Promise<number> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return 0;
    }
    return this.nonQuery(
      this.synthesizer.updateNode(nodeName, parameters, whereParameters),
    );
  }

  async updateNodeById(
    nodeName: string,
    parameters: Bag,
    nodeId: unknown,
  ): Promise<number> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return 0;
    }
    if (isMissing(nodeId)) {
      throw new ArgumentError("nodeId");
    }
    return this.nonQuery(
      this.synthesizer.updateNodeById(nodeName, parameters, nodeId),
    );
  }

  async updateEdge(
    edgeName: string,
    fromNode: string,
    toNode: string,
    fromParameters: Bag,
    toParameters: Bag,
    parameters: Bag,
    whereParameters: Bag,
  ): Promise<number> {
    requireName(edgeName, "edgeName");
    if (isEmptyBag(parameters)) {
      return 0;
    }
    const { fromId, toId } = await this.resolveEndpoints(
      new GraphEntityReference(fromNode, fromParameters),
      new GraphEntityReference(toNode, toParameters),
    );
    if (isMissing(fromId) || isMissing(toId)) {
      return 0;
    }
    return this.nonQuery(
      this.synthesizer.updateEdge(
        edgeName,
        { fromId, toId },
        parameters,
        whereParameters,
      ),
    );
  }

  // ============================================
  // Delete
  // ============================================

  async deleteNode(nodeName: string, parameters: Bag): Promise<number> {
    requireName(nodeName, "nodeName");
    if (isEmptyBag(parameters)) {
      return 0;
    }
    return this.nonQuery(this.synthesizer.deleteNode(nodeName, parameters));
  }

  async deleteById(entity: string, id: unknown, isNode = true): Promise<number> {
    requireName(entity, "entity");
    if (isMissing(id)) {
      throw new ArgumentError("id");
    }
    return this.nonQuery(this.synthesizer.deleteById(entity, id, isNode));
  }

  async deleteEdge(
    edgeName: string,
    fromNode: string,
    toNode: string,
    fromParameters: Bag,
    toParameters: Bag,
    parameters: Bag,
  ): Promise<number> {
    requireName(edgeName, "edgeName");
    if (isMissing(parameters)) {
      return 0;
    }
    const { fromId, toId } = await this.resolveEndpoints(
      new GraphEntityReference(fromNode, fromParameters),
      new GraphEntityReference(toNode, toParameters),
    );
    if (isMissing(fromId) || isMissing(toId)) {
      return 0;
    }
    return this.deleteEdgeByIds(edgeName, parameters, fromId, toId);
  }

  async deleteEdgeByIds(
    edgeName: string,
    parameters: Bag,
    fromId: unknown,
    toId: unknown,
  ): Promise<number> {
    requireName(edgeName, "edgeName");
    return this.nonQuery(
      this.synthesizer.deleteEdge(edgeName, { fromId, toId }, parameters),
    );
  }

  /**
   * Identifiers of both endpoints of an edge, resolved one after the other
   */
  async resolveEndpoints(
    from: GraphEntityReference,
    to: GraphEntityReference,
  ): Promise<EdgeEndpoints> {
    const fromId = await from.resolve(this);
    const toId = await to.resolve(this);
    return { fromId, toId };
  }

  // ============================================
  // Resources
  // ============================================

  /**
   * Release every registered resource. Failures are logged and rethrown
   * together once all resources have been given the chance to release.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const resources = [...this.resources];
    this.resources.clear();

    const results = await Promise.allSettled(
      resources.map(async (resource) => resource.release()),
    );
    const failures: unknown[] = [];
    for (const result of results) {
      if (result.status === "rejected") {
        console.error("[CrudService] Failed to release resource:", result.reason);
        failures.push(result.reason);
      }
    }

    if (failures.length > 0) {
      throw new AggregateError(
        failures,
        `${failures.length} resource(s) failed to release`,
      );
    }
  }

  private async count(command: GraphCommand): Promise<boolean> {
    const count = await this.createContext().executeScalar(
      command.text,
      SqlTypes.int32,
      command.parameters,
    );
    return count > 0;
  }

  private async nonQuery(command: GraphCommand | null): Promise<number> {
    if (!command) {
      return 0;
    }
    return this.createContext().executeNonQuery(command.text, command.parameters);
  }
}

async function* emptySequence<T>(): AsyncGenerator<T, void, undefined> {
  // yields nothing
}
