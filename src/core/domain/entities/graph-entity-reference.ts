/**
 * GraphEntityReference Entity
 *
 * Points at one node by table name and a parameter bag describing it. The
 * node identifier is looked up on first use and remembered afterwards.
 */

import { InvalidStateError } from "../errors/index.js";
import type { ParameterBag } from "../services/parameter-binder.js";

export interface NodeIdResolver {
  resolveNodeId(table: string, parameters: ParameterBag | null | undefined): Promise<unknown>;
}

export class GraphEntityReference {
  private resolved = false;
  private resolvedId: unknown = null;
  private pending: Promise<unknown> | null = null;

  constructor(
    readonly table: string,
    readonly parameters: ParameterBag | null | undefined,
  ) {}

  get isResolved(): boolean {
    return this.resolved;
  }

  /**
   * Identifier found by resolve(); null when no node matched
   */
  get identifier(): unknown {
    if (!this.resolved) {
      throw new InvalidStateError(`Reference to ${this.table} has not been resolved`);
    }
    return this.resolvedId;
  }

  async resolve(resolver: NodeIdResolver): Promise<unknown> {
    if (this.resolved) {
      return this.resolvedId;
    }
    if (!this.pending) {
      this.pending = resolver.resolveNodeId(this.table, this.parameters);
    }
    try {
      this.resolvedId = (await this.pending) ?? null;
      this.resolved = true;
      return this.resolvedId;
    } finally {
      this.pending = null;
    }
  }
}
