/**
 * Connection Lease
 *
 * Opens a connection only when it is closed and remembers whether it did.
 * A lease that joins an open already in flight does not own the connection.
 * Releasing closes the connection only if this lease opened it, so a
 * connection handed in already open (e.g. inside a transaction) stays open.
 */

import type { DbConnection } from "../../ports/db-connection.port.js";

export class ConnectionLease {
  private released = false;

  private constructor(
    private readonly connection: DbConnection,
    readonly owned: boolean,
  ) {}

  static async acquire(
    connection: DbConnection,
    signal?: AbortSignal,
  ): Promise<ConnectionLease> {
    if (connection.isOpen) {
      return new ConnectionLease(connection, false);
    }
    const opened = await connection.open(signal);
    return new ConnectionLease(connection, opened);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    if (this.owned) {
      await this.connection.close();
    }
  }
}
