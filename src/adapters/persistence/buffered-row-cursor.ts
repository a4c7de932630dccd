/**
 * Buffered Row Cursors
 *
 * Forward-only cursors over rows already fetched into memory. Rows are
 * objects keyed by column name, the shape both `mssql` and `pg` return.
 */

import type {
  AsyncRowCursor,
  RowCursor,
} from "../../core/ports/db-connection.port.js";

export type Row = Record<string, unknown>;

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class BufferedRowCursor implements RowCursor {
  private position = -1;

  constructor(
    private readonly columns: readonly string[],
    private readonly rows: readonly Row[],
  ) {}

  get fieldCount(): number {
    return this.columns.length;
  }

  getName(ordinal: number): string {
    const name = this.columns[ordinal];
    if (name === undefined) {
      throw new RangeError(`Column ordinal ${ordinal} is out of range`);
    }
    return name;
  }

  getValue(ordinal: number): unknown {
    const row = this.rows[this.position];
    if (!row) {
      throw new RangeError("No current row; call read() first");
    }
    return row[this.getName(ordinal)] ?? null;
  }

  isNull(ordinal: number): boolean {
    return this.getValue(ordinal) === null;
  }

  read(): boolean {
    if (this.position >= this.rows.length - 1) {
      this.position = this.rows.length;
      return false;
    }
    this.position++;
    return true;
  }

  /**
   * Stop delivering rows
   */
  exhaust(): void {
    this.position = this.rows.length;
  }
}

/**
 * Async view of a buffered result, for drivers that cannot stream
 */
export class BufferedAsyncRowCursor implements AsyncRowCursor {
  constructor(private readonly inner: BufferedRowCursor) {}

  get fieldCount(): number {
    return this.inner.fieldCount;
  }

  getName(ordinal: number): string {
    return this.inner.getName(ordinal);
  }

  getValue(ordinal: number): unknown {
    return this.inner.getValue(ordinal);
  }

  isNull(ordinal: number): boolean {
    return this.inner.isNull(ordinal);
  }

  async read(signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    return this.inner.read();
  }

  async close(): Promise<void> {
    this.inner.exhaust();
  }
}
