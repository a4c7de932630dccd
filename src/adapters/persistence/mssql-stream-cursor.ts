/**
 * SQL Server Stream Cursor
 *
 * Pull-based cursor over an `mssql` request running in stream mode. Rows
 * arrive as events and are queued; the request is paused when the queue is
 * full and resumed as the consumer catches up. Only the first result set is
 * exposed; rows of later result sets are discarded.
 */

import type { Request } from "mssql";
import type { AsyncRowCursor } from "../../core/ports/db-connection.port.js";
import { isRow, type Row } from "./buffered-row-cursor.js";

export interface StreamCursorOptions {
  /** Queue length at which the request is paused */
  highWaterMark?: number;
}

interface ColumnMetadataEntry {
  index: number;
  name: string;
}

function isColumnMetadataEntry(value: unknown): value is ColumnMetadataEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "index" in value &&
    typeof value.index === "number" &&
    "name" in value &&
    typeof value.name === "string"
  );
}

/**
 * Column names of an `mssql` column metadata object, by ordinal
 */
export function columnNamesOf(metadata: unknown): string[] {
  if (typeof metadata !== "object" || metadata === null) {
    return [];
  }
  return Object.values(metadata)
    .filter(isColumnMetadataEntry)
    .sort((a, b) => a.index - b.index)
    .map((column) => column.name);
}

export class MssqlStreamCursor implements AsyncRowCursor {
  private columns: string[] | null = null;
  private resultSetCount = 0;
  private readonly queue: Row[] = [];
  private current: Row | undefined;
  private paused = false;
  private done = false;
  private cancelled = false;
  private failure: unknown;
  private failureReported = false;
  private waiter: (() => void) | undefined;
  private readonly highWaterMark: number;

  constructor(
    private readonly request: Request,
    options: StreamCursorOptions = {},
  ) {
    this.highWaterMark = options.highWaterMark ?? 500;

    request.on("recordset", (metadata: unknown) => {
      this.resultSetCount++;
      if (this.columns === null) {
        this.columns = columnNamesOf(metadata);
      }
      this.notify();
    });

    request.on("row", (row: unknown) => {
      if (this.resultSetCount !== 1 || !isRow(row)) return;
      this.queue.push(row);
      if (this.queue.length >= this.highWaterMark && !this.paused) {
        this.paused = request.pause();
      }
      this.notify();
    });

    request.on("error", (error: unknown) => {
      if (this.failure === undefined) {
        this.failure = error;
      }
      this.notify();
    });
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get fieldCount(): number {
    return this.columns?.length ?? 0;
  }

  /**
   * Called by the command once the request has completed
   */
  complete(): void {
    this.done = true;
    this.notify();
  }

  /**
   * Surface a failure raised outside the request, such as a timeout
   */
  fail(error: unknown): void {
    if (this.failure === undefined) {
      this.failure = error;
    }
    this.notify();
  }

  /**
   * Called by the command after it asked the server to cancel
   */
  markCancelled(): void {
    this.cancelled = true;
    this.queue.length = 0;
    this.resumeIfPaused();
    this.notify();
  }

  /**
   * Wait until the column metadata of the first result set is known, or
   * the request finished without producing one
   */
  async ready(signal?: AbortSignal): Promise<void> {
    while (this.columns === null && !this.done && this.failure === undefined) {
      await this.waitForChange(signal);
    }
    this.throwIfFailed();
    if (this.columns === null) {
      this.columns = [];
    }
  }

  getName(ordinal: number): string {
    const name = this.columns?.[ordinal];
    if (name === undefined) {
      throw new RangeError(`Column ordinal ${ordinal} is out of range`);
    }
    return name;
  }

  getValue(ordinal: number): unknown {
    if (!this.current) {
      throw new RangeError("No current row; call read() first");
    }
    return this.current[this.getName(ordinal)] ?? null;
  }

  isNull(ordinal: number): boolean {
    return this.getValue(ordinal) === null;
  }

  async read(signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      signal?.throwIfAborted();

      const next = this.queue.shift();
      if (next) {
        this.current = next;
        if (this.queue.length < this.highWaterMark / 2) {
          this.resumeIfPaused();
        }
        return true;
      }

      this.throwIfFailed();
      if (this.done || this.cancelled) {
        this.current = undefined;
        return false;
      }

      this.resumeIfPaused();
      await this.waitForChange(signal);
    }
  }

  /**
   * Drain the request. Returns once the server has finished, which is
   * immediate after a cancellation and otherwise waits for the remaining
   * rows.
   */
  async close(): Promise<void> {
    this.current = undefined;
    while (!this.done) {
      this.queue.length = 0;
      this.resumeIfPaused();
      await this.waitForChange();
    }
    this.queue.length = 0;
    if (!this.cancelled) {
      this.throwIfFailed();
    }
  }

  private throwIfFailed(): void {
    if (this.failure !== undefined && !this.cancelled && !this.failureReported) {
      this.failureReported = true;
      throw this.failure;
    }
  }

  private resumeIfPaused(): void {
    if (this.paused) {
      this.paused = false;
      this.request.resume();
    }
  }

  private waitForChange(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = undefined;
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiter = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
    });
  }

  private notify(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}
