/**
 * In-process DbConnection for tests. Every command is answered by a
 * responder function; everything the executor does is recorded in order.
 */

import { BufferedRowCursor, type Row } from '../../src/adapters/persistence/buffered-row-cursor.js';
import { InvalidStateError } from '../../src/core/domain/errors/index.js';
import type {
  AsyncRowCursor,
  CommandSpec,
  DbCommand,
  DbConnection,
  DbTransaction,
  RowCursor,
} from '../../src/core/ports/db-connection.port.js';

export interface FakeResult {
  columns?: string[];
  rows?: Row[];
  rowsAffected?: number;
  /** Written back into output, input/output and return-value parameters */
  outputs?: Record<string, unknown>;
  error?: Error;
}

export type Responder = (spec: CommandSpec) => FakeResult;

export class FakeConnection implements DbConnection {
  isOpen = false;
  readonly events: string[] = [];
  readonly commands: CommandSpec[] = [];

  constructor(private readonly responder: Responder = () => ({})) {}

  get texts(): string[] {
    return this.commands.map((command) => command.text);
  }

  async open(signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    if (this.isOpen) return false;
    this.isOpen = true;
    this.events.push('open');
    return true;
  }

  async close(): Promise<void> {
    this.isOpen = false;
    this.events.push('close');
  }

  async beginTransaction(): Promise<DbTransaction> {
    this.events.push('begin');
    return {
      commit: async () => {
        this.events.push('commit');
      },
      rollback: async () => {
        this.events.push('rollback');
      },
    };
  }

  createCommand(spec: CommandSpec): DbCommand {
    if (!this.isOpen) {
      throw new InvalidStateError('Connection is not open');
    }
    this.commands.push(spec);
    return new FakeCommand(this.events, spec, this.responder(spec));
  }
}

class FakeCommand implements DbCommand {
  private cancelled = false;

  constructor(
    private readonly events: string[],
    private readonly spec: CommandSpec,
    private readonly result: FakeResult,
  ) {}

  async executeReader(): Promise<RowCursor> {
    this.complete();
    return new BufferedRowCursor(this.result.columns ?? [], this.result.rows ?? []);
  }

  async openReader(signal?: AbortSignal): Promise<AsyncRowCursor> {
    signal?.throwIfAborted();
    this.events.push('execute');
    if (this.result.error) throw this.result.error;
    return new FakeStreamCursor(this.events, this.result, () => this.cancelled, () =>
      this.populate(),
    );
  }

  async executeNonQuery(): Promise<number> {
    this.complete();
    return this.result.rowsAffected ?? 0;
  }

  async executeScalar(): Promise<unknown> {
    this.complete();
    const first = this.result.columns?.[0];
    const row = this.result.rows?.[0];
    if (first === undefined || row === undefined) return null;
    return row[first] ?? null;
  }

  cancel(): void {
    this.cancelled = true;
    this.events.push('cancel');
  }

  dispose(): void {
    this.events.push('dispose');
  }

  private complete(): void {
    this.events.push('execute');
    if (this.result.error) throw this.result.error;
    this.populate();
  }

  private populate(): void {
    for (const parameter of this.spec.parameters) {
      if (parameter.direction === 'Input') continue;
      parameter.populate(this.result.outputs?.[parameter.name]);
    }
  }
}

class FakeStreamCursor implements AsyncRowCursor {
  private position = -1;

  constructor(
    private readonly events: string[],
    private readonly result: FakeResult,
    private readonly isCancelled: () => boolean,
    private readonly onComplete: () => void,
  ) {}

  get fieldCount(): number {
    return this.result.columns?.length ?? 0;
  }

  getName(ordinal: number): string {
    return this.result.columns?.[ordinal] ?? '';
  }

  getValue(ordinal: number): unknown {
    return this.result.rows?.[this.position]?.[this.getName(ordinal)] ?? null;
  }

  isNull(ordinal: number): boolean {
    return this.getValue(ordinal) === null;
  }

  async read(signal?: AbortSignal): Promise<boolean> {
    await Promise.resolve();
    signal?.throwIfAborted();
    if (this.isCancelled()) return false;
    this.position++;
    return this.position < (this.result.rows?.length ?? 0);
  }

  async close(): Promise<void> {
    this.events.push(this.isCancelled() ? 'cursor.close:cancelled' : 'cursor.close:drained');
    if (!this.isCancelled()) {
      this.onComplete();
    }
  }
}
