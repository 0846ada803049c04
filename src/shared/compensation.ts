import type { Logger } from 'pino';

import { AppError } from './errors';

export class RequestCancelledError extends AppError {
  constructor(phase: string) {
    super('Request cancelled', 499, { code: 'REQUEST_CANCELLED', phase });
  }
}

/**
 * One unit of work inside a compensating transaction. `compensate` is
 * mandatory so that every phase states its undo, even when there is none.
 */
export interface Phase<T> {
  name: string;
  run: () => Promise<T>;
  compensate: ((result: T) => Promise<void>) | null;
}

type RegisteredUndo = {
  name: string;
  undo: () => Promise<void>;
};

/**
 * Ordered phases with best-effort rollback. Completed phases register their
 * compensation; on failure they are undone in reverse order and undo errors
 * are logged, never rethrown, so the caller sees the original failure.
 */
export class CompensatingTransaction {
  private readonly undos: RegisteredUndo[] = [];

  constructor(
    private readonly log: Logger,
    private readonly signal?: AbortSignal,
  ) {}

  get pending(): number {
    return this.undos.length;
  }

  async step<T>(phase: Phase<T>): Promise<T> {
    this.throwIfCancelled(phase.name);

    const result = await phase.run();
    const { compensate } = phase;

    if (compensate) {
      this.undos.push({ name: phase.name, undo: () => compensate(result) });
    }

    return result;
  }

  throwIfCancelled(phase: string): void {
    if (this.signal?.aborted) {
      throw new RequestCancelledError(phase);
    }
  }

  async rollback(): Promise<void> {
    while (this.undos.length > 0) {
      const entry = this.undos.pop();
      if (!entry) {
        break;
      }

      try {
        await entry.undo();
      } catch (error) {
        this.log.error({ err: error, phase: entry.name }, 'compensation step failed');
      }
    }
  }

  async execute<T>(work: (tx: CompensatingTransaction) => Promise<T>): Promise<T> {
    try {
      return await work(this);
    } catch (error) {
      if (this.undos.length > 0) {
        this.log.warn({ err: error, steps: this.undos.length }, 'rolling back completed phases');
      }
      await this.rollback();
      throw error;
    }
  }
}
