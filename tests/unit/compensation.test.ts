import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { CompensatingTransaction, RequestCancelledError } from '../../src/shared/compensation';

const log = pino({ level: 'silent' });

describe('CompensatingTransaction', () => {
  it('registers undos only for phases that declare one', async () => {
    const tx = new CompensatingTransaction(log);

    const result = await tx.execute(async () => {
      const a = await tx.step({ name: 'a', run: async () => 1, compensate: async () => undefined });
      const b = await tx.step({ name: 'b', run: async () => 2, compensate: null });
      return a + b;
    });

    expect(result).toBe(3);
    expect(tx.pending).toBe(1);
  });

  it('undoes completed phases in reverse order and rethrows the original failure', async () => {
    const tx = new CompensatingTransaction(log);
    const undone: string[] = [];
    const failure = new Error('persist failed');

    await expect(
      tx.execute(async () => {
        await tx.step({
          name: 'first',
          run: async () => 'x',
          compensate: async (value) => {
            undone.push(`first:${value}`);
          },
        });
        await tx.step({
          name: 'second',
          run: async () => 'y',
          compensate: async (value) => {
            undone.push(`second:${value}`);
          },
        });
        await tx.step({
          name: 'third',
          run: async () => {
            throw failure;
          },
          compensate: async () => {
            undone.push('third');
          },
        });
      }),
    ).rejects.toBe(failure);

    expect(undone).toEqual(['second:y', 'first:x']);
    expect(tx.pending).toBe(0);
  });

  it('keeps undoing when one compensation fails', async () => {
    const tx = new CompensatingTransaction(log);
    const undone: string[] = [];

    await expect(
      tx.execute(async () => {
        await tx.step({
          name: 'first',
          run: async () => 1,
          compensate: async () => {
            undone.push('first');
          },
        });
        await tx.step({
          name: 'second',
          run: async () => 2,
          compensate: async () => {
            throw new Error('undo failed');
          },
        });
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(undone).toEqual(['first']);
  });

  it('stops before the next phase once the signal is aborted', async () => {
    const controller = new AbortController();
    const tx = new CompensatingTransaction(log, controller.signal);
    const undone: string[] = [];
    let secondRan = false;

    const outcome = tx.execute(async () => {
      await tx.step({
        name: 'first',
        run: async () => 1,
        compensate: async () => {
          undone.push('first');
        },
      });
      controller.abort();
      await tx.step({
        name: 'second',
        run: async () => {
          secondRan = true;
          return 2;
        },
        compensate: null,
      });
    });

    await expect(outcome).rejects.toBeInstanceOf(RequestCancelledError);
    await expect(outcome).rejects.toMatchObject({ statusCode: 499, details: { phase: 'second' } });
    expect(secondRan).toBe(false);
    expect(undone).toEqual(['first']);
  });
});
