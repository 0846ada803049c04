import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';

import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { CompensatingTransaction, RequestCancelledError } from '../../src/shared/compensation';
import { withDisconnectSignal } from '../../src/shared/disconnect-signal';

const log = pino({ level: 'silent' });

function replyStub() {
  return { raw: new ServerResponse(new IncomingMessage(new Socket())) };
}

describe('withDisconnectSignal', () => {
  it('aborts when the connection closes before the response is written', async () => {
    const reply = replyStub();

    const aborted = await withDisconnectSignal(reply, async (signal) => {
      reply.raw.emit('close');
      return signal.aborted;
    });

    expect(aborted).toBe(true);
  });

  it('leaves the signal alone when the connection stays open', async () => {
    const reply = replyStub();

    await expect(withDisconnectSignal(reply, async (signal) => signal.aborted)).resolves.toBe(false);
  });

  it('detaches its close listener once the work settles', async () => {
    const reply = replyStub();
    const before = reply.raw.listenerCount('close');

    await expect(
      withDisconnectSignal(reply, async () => {
        expect(reply.raw.listenerCount('close')).toBe(before + 1);
        throw new Error('persist failed');
      }),
    ).rejects.toThrow('persist failed');

    expect(reply.raw.listenerCount('close')).toBe(before);
  });

  it('cancels a compensating transaction at the next phase and undoes earlier phases', async () => {
    const reply = replyStub();
    const undone: string[] = [];
    const ran: string[] = [];

    const attempt = withDisconnectSignal(reply, (signal) => {
      const tx = new CompensatingTransaction(log, signal);
      return tx.execute(async () => {
        await tx.step({
          name: 'promote',
          run: async () => {
            ran.push('promote');
            reply.raw.emit('close');
            return 'certificates/p1_photo.jpg';
          },
          compensate: async (ref) => {
            undone.push(ref);
          },
        });
        return tx.step({
          name: 'persist',
          run: async () => {
            ran.push('persist');
            return 'cert-1';
          },
          compensate: null,
        });
      });
    });

    await expect(attempt).rejects.toBeInstanceOf(RequestCancelledError);
    await expect(attempt).rejects.toMatchObject({
      statusCode: 499,
      details: { code: 'REQUEST_CANCELLED', phase: 'persist' },
    });
    expect(ran).toEqual(['promote']);
    expect(undone).toEqual(['certificates/p1_photo.jpg']);
  });
});
