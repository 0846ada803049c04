import type { FastifyReply } from 'fastify';

/** Aborts when the client goes away before the response was written. */
export async function withDisconnectSignal<T>(
  reply: Pick<FastifyReply, 'raw'>,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const onClose = () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  };

  reply.raw.on('close', onClose);
  try {
    return await work(controller.signal);
  } finally {
    reply.raw.off('close', onClose);
  }
}
