import { context as otelContext, trace } from '@opentelemetry/api';
import { randomUUID } from 'node:crypto';

import fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import jwt from '@fastify/jwt';
import multipart from '@fastify/multipart';

import { getEnv } from './config/env';
import { AppError } from './shared/errors';
import { registerModules } from './modules/register-modules';
import { setLogContext } from './observability/log-context';
import { sanitizeInput } from './shared/security/sanitizer';

export async function createApp(): Promise<FastifyInstance> {
  const env = getEnv();
  const app = fastify({
    logger: { level: env.LOG_LEVEL ?? 'info' },
    genReqId(request) {
      const header = request.headers['x-request-id'];
      return typeof header === 'string' && header.length > 0 ? header : randomUUID();
    },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'correlation_id',
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId = request.id ?? randomUUID();
    reply.header('x-request-id', correlationId);

    setLogContext({ correlation_id: correlationId });

    const span = trace.getSpan(otelContext.active());
    if (span) {
      const spanContext = span.spanContext();
      setLogContext({ trace_id: spanContext.traceId, span_id: spanContext.spanId });
      span.setAttribute('http.request_id', correlationId);
    }

    request.log = request.log.child({ correlation_id: correlationId });
    done();
  });

  await app.register(cors, { origin: true });
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        frameAncestors: ["'none'"],
        objectSrc: ["'none'"],
        baseUri: ["'self'"],
      },
    },
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: { policy: 'same-origin' },
    referrerPolicy: { policy: 'no-referrer' },
  });
  await app.register(rateLimit, {
    max: Number(env.RATE_LIMIT_MAX),
    timeWindow: Number(env.RATE_LIMIT_TIME_WINDOW_MS),
    allowList: ['127.0.0.1'],
  });
  await app.register(multipart, {
    limits: {
      fileSize: Number(env.UPLOAD_MAX_SIZE_BYTES),
      files: 3,
    },
  });
  await app.register(jwt, {
    secret: env.JWT_SECRET,
  });

  app.addHook('preValidation', (request, _reply, done) => {
    request.body = sanitizeInput(request.body);
    request.query = sanitizeInput(request.query);
    request.params = sanitizeInput(request.params);
    done();
  });

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('Strict-Transport-Security', 'max-age=63072000; includeSubDomains');
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    return payload;
  });

  app.setErrorHandler((error: FastifyError | AppError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error, details: error.details }, 'application error');
      } else {
        request.log.warn({ err: error, details: error.details }, 'application error');
      }
      return reply.status(error.statusCode).send({
        message: error.message,
        details: error.details,
      });
    }

    if (error.statusCode && error.statusCode < 500) {
      request.log.warn({ err: error }, 'request rejected');
      return reply.status(error.statusCode).send({ message: error.message });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ message: 'Internal server error' });
  });

  await registerModules(app);

  return app;
}
