import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import {
  HttpError,
  InvalidArgumentError,
  ParseError,
  RateLimitError,
  UnsupportedOperationError,
} from '../../../../src/index.js';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Malformed query parameters → 400 with the failing fields
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'ValidationError',
        details: error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
      });
    }

    // Filters the Doc API would reject → 400
    if (error instanceof InvalidArgumentError || error instanceof UnsupportedOperationError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    // Upstream throttling → 429 (retryable)
    if (error instanceof RateLimitError) {
      return reply.status(429).send({
        error: 'RateLimitError',
        retryable: true,
        hint: 'Retry later',
      });
    }

    // Any other upstream failure → 502, with the status the Doc API gave
    if (error instanceof HttpError) {
      app.log.warn(error);
      return reply.status(502).send({
        error: error.name,
        upstreamStatus: error.status,
        message: error.message,
      });
    }

    if (error instanceof ParseError) {
      app.log.warn(error);
      return reply.status(502).send({ error: 'ParseError', message: error.message });
    }

    // Fastify built-in errors have a numeric `statusCode`; pass it through
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
