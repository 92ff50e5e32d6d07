// src/api/_shared/errors.ts
import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { PipelineError } from '../../pipeline/errors';
import { sendErr } from './http';

/** Maps domain errors to their status, bad bodies to 400, the rest to 500. */
export function installErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, req, reply) => {
    if (error instanceof PipelineError) {
      req.log.info({ code: error.code, status: error.status }, 'request rejected');
      return sendErr(reply, error.status, { error: error.code, message: error.message });
    }
    if (error instanceof ZodError) {
      return sendErr(reply, 400, { error: 'bad_request', message: 'Invalid request body', details: error.flatten() });
    }
    // fastify's own 4xx (malformed JSON, rate limit)
    if (error.statusCode && error.statusCode < 500) {
      return sendErr(reply, error.statusCode, { error: error.code || 'bad_request', message: error.message });
    }
    req.log.error({ err: error }, 'unhandled error');
    return sendErr(reply, 500, { error: 'internal_error', message: 'Something went wrong.' });
  });
}
