// src/api/_shared/http.ts
import type { FastifyReply } from 'fastify';

/** Field-level messages in the shape zod's `flatten()` produces. */
export type ErrorDetails = {
  formErrors: string[];
  fieldErrors: Partial<Record<string, string[]>>;
};

export type ApiOk<T> = { ok: true; data: T };

export type ApiErr = {
  ok: false;
  error: string;
  message: string;
  details?: ErrorDetails;
  hint?: string;
};

export function sendOk<T>(reply: FastifyReply, data: T, status = 200) {
  const body: ApiOk<T> = { ok: true, data };
  return reply.code(status).send(body);
}

export function sendErr(reply: FastifyReply, status: number, body: Omit<ApiErr, 'ok'>) {
  const payload: ApiErr = { ok: false, ...body };
  return reply.code(status).send(payload);
}
