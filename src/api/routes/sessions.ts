// src/api/routes/sessions.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';
import { SessionNotFoundError } from '../../pipeline/errors';
import type { RunRecord } from '../../records/types';
import type { SessionRegistry } from '../../session/registry';
import { sendOk } from '../_shared/http';

export interface RecordLister {
  listBySession(sessionId: string): Promise<RunRecord[]>;
}

export type SessionRoutesOptions = {
  registry: SessionRegistry;
  records: RecordLister;
};

const Params = z.object({ id: z.string().min(1) });

const GenerateBody = z.object({
  comment: z.string().optional(),
  draft_reply: z.string().optional(),
});

const FeedbackBody = z.object({
  rating: z.number().nullable().optional(),
  text: z.string().nullable().optional(),
});

const NavigateBody = z.object({ direction: z.enum(['prev', 'next']) });

export default fp<SessionRoutesOptions>(async function registerSessionRoutes(app: FastifyInstance, opts) {
  const { registry, records } = opts;

  // ================== CREATE ==================
  app.post('/api/v1/sessions', async (_req, reply) => {
    const session = registry.create();
    return sendOk(reply, session.snapshot(), 201);
  });

  app.get('/api/v1/sessions/:id', async (req, reply) => {
    const { id } = Params.parse(req.params);
    return sendOk(reply, registry.get(id).snapshot());
  });

  app.delete('/api/v1/sessions/:id', async (req, reply) => {
    const { id } = Params.parse(req.params);
    if (!registry.delete(id)) throw new SessionNotFoundError(id);
    return sendOk(reply, { deleted: id });
  });

  // ================== PIPELINE COMMANDS ==================
  app.post('/api/v1/sessions/:id/generate', async (req, reply) => {
    const { id } = Params.parse(req.params);
    const body = GenerateBody.parse(req.body ?? {});
    const session = registry.get(id);
    await session.generate(body);
    return sendOk(reply, session.snapshot());
  });

  app.post('/api/v1/sessions/:id/regenerate', async (req, reply) => {
    const { id } = Params.parse(req.params);
    const body = FeedbackBody.parse(req.body ?? {});
    const session = registry.get(id);
    await session.regenerate(body);
    return sendOk(reply, session.snapshot());
  });

  app.post('/api/v1/sessions/:id/feedback', async (req, reply) => {
    const { id } = Params.parse(req.params);
    const body = FeedbackBody.parse(req.body ?? {});
    const session = registry.get(id);
    await session.sendFeedback(body);
    return sendOk(reply, session.snapshot());
  });

  // ================== VIEW STATE ==================
  app.post('/api/v1/sessions/:id/navigate', async (req, reply) => {
    const { id } = Params.parse(req.params);
    const { direction } = NavigateBody.parse(req.body ?? {});
    const session = registry.get(id);
    session.navigate(direction);
    return sendOk(reply, session.snapshot());
  });

  app.post('/api/v1/sessions/:id/reset', async (req, reply) => {
    const { id } = Params.parse(req.params);
    return sendOk(reply, registry.reset(id).snapshot());
  });

  // persisted history, including sessions already evicted or reset
  app.get('/api/v1/sessions/:id/records', async (req, reply) => {
    const { id } = Params.parse(req.params);
    return sendOk(reply, await records.listBySession(id));
  });
});
