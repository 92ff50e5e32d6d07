// src/api/server.ts
import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import v1 from './v1/index';
import { sendErr } from './_shared/http';
import type { RecordLister } from './routes/sessions';
import type { SessionRegistry } from '../session/registry';
import type { Strategy } from '../pipeline/types';

export interface BuildAppOptions {
  logger: FastifyBaseLogger;
  registry: SessionRegistry;
  records: RecordLister;
  strategies: readonly Strategy[];
  cors: readonly string[];
  rateLimitMax: number;
  sessionTtlMs: number;
  /** how often idle sessions are swept; defaults to a tenth of the TTL, at least a minute */
  sweepIntervalMs?: number;
}

export async function buildApp(opts: BuildAppOptions) {
  const app = Fastify({ logger: opts.logger });

  // Global plugins
  await app.register(helmet, { global: true, contentSecurityPolicy: false });
  await app.register(cors, { origin: [...opts.cors], credentials: true });
  await app.register(rateLimit, { max: opts.rateLimitMax, timeWindow: '1 minute' });

  // Root + health
  app.get('/', async (_req, reply) => reply.redirect(302, '/api/v1/__routes'));
  app.get('/healthz', async () => ({ ok: true, data: { ping: 'pong', sessions: opts.registry.size } }));

  try {
    await app.register(v1, { registry: opts.registry, records: opts.records, strategies: opts.strategies });
    app.log.info('v1 plugin mounted');
  } catch (err) {
    app.log.error({ err }, 'failed_to_mount_v1');
    throw err;
  }

  // 404 handler
  app.setNotFoundHandler((req, reply) =>
    sendErr(reply, 404, {
      error: 'route_not_found',
      message: `No route ${req.method} ${req.url}`,
      hint: 'See /api/v1/__routes',
    }),
  );

  // Idle session eviction
  const every = opts.sweepIntervalMs ?? Math.max(60_000, Math.floor(opts.sessionTtlMs / 10));
  const sweeper = setInterval(() => opts.registry.sweep(opts.sessionTtlMs), every);
  sweeper.unref();
  app.addHook('onClose', async () => {
    clearInterval(sweeper);
  });

  return app;
}
