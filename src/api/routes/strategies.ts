// src/api/routes/strategies.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';
import { matchStrategies } from '../../pipeline/matcher';
import type { Strategy } from '../../pipeline/types';
import { sendOk } from '../_shared/http';

export type StrategyRoutesOptions = {
  strategies: readonly Strategy[];
};

const MatchQuery = z.object({ tags: z.string().optional() });

export default fp<StrategyRoutesOptions>(async function registerStrategyRoutes(app: FastifyInstance, opts) {
  // GET /strategies?tags=health,skeptical  (comma list filters by tag)
  app.get('/api/v1/strategies', async (req, reply) => {
    const { tags } = MatchQuery.parse(req.query ?? {});
    if (!tags) return sendOk(reply, opts.strategies);
    const list = tags.split(',').map(t => t.trim()).filter(Boolean);
    return sendOk(reply, matchStrategies(opts.strategies, list).matched);
  });
});
