// src/api/v1/index.ts
import type { FastifyInstance } from 'fastify';

import { installErrorHandler } from '../_shared/errors';
import registerSessions, { type RecordLister } from '../routes/sessions';
import registerStrategies from '../routes/strategies';
import type { SessionRegistry } from '../../session/registry';
import type { Strategy } from '../../pipeline/types';

export type V1Options = {
  registry: SessionRegistry;
  records: RecordLister;
  strategies: readonly Strategy[];
};

export default async function v1(app: FastifyInstance, opts: V1Options) {
  installErrorHandler(app);

  const manifest: Array<{ method: string; path: string }> = [];
  app.addHook('onRoute', (r) => {
    const methods = Array.isArray(r.method) ? r.method : [r.method];
    for (const m of methods) manifest.push({ method: m, path: r.url });
  });

  await app.register(registerSessions, { registry: opts.registry, records: opts.records });
  await app.register(registerStrategies, { strategies: opts.strategies });

  // Manifest (dedupe by method+path; HEAD shadows of GET are included)
  app.get('/api/v1/__routes', async () => {
    const uniq = new Map<string, { method: string; path: string }>();
    for (const r of manifest) uniq.set(`${r.method} ${r.path}`, r);
    const rows = Array.from(uniq.values());
    rows.sort((a, b) => (a.path === b.path ? a.method.localeCompare(b.method) : a.path.localeCompare(b.path)));
    return { ok: true, data: rows };
  });
}
