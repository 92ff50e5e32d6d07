// src/main.ts
import 'dotenv/config';
import { loadEnv } from './config/env';
import { getLogger, logger } from './logger';
import { createClient, ensureReady } from './ai/llm';
import { loadTemplates } from './pipeline/templates';
import { loadStrategies } from './pipeline/strategies';
import { pipelineSettingsFromConfig } from './pipeline/pipeline';
import type { PipelineDeps } from './pipeline/types';
import { initializeDatabase } from './db/index';
import { RecordWriter } from './records/index';
import { SqliteRecordSink } from './records/sqlite';
import { CsvRecordSink } from './records/csv';
import { createRemoteSink } from './records/remote';
import type { RecordSink } from './records/types';
import { SessionRegistry } from './session/registry';
import { buildApp } from './api/server';

async function main() {
  const cfg = loadEnv();
  const log = getLogger('boot');

  const llm = createClient(cfg.ai);
  if (!(await ensureReady(llm))) {
    log.warn({ provider: llm.provider }, 'LLM provider not reachable at boot, continuing');
  }

  const deps: PipelineDeps = {
    llm,
    strategies: loadStrategies(cfg.pipeline.strategiesPath, getLogger('strategies')),
    templates: loadTemplates(cfg.pipeline.promptsDir),
    settings: pipelineSettingsFromConfig(cfg.pipeline),
    logger: getLogger('pipeline'),
  };

  const recordsLog = getLogger('records');
  const db = await initializeDatabase({ filename: cfg.records.dbPath, logger: recordsLog });
  const sqlite = new SqliteRecordSink(db);
  const local: RecordSink[] = [sqlite];
  if (cfg.records.csvMirrorPath) local.push(new CsvRecordSink(cfg.records.csvMirrorPath));
  const writer = new RecordWriter(local, createRemoteSink(cfg.records.remote, recordsLog), recordsLog);

  const registry = new SessionRegistry(deps, writer);

  const app = await buildApp({
    logger,
    registry,
    records: sqlite,
    strategies: deps.strategies,
    cors: cfg.cors,
    rateLimitMax: cfg.rateLimitMax,
    sessionTtlMs: cfg.sessions.ttlMs,
  });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'shutting down');
    try {
      await app.close();
      await writer.close();
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'shutdown failed');
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: cfg.port, host: cfg.host });
  log.info({ provider: llm.provider, strategies: deps.strategies.length }, `API listening on http://${cfg.host}:${cfg.port}`);
}

main().catch((err) => {
  logger.error({ err }, 'boot failed');
  process.exit(1);
});
