// src/records/remote.ts
import type { Logger } from 'pino';
import { abortableFetch, readErrorBody } from '../ai/providers/utils';
import type { RecordSink, RunRecord } from './types';

export interface RemoteStoreConfig {
  url?: string;
  token?: string;
  timeoutMs: number;
}

/** Document id under the session: one per run version, one per feedback record. */
export function remoteDocId(record: RunRecord): string {
  return record.kind === 'run' ? `v${record.version}` : `v${record.version}-feedback-${record.id}`;
}

/**
 * Remote document store over HTTP: PUT {url}/sessions/{session}/records/{doc}.
 * Ids are unique per record, so a PUT never replaces an earlier document.
 */
export class RemoteRecordSink implements RecordSink {
  readonly name = 'remote';

  constructor(private readonly cfg: { url: string; token: string; timeoutMs: number }) {}

  async append(record: RunRecord): Promise<void> {
    const url = `${this.cfg.url}/sessions/${encodeURIComponent(record.session_id)}/records/${encodeURIComponent(remoteDocId(record))}`;
    const response = await abortableFetch(
      url,
      {
        method: 'PUT',
        headers: { 'content-type': 'application/json', 'authorization': `Bearer ${this.cfg.token}` },
        body: JSON.stringify(record),
      },
      this.cfg.timeoutMs,
    );
    if (!response.ok) {
      const text = await readErrorBody(response);
      throw new Error(`Remote store error: ${response.status} ${text}`);
    }
  }
}

/** Null when the store is not configured; a URL without a token disables it with a warning. */
export function createRemoteSink(cfg: RemoteStoreConfig, log: Logger): RemoteRecordSink | null {
  if (!cfg.url) {
    log.info('remote record store disabled (REMOTE_STORE_URL unset)');
    return null;
  }
  if (!cfg.token) {
    log.warn('REMOTE_STORE_URL set without REMOTE_STORE_TOKEN, remote record store disabled');
    return null;
  }
  return new RemoteRecordSink({ url: cfg.url, token: cfg.token, timeoutMs: cfg.timeoutMs });
}
