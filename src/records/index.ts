// src/records/index.ts
import type { Logger } from 'pino';
import { errorMessage } from '../pipeline/errors';
import type { RecordSink, RunRecord, RunRecorder } from './types';

/**
 * Fans a record out to every sink. Local sinks are awaited but their
 * failures are only logged, since the run they describe already succeeded.
 * The remote sink is not awaited at all; its writes are tracked so
 * `flush()` can wait for them at shutdown.
 */
export class RecordWriter implements RunRecorder {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly local: readonly RecordSink[],
    private readonly remote: RecordSink | null,
    private readonly log: Logger,
  ) {}

  async write(record: RunRecord): Promise<void> {
    for (const sink of this.local) {
      try {
        await sink.append(record);
      } catch (e) {
        this.log.error({ sink: sink.name, recordId: record.id, err: errorMessage(e) }, 'record write failed');
      }
    }
    if (this.remote) this.track(this.remote, record);
  }

  private track(sink: RecordSink, record: RunRecord): void {
    const p = sink.append(record).then(
      () => { this.log.debug({ sink: sink.name, recordId: record.id }, 'remote record written'); },
      (e: unknown) => { this.log.warn({ sink: sink.name, recordId: record.id, err: errorMessage(e) }, 'remote record write failed'); },
    );
    this.pending.add(p);
    void p.finally(() => this.pending.delete(p));
  }

  /** Wait for in-flight remote writes. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  async close(): Promise<void> {
    await this.flush();
    for (const sink of this.local) {
      if (sink.close) await sink.close();
    }
  }
}

export * from './types';
export { toRunRecord, toFeedbackRecord } from './build';
