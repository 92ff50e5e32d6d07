import { deferred, silentLogger, sampleRun } from '../testing/fakes';
import { toRunRecord } from './build';
import { RecordWriter } from './index';
import type { RecordSink, RunRecord } from './types';

class ListSink implements RecordSink {
  readonly records: RunRecord[] = [];
  closed = false;

  constructor(readonly name: string) {}

  async append(record: RunRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FailingSink implements RecordSink {
  readonly name = 'failing';

  async append(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('RecordWriter', () => {
  const record = toRunRecord(sampleRun());

  it('writes to every local sink even when one fails', async () => {
    const good = new ListSink('good');
    const writer = new RecordWriter([new FailingSink(), good], null, silentLogger);
    await expect(writer.write(record)).resolves.toBeUndefined();
    expect(good.records).toEqual([record]);
  });

  it('does not wait for the remote sink until flushed', async () => {
    const gate = deferred<void>();
    const written: RunRecord[] = [];
    const remote: RecordSink = {
      name: 'remote',
      append: async (r) => {
        await gate.promise;
        written.push(r);
      },
    };
    const writer = new RecordWriter([], remote, silentLogger);

    await writer.write(record);
    expect(written).toEqual([]);

    gate.resolve();
    await writer.flush();
    expect(written).toEqual([record]);
  });

  it('absorbs remote failures', async () => {
    const writer = new RecordWriter([], new FailingSink(), silentLogger);
    await writer.write(record);
    await expect(writer.flush()).resolves.toBeUndefined();
  });

  it('closes local sinks', async () => {
    const sink = new ListSink('local');
    const writer = new RecordWriter([sink], null, silentLogger);
    await writer.close();
    expect(sink.closed).toBe(true);
  });
});
