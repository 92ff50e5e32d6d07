import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import * as Papa from 'papaparse';
import { sampleRun } from '../testing/fakes';
import { toFeedbackRecord, toRunRecord } from './build';
import { CsvRecordSink } from './csv';
import { RECORD_COLUMNS } from './types';

describe('CsvRecordSink', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'records-'));
    file = path.join(dir, 'nested', 'mirror.csv');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one header and a row per record', async () => {
    const sink = new CsvRecordSink(file);
    const run = sampleRun();
    await Promise.all([
      sink.append(toRunRecord(run)),
      sink.append(toFeedbackRecord(run, { rating: 4 }, new Date('2024-05-01T11:00:00.000Z'))),
    ]);

    const text = await readFile(file, 'utf8');
    const lines = text.split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(RECORD_COLUMNS.join(','));
    expect(lines[3]).toBe('');

    const rows = Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true }).data;
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({
      id: 'run-1',
      kind: 'run',
      needs_clarification: '0',
      raw_tags: '["Skeptical"]',
      matched_strategies: '["Health Evidence","Acknowledge First"]',
      rating: '',
      confidence_score: '6.5',
    });
    expect(rows[1]).toMatchObject({ kind: 'feedback', rating: '4', feedback: '' });
  });

  it('does not repeat the header for an existing file', async () => {
    await new CsvRecordSink(file).append(toRunRecord(sampleRun()));
    await new CsvRecordSink(file).append(toRunRecord(sampleRun({ id: 'run-2', version: 2 })));

    const lines = (await readFile(file, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines.filter(l => l === RECORD_COLUMNS.join(','))).toHaveLength(1);
  });
});
