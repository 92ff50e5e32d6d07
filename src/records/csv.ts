// src/records/csv.ts
import { appendFile, mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
import * as Papa from 'papaparse';
import { RECORD_COLUMNS, toFlatRow, type RecordSink, type RunRecord } from './types';

async function fileHasContent(file: string): Promise<boolean> {
  try {
    return (await stat(file)).size > 0;
  } catch {
    return false;
  }
}

/**
 * Flat-file mirror of the record store. The header row is written when the
 * file is new or empty; appends are serialized so it is written once.
 */
export class CsvRecordSink implements RecordSink {
  readonly name = 'csv';
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly file: string) {}

  append(record: RunRecord): Promise<void> {
    const next = this.chain.then(() => this.write(record));
    this.chain = next.catch(() => undefined);
    return next;
  }

  private async write(record: RunRecord): Promise<void> {
    const header = !(await fileHasContent(this.file));
    const csv = Papa.unparse([toFlatRow(record)], {
      header,
      columns: [...RECORD_COLUMNS],
      newline: '\n',
    });
    await mkdir(path.dirname(this.file), { recursive: true });
    await appendFile(this.file, `${csv}\n`, 'utf8');
  }
}
