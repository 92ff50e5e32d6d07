// src/records/sqlite.ts
import type { Knex } from 'knex';
import { z } from 'zod';
import { RUN_TABLE, closeDb } from '../db';
import { toFlatRow, type RecordSink, type RunRecord } from './types';

const jsonList = z.string().transform((s, ctx) => {
  try {
    return z.array(z.string()).parse(JSON.parse(s));
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a JSON string list' });
    return z.NEVER;
  }
});

const RowSchema = z.object({
  id: z.string(),
  kind: z.enum(['run', 'feedback']),
  version: z.number().int(),
  created_at: z.string(),
  session_id: z.string(),
  input_json: z.string(),
  input_type: z.string().nullable(),
  needs_clarification: z.union([z.number(), z.boolean()]).transform(v => v === true || v === 1),
  follow_up_question: z.string().nullable(),
  message: z.string().nullable(),
  explanation: z.string().nullable(),
  raw_tags: jsonList,
  justified_tags: jsonList,
  matched_tags: jsonList,
  matched_strategies: jsonList,
  rating: z.number().nullable(),
  feedback: z.string().nullable(),
  rebuttal: z.string().nullable(),
  confidence_score: z.number().nullable(),
  justification: z.string().nullable(),
  suggested_improvements: z.string().nullable(),
  ultimate_reply: z.string().nullable(),
});

export class SqliteRecordSink implements RecordSink {
  readonly name = 'sqlite';

  constructor(private readonly db: Knex) {}

  async append(record: RunRecord): Promise<void> {
    await this.db(RUN_TABLE).insert(toFlatRow(record));
  }

  /** Records of one session in write order. */
  async listBySession(sessionId: string): Promise<RunRecord[]> {
    const rows: unknown[] = await this.db(RUN_TABLE)
      .where({ session_id: sessionId })
      .orderBy([{ column: 'version' }, { column: 'created_at' }]);
    return rows.map(r => RowSchema.parse(r));
  }

  async close(): Promise<void> {
    await closeDb(this.db);
  }
}
