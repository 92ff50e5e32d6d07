// src/records/types.ts

export type RecordKind = 'run' | 'feedback';

/**
 * Flat, append-only persistence shape. Every write is a new record with
 * its own id; feedback on a run is a separate `feedback` record carrying
 * the same session id and version.
 */
export interface RunRecord {
  id: string;
  kind: RecordKind;
  version: number;
  created_at: string;
  session_id: string;
  input_json: string;
  input_type: string | null;
  needs_clarification: boolean;
  follow_up_question: string | null;
  message: string | null;
  explanation: string | null;
  raw_tags: string[];
  justified_tags: string[];
  matched_tags: string[];
  matched_strategies: string[];
  rating: number | null;
  feedback: string | null;
  rebuttal: string | null;
  confidence_score: number | null;
  justification: string | null;
  suggested_improvements: string | null;
  ultimate_reply: string | null;
}

export const RECORD_COLUMNS = [
  'id',
  'kind',
  'version',
  'created_at',
  'session_id',
  'input_json',
  'input_type',
  'needs_clarification',
  'follow_up_question',
  'message',
  'explanation',
  'raw_tags',
  'justified_tags',
  'matched_tags',
  'matched_strategies',
  'rating',
  'feedback',
  'rebuttal',
  'confidence_score',
  'justification',
  'suggested_improvements',
  'ultimate_reply',
] as const satisfies ReadonlyArray<keyof RunRecord>;

export type FlatValue = string | number | null;
export type FlatRow = Record<(typeof RECORD_COLUMNS)[number], FlatValue>;

export interface RecordSink {
  readonly name: string;
  append(record: RunRecord): Promise<void>;
  close?(): Promise<void>;
}

/** What a session needs from persistence. */
export interface RunRecorder {
  write(record: RunRecord): Promise<void>;
}

/** Lists are stored as JSON text, booleans as 0/1. */
export function toFlatRow(record: RunRecord): FlatRow {
  return {
    ...record,
    needs_clarification: record.needs_clarification ? 1 : 0,
    raw_tags: JSON.stringify(record.raw_tags),
    justified_tags: JSON.stringify(record.justified_tags),
    matched_tags: JSON.stringify(record.matched_tags),
    matched_strategies: JSON.stringify(record.matched_strategies),
  };
}
