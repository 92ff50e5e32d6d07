// src/records/build.ts
import { randomUUID } from 'node:crypto';
import type { Feedback } from '../pipeline/types';
import type { Run } from '../session/types';
import type { RunRecord } from './types';

export function toRunRecord(run: Run): RunRecord {
  const { result, evaluation } = run;
  const completed = result.kind === 'completed' ? result : null;
  return {
    id: run.id,
    kind: 'run',
    version: run.version,
    created_at: run.created_at,
    session_id: run.session_id,
    input_json: JSON.stringify(run.input),
    input_type: completed?.input_type ?? null,
    needs_clarification: result.kind === 'clarification',
    follow_up_question: result.kind === 'clarification' ? result.follow_up_question : null,
    message: completed?.message ?? null,
    explanation: completed?.explanation ?? null,
    raw_tags: [...run.tags.raw],
    justified_tags: [...run.tags.tags],
    matched_tags: [...run.matched_tags],
    matched_strategies: run.matched_strategies.map(s => s.title),
    // collected later, as a separate feedback record
    rating: null,
    feedback: null,
    rebuttal: run.rebuttal,
    confidence_score: evaluation?.confidence_score ?? null,
    justification: evaluation?.justification ?? null,
    suggested_improvements: evaluation?.suggested_improvements ?? null,
    ultimate_reply: evaluation?.ultimate_reply ?? null,
  };
}

/**
 * Feedback on an existing run. The run's content is repeated so each row
 * stands alone in flat-file and remote mirrors.
 */
export function toFeedbackRecord(run: Run, feedback: Feedback, now = new Date()): RunRecord {
  return {
    ...toRunRecord(run),
    id: randomUUID(),
    kind: 'feedback',
    created_at: now.toISOString(),
    rating: feedback.rating ?? null,
    feedback: feedback.text ?? null,
  };
}
