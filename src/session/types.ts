// src/session/types.ts
import type {
  EvaluationResult,
  Feedback,
  PipelineInput,
  PipelineResult,
  Strategy,
  TagExtraction,
} from '../pipeline/types';

export type SessionState = 'idle' | 'running' | 'clarification_displayed' | 'result_displayed';

export type NavigateDirection = 'prev' | 'next';

/** One entry of a session's history. Only `feedback` changes after creation. */
export interface Run {
  readonly id: string;
  readonly session_id: string;
  readonly version: number;
  readonly created_at: string;
  readonly input: PipelineInput;
  readonly tags: TagExtraction;
  readonly matched_strategies: readonly Strategy[];
  readonly matched_tags: readonly string[];
  readonly result: PipelineResult;
  readonly rebuttal: string | null;
  readonly evaluation: EvaluationResult | null;
  /** feedback this run was conditioned on */
  readonly prior_feedback: Feedback | null;
  /** feedback collected after this run was shown */
  feedback: Feedback | null;
}

export interface SessionSnapshot {
  session_id: string;
  state: SessionState;
  runs: Run[];
  latest: Run | null;
  view_index: number | null;
  viewed: Run | null;
  pending_feedback: Feedback | null;
  current_input: PipelineInput | null;
  last_error: { code: string; message: string } | null;
}
