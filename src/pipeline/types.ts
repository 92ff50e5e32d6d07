// src/pipeline/types.ts
import type { Logger } from 'pino';
import type { LLMClient } from '../ai/types';

export interface Strategy {
  readonly title: string;
  readonly description: string;
  readonly tags: readonly string[];
}

export interface PipelineInput {
  comment: string;
  draft_reply: string;
}

export type InputType = 'comment' | 'draft_reply' | 'both' | 'unknown';

export interface ClarificationNeeded {
  kind: 'clarification';
  follow_up_question: string;
}

export interface Completed {
  kind: 'completed';
  message: string;
  explanation: string;
  input_type: InputType;
}

export type PipelineResult = ClarificationNeeded | Completed;

export interface EvaluationResult {
  confidence_score: number | null;
  justification: string;
  suggested_improvements: string;
  ultimate_reply: string;
  /** model text (or call error) kept for diagnostics */
  raw_output: string;
}

export interface Feedback {
  rating?: number;
  text?: string;
}

export interface TagExtraction {
  /** strings exactly as decoded from the model's array */
  raw: string[];
  /** normalized tags used for matching */
  tags: string[];
}

export interface StrategyMatch {
  matched: Strategy[];
  matchedTags: string[];
}

export interface PromptTemplates {
  tagExtraction: string;
  replySystem: string;
  rebuttal: string;
  evaluation: string;
}

export interface StageSettings {
  model?: string;
  temperature: number;
  maxTokens: number;
}

export interface PipelineSettings {
  tags: StageSettings;
  reply: StageSettings;
  rebuttal: StageSettings;
  evaluation: StageSettings;
  enableRebuttal: boolean;
  enableEvaluation: boolean;
}

/** Everything a pipeline stage needs, constructed once at boot. */
export interface PipelineDeps {
  llm: LLMClient;
  strategies: readonly Strategy[];
  templates: PromptTemplates;
  settings: PipelineSettings;
  logger: Logger;
}

/** Output of one pass through the stages, before it becomes a session Run. */
export interface PipelineRun {
  input: PipelineInput;
  tags: TagExtraction;
  match: StrategyMatch;
  result: PipelineResult;
  rebuttal: string | null;
  evaluation: EvaluationResult | null;
  priorFeedback: Feedback | null;
}
