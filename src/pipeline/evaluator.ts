// src/pipeline/evaluator.ts
import { errorMessage } from './errors';
import { extractJsonObject } from './json-repair';
import { EMPTY_FIELD, orPlaceholder, renderTemplate } from './templates';
import type { EvaluationResult, PipelineDeps } from './types';

export const EVALUATION_FAILED = 'Evaluation failed.';

export function failedEvaluation(rawOutput: string): EvaluationResult {
  return {
    confidence_score: null,
    justification: EVALUATION_FAILED,
    suggested_improvements: '',
    ultimate_reply: '',
    raw_output: rawOutput,
  };
}

/** A number (or numeric string) within 0–10, else null. */
export function parseConfidence(v: unknown): number | null {
  const n = typeof v === 'number' ? v : typeof v === 'string' && v.trim() ? Number(v) : NaN;
  return Number.isFinite(n) && n >= 0 && n <= 10 ? n : null;
}

const str = (v: unknown) => (typeof v === 'string' ? v.trim() : '');

/** Decode an evaluation answer; an answer without a JSON object counts as failed. */
export function parseEvaluationResponse(text: string): EvaluationResult {
  const found = extractJsonObject(text);
  if (!found.ok) return failedEvaluation(text);
  const obj = found.value;
  return {
    confidence_score: parseConfidence(obj.confidence_score),
    justification: str(obj.justification),
    suggested_improvements: str(obj.suggested_improvements),
    ultimate_reply: str(obj.ultimate_reply),
    raw_output: text,
  };
}

/**
 * Score the reply against its rebuttal and propose an "ultimate" reply.
 * Never throws past the pipeline.
 */
export async function evaluateReply(
  deps: PipelineDeps,
  reply: string,
  rebuttal: string,
  comment: string,
  strategyBlock: string,
): Promise<EvaluationResult> {
  const { llm, templates, settings, logger } = deps;
  const prompt = renderTemplate(templates.evaluation, {
    comment: orPlaceholder(comment),
    reply,
    rebuttal: rebuttal.trim() ? rebuttal : EMPTY_FIELD,
    strategies_used: strategyBlock,
  });

  let text: string;
  try {
    const resp = await llm.chat({
      model: settings.evaluation.model,
      messages: [{ role: 'system', content: prompt }],
      options: { temperature: settings.evaluation.temperature, max_tokens: settings.evaluation.maxTokens },
    });
    text = resp.message.content;
  } catch (e) {
    const msg = errorMessage(e);
    logger.warn({ stage: 'evaluation', err: msg }, 'evaluation call failed');
    return failedEvaluation(msg);
  }

  const result = parseEvaluationResponse(text);
  if (result.justification === EVALUATION_FAILED) {
    logger.warn({ stage: 'evaluation', raw: text.slice(0, 200) }, 'evaluation answer was not JSON');
  }
  return result;
}
