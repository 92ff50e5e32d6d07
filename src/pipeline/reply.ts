// src/pipeline/reply.ts
import type { ChatMessage } from '../ai/types';
import { ReplyFormatError, ReplyGenerationError } from './errors';
import { extractJsonObject } from './json-repair';
import { formatStrategies } from './matcher';
import { renderTemplate } from './templates';
import type { Feedback, InputType, PipelineDeps, PipelineInput, PipelineResult, Strategy } from './types';

export const MISSING_EXPLANATION = 'No explanation provided.';

const INPUT_TYPES: readonly InputType[] = ['comment', 'draft_reply', 'both'];

function revisionStrength(rating?: number): string {
  if (rating === undefined) return 'Address the comment directly in the new reply.';
  if (rating <= 2) return 'The user was not satisfied. Rewrite the reply substantially and do not reuse its framing.';
  if (rating === 3) return 'Revise the reply noticeably so the feedback is clearly addressed.';
  return 'The user was mostly satisfied. Keep what worked and make light, targeted improvements.';
}

/**
 * Revision instruction placed before the persona template when the
 * previous run in the session received feedback.
 */
export function buildFeedbackBlock(feedback: Feedback): string {
  const lines = [
    '## Revision request',
    'The previous reply in this session received feedback from the user.',
  ];
  if (feedback.rating !== undefined) lines.push(`Rating: ${feedback.rating}/5`);
  if (feedback.text) lines.push(`Comment: "${feedback.text}"`);
  lines.push(revisionStrength(feedback.rating));
  lines.push('In "explanation", describe what you changed in response to this feedback, or explain why you kept the reply as it was.');
  return lines.join('\n');
}

export function buildReplySystemPrompt(template: string, matched: readonly Strategy[], priorFeedback?: Feedback | null): string {
  const base = renderTemplate(template, { formatted_strategies: formatStrategies(matched) });
  return priorFeedback ? `${buildFeedbackBlock(priorFeedback)}\n\n${base}` : base;
}

/**
 * The user payload goes in its own message as JSON, never spliced into the
 * instructions, so text such as "ignore the above" stays data.
 */
export function buildReplyMessages(systemPrompt: string, input: PipelineInput): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: JSON.stringify({ comment: input.comment, draft_reply: input.draft_reply }) },
  ];
}

/** The string as given, or null when it is missing or blank. */
function nonEmptyString(v: unknown): string | null {
  return typeof v === 'string' && v.trim() ? v : null;
}

function normalizeInputType(v: unknown): InputType {
  if (typeof v !== 'string') return 'unknown';
  const t = v.trim().toLowerCase();
  return INPUT_TYPES.find(x => x === t) ?? 'unknown';
}

/** Decode and normalize a reply-generation answer, or throw ReplyFormatError. */
export function parseReplyResponse(text: string): PipelineResult {
  const found = extractJsonObject(text);
  if (!found.ok) throw new ReplyFormatError(text, found.reason);
  const obj = found.value;

  const needsClarification = obj.needs_clarification === true || obj.needs_clarification === 'true';
  if (needsClarification) {
    const question = nonEmptyString(obj.follow_up_question);
    if (!question) throw new ReplyFormatError(text, 'follow_up_question missing');
    return { kind: 'clarification', follow_up_question: question };
  }

  const message = nonEmptyString(obj.message);
  if (!message) throw new ReplyFormatError(text, 'message missing');
  return {
    kind: 'completed',
    message,
    explanation: nonEmptyString(obj.explanation) ?? MISSING_EXPLANATION,
    input_type: normalizeInputType(obj.input_type),
  };
}

export async function generateReply(
  deps: PipelineDeps,
  input: PipelineInput,
  matched: readonly Strategy[],
  priorFeedback?: Feedback | null,
): Promise<PipelineResult> {
  const { llm, templates, settings } = deps;
  const systemPrompt = buildReplySystemPrompt(templates.replySystem, matched, priorFeedback);

  let text: string;
  try {
    const resp = await llm.chat({
      model: settings.reply.model,
      messages: buildReplyMessages(systemPrompt, input),
      options: { temperature: settings.reply.temperature, max_tokens: settings.reply.maxTokens },
    });
    text = resp.message.content;
  } catch (e) {
    throw new ReplyGenerationError(e);
  }
  return parseReplyResponse(text);
}
