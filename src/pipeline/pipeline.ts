// src/pipeline/pipeline.ts
import type { AppConfig } from '../config/env';
import { InputRequiredError } from './errors';
import { evaluateReply } from './evaluator';
import { formatStrategies, matchStrategies } from './matcher';
import { generateRebuttal } from './rebuttal';
import { generateReply } from './reply';
import { extractTags } from './tags';
import type { Feedback, PipelineDeps, PipelineInput, PipelineRun, PipelineSettings } from './types';

/** Stage settings from validated config. Temperatures for the auxiliary stages are fixed. */
export function pipelineSettingsFromConfig(cfg: AppConfig['pipeline']): PipelineSettings {
  return {
    tags: { model: cfg.models.tags, temperature: 0, maxTokens: 60 },
    reply: { model: cfg.models.reply, temperature: cfg.replyTemperature, maxTokens: cfg.replyMaxTokens },
    rebuttal: { model: cfg.models.rebuttal, temperature: 0.7, maxTokens: 300 },
    evaluation: { model: cfg.models.evaluation, temperature: 0.3, maxTokens: 600 },
    enableRebuttal: cfg.enableRebuttal,
    enableEvaluation: cfg.enableEvaluation,
  };
}

export function normalizeInput(input: Partial<PipelineInput>): PipelineInput {
  const comment = (input.comment ?? '').trim();
  const draft_reply = (input.draft_reply ?? '').trim();
  if (!comment && !draft_reply) throw new InputRequiredError();
  return { comment, draft_reply };
}

async function timed<T>(deps: PipelineDeps, stage: string, fn: () => Promise<T>): Promise<T> {
  const started = Date.now();
  try {
    return await fn();
  } finally {
    deps.logger.debug({ stage, ms: Date.now() - started }, 'stage finished');
  }
}

/**
 * One pass: tags → matching → reply, then rebuttal and evaluation for
 * completed replies when enabled. A clarification request returns right
 * after the reply stage. Reply failures (call or JSON) propagate; every
 * other stage degrades to a default.
 */
export async function runPipeline(
  deps: PipelineDeps,
  rawInput: Partial<PipelineInput>,
  priorFeedback: Feedback | null = null,
): Promise<PipelineRun> {
  const input = normalizeInput(rawInput);
  const { settings, logger } = deps;

  const tags = await timed(deps, 'tags', () => extractTags(deps, input.comment, input.draft_reply));
  const match = matchStrategies(deps.strategies, tags.tags);
  const result = await timed(deps, 'reply', () => generateReply(deps, input, match.matched, priorFeedback));

  const run: PipelineRun = { input, tags, match, result, rebuttal: null, evaluation: null, priorFeedback };

  if (result.kind === 'completed') {
    if (settings.enableRebuttal) {
      run.rebuttal = await timed(deps, 'rebuttal', () => generateRebuttal(deps, result.message, input.comment));
    }
    if (settings.enableEvaluation) {
      const strategyBlock = formatStrategies(match.matched);
      run.evaluation = await timed(deps, 'evaluation', () =>
        evaluateReply(deps, result.message, run.rebuttal ?? '', input.comment, strategyBlock),
      );
    }
  }

  logger.info(
    {
      result: result.kind,
      tags: tags.tags,
      matched: match.matched.map(s => s.title),
      revised: priorFeedback !== null,
      confidence: run.evaluation?.confidence_score ?? null,
    },
    'pipeline run complete',
  );
  return run;
}
