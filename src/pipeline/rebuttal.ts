// src/pipeline/rebuttal.ts
import { errorMessage } from './errors';
import { extractJsonObject } from './json-repair';
import { orPlaceholder, renderTemplate } from './templates';
import type { PipelineDeps } from './types';

/**
 * Have the model argue against the generated reply as a skeptical critic.
 * Best effort: any failure returns '' and the caller shows nothing.
 */
export async function generateRebuttal(deps: PipelineDeps, reply: string, comment: string): Promise<string> {
  const { llm, templates, settings, logger } = deps;
  const prompt = renderTemplate(templates.rebuttal, {
    reply,
    comment: orPlaceholder(comment),
  });

  let text: string;
  try {
    const resp = await llm.chat({
      model: settings.rebuttal.model,
      messages: [{ role: 'system', content: prompt }],
      options: { temperature: settings.rebuttal.temperature, max_tokens: settings.rebuttal.maxTokens },
    });
    text = resp.message.content;
  } catch (e) {
    logger.warn({ stage: 'rebuttal', err: errorMessage(e) }, 'rebuttal call failed, skipping');
    return '';
  }

  const found = extractJsonObject(text);
  const rebuttal = found.ok ? found.value.rebuttal : undefined;
  if (typeof rebuttal !== 'string' || !rebuttal.trim()) {
    logger.warn({ stage: 'rebuttal', raw: text.slice(0, 200) }, 'rebuttal answer unusable, skipping');
    return '';
  }
  return rebuttal.trim();
}
