// src/pipeline/tags.ts
import { errorMessage } from './errors';
import { extractJsonArray } from './json-repair';
import { orPlaceholder, renderTemplate } from './templates';
import type { PipelineDeps, TagExtraction } from './types';

export const MAX_TAGS = 5;

/** Trim, lowercase, drop empties and duplicates, cap at MAX_TAGS. */
export function normalizeTags(raw: readonly string[]): string[] {
  const out: string[] = [];
  for (const t of raw) {
    const tag = t.trim().toLowerCase();
    if (!tag || out.includes(tag)) continue;
    out.push(tag);
    if (out.length === MAX_TAGS) break;
  }
  return out;
}

/** Pull the tag list out of a model answer; null when no array decodes. */
export function parseTagResponse(text: string): TagExtraction | null {
  const found = extractJsonArray(text);
  if (!found.ok) return null;
  const raw = found.value.filter((v): v is string => typeof v === 'string');
  return { raw, tags: normalizeTags(raw) };
}

/**
 * Ask the model for 1–5 emotional/contextual tags. Never throws: a failed
 * call or an unreadable answer yields no tags, which simply means no
 * strategies will match.
 */
export async function extractTags(deps: PipelineDeps, comment: string, draft: string): Promise<TagExtraction> {
  const { llm, templates, settings, logger } = deps;
  const prompt = renderTemplate(templates.tagExtraction, {
    comment: orPlaceholder(comment),
    draft: orPlaceholder(draft),
  });

  let text: string;
  try {
    const resp = await llm.chat({
      model: settings.tags.model,
      messages: [{ role: 'system', content: prompt }],
      options: { temperature: settings.tags.temperature, max_tokens: settings.tags.maxTokens },
    });
    text = resp.message.content;
  } catch (e) {
    logger.warn({ stage: 'tags', err: errorMessage(e) }, 'tag extraction call failed, continuing without tags');
    return { raw: [], tags: [] };
  }

  const parsed = parseTagResponse(text);
  if (!parsed) {
    logger.warn({ stage: 'tags', raw: text.slice(0, 200) }, 'tag extraction returned no JSON list, continuing without tags');
    return { raw: [], tags: [] };
  }
  return parsed;
}
