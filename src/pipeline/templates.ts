// src/pipeline/templates.ts
import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { PromptTemplates } from './types';

export const TEMPLATE_FILES: Record<keyof PromptTemplates, string> = {
  tagExtraction: 'tag-extraction.txt',
  replySystem: 'reply-system.txt',
  rebuttal: 'rebuttal.txt',
  evaluation: 'evaluation.txt',
};

/** Stand-in for an empty field so no template ever renders a blank slot. */
export const EMPTY_FIELD = '(none)';

/**
 * Load every prompt template from `dir`. A missing file throws: the
 * pipeline cannot run without its instructions.
 */
export function loadTemplates(dir: string): PromptTemplates {
  const read = (file: string) => {
    const full = path.join(dir, file);
    try {
      return readFileSync(full, 'utf8').trim();
    } catch (e) {
      throw new Error(`Prompt template missing or unreadable: ${full}`, { cause: e });
    }
  };
  return {
    tagExtraction: read(TEMPLATE_FILES.tagExtraction),
    replySystem: read(TEMPLATE_FILES.replySystem),
    rebuttal: read(TEMPLATE_FILES.rebuttal),
    evaluation: read(TEMPLATE_FILES.evaluation),
  };
}

/**
 * Replace `{name}` placeholders whose name is a key of `vars`. Unknown
 * names and braces in JSON examples (`{ "message": ... }`) are left as-is.
 * Values are inserted once, so a value containing `{comment}` is not
 * expanded again.
 */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (whole: string, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : whole,
  );
}

export function orPlaceholder(value: string): string {
  return value.trim() ? value : EMPTY_FIELD;
}
