// src/pipeline/matcher.ts
import type { Strategy, StrategyMatch } from './types';

/**
 * Strategies whose tags intersect `tags`, in store order and unique by
 * title, plus the sorted entries of `tags` that took part in a match.
 * Comparison ignores case and surrounding whitespace.
 */
export function matchStrategies(strategies: readonly Strategy[], tags: readonly string[]): StrategyMatch {
  const wanted = new Map<string, string[]>();
  for (const tag of tags) {
    const key = tag.trim().toLowerCase();
    if (!key) continue;
    const entries = wanted.get(key);
    if (entries) entries.push(tag);
    else wanted.set(key, [tag]);
  }
  if (wanted.size === 0) return { matched: [], matchedTags: [] };

  const matched: Strategy[] = [];
  const titles = new Set<string>();
  const hit = new Set<string>();

  for (const strategy of strategies) {
    let overlaps = false;
    for (const t of strategy.tags) {
      const entries = wanted.get(t.toLowerCase());
      if (!entries) continue;
      overlaps = true;
      for (const e of entries) hit.add(e);
    }
    if (!overlaps || titles.has(strategy.title)) continue;
    titles.add(strategy.title);
    matched.push(strategy);
  }

  return { matched, matchedTags: Array.from(hit).sort() };
}

const NO_MATCH_SENTENCE = 'No specific strategies matched; rely on general persuasive best practices.';

/** Bullet list used in the reply and evaluation prompts. */
export function formatStrategies(matched: readonly Strategy[]): string {
  if (matched.length === 0) return NO_MATCH_SENTENCE;
  return matched.map(s => `- **${s.title}**: ${s.description}`).join('\n');
}
