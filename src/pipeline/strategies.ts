// src/pipeline/strategies.ts
import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Strategy } from './types';

const StrategySchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().min(1),
  tags: z.array(z.string()).default([]),
});

const StrategyFileSchema = z.array(StrategySchema);

/**
 * Validate raw strategy records. Tags are trimmed and lowercased; a title
 * seen before (case-insensitive) is dropped so identity stays unique.
 */
export function parseStrategies(raw: unknown): Strategy[] {
  const rows = StrategyFileSchema.parse(raw);
  const seen = new Set<string>();
  const out: Strategy[] = [];
  for (const row of rows) {
    const key = row.title.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    const tags = Array.from(new Set(row.tags.map(t => t.trim().toLowerCase()).filter(Boolean)));
    out.push(Object.freeze({ title: row.title, description: row.description, tags: Object.freeze(tags) }));
  }
  return out;
}

/**
 * Load the strategy store once at boot. A missing or invalid file degrades
 * to an empty store: replies are still generated, just without retrieval.
 */
export function loadStrategies(file: string, log: Logger): readonly Strategy[] {
  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (err) {
    log.warn({ file, err }, 'strategy file not readable, continuing with an empty strategy store');
    return [];
  }
  try {
    const strategies = parseStrategies(JSON.parse(text));
    log.info({ file, count: strategies.length }, 'strategies loaded');
    return Object.freeze(strategies);
  } catch (err) {
    log.warn({ file, err }, 'strategy file invalid, continuing with an empty strategy store');
    return [];
  }
}
