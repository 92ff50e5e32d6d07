// src/ai/llm.ts
import type { LLMClient } from './types';
import type { AppConfig } from '../config/env';
import { buildOllamaProvider } from './providers/ollama';
import { buildOpenAIProvider } from './providers/openai';

/*
 * Build the LLM provider picked by configuration.
 *   LLM_PROVIDER=0 or LLM_PROVIDER=ollama  → Ollama
 *   anything else                          → OpenAI
 * The client is constructed once at boot and handed to the pipeline.
 */
export function createClient(ai: AppConfig['ai']): LLMClient {
  return ai.provider === 'ollama'
    ? buildOllamaProvider(ai.ollama)
    : buildOpenAIProvider(ai.openai);
}

/** Verify connectivity when the provider exposes ping(). */
export async function ensureReady(client: LLMClient): Promise<boolean> {
  if (!client.ping) return true;
  try { return await client.ping(); }
  catch { return false; }
}

export * from './types';
