// src/ai/providers/openai.ts
import type { LLMClient } from '../types';
import { abortableFetch, withTimeout, readErrorBody, pickCompletionText } from './utils';

export interface OpenAIProviderConfig {
  apiKey?: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
}

export function buildOpenAIProvider(cfg: OpenAIProviderConfig): LLMClient {
  function openaiHeaders(): Record<string, string> {
    if (!cfg.apiKey) throw new Error('OPENAI_API_KEY not set');
    return { 'content-type': 'application/json', 'authorization': `Bearer ${cfg.apiKey}` };
  }

  return {
    provider: 'openai',

    async chat({ model, messages, options = {} }) {
      const body = {
        model: model || cfg.model,
        temperature: options.temperature,
        max_tokens: options.max_tokens,
        messages,
      };
      const response = await abortableFetch(
        `${cfg.baseUrl}/v1/chat/completions`,
        { method: 'POST', headers: openaiHeaders(), body: JSON.stringify(body) },
        cfg.timeoutMs,
      );
      if (!response.ok) {
        const text = await readErrorBody(response);
        throw new Error(`OpenAI chat API error: ${response.status} ${text}`);
      }
      const json: unknown = await response.json();
      return { message: { role: 'assistant', content: pickCompletionText(json) } };
    },

    async ping() {
      try {
        const response = await withTimeout(fetch(`${cfg.baseUrl}/v1/models`, { headers: openaiHeaders() }), 1500);
        return response.ok;
      } catch { return false; }
    },
  };
}
