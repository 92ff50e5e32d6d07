// src/ai/providers/ollama.ts
import type { LLMClient, ChatMessage } from '../types';
import { abortableFetch, withTimeout, readErrorBody, pickGenerateText } from './utils';

export interface OllamaProviderConfig {
  host: string;
  model: string;
  timeoutMs: number;
}

const JSON_HEADERS = { 'content-type': 'application/json' };

export function messagesToPrompt(messages: ChatMessage[]): string {
  return messages.map(m => `${m.role.toUpperCase()}: ${m.content}`).join('\n');
}

export function buildOllamaProvider(cfg: OllamaProviderConfig): LLMClient {
  return {
    provider: 'ollama',

    async chat({ model, messages, options = {} }) {
      const body = {
        model: model || cfg.model,
        prompt: messagesToPrompt(messages),
        stream: false,
        options: { temperature: options.temperature, num_predict: options.max_tokens },
      };
      const response = await abortableFetch(
        `${cfg.host}/api/generate`,
        { method: 'POST', headers: JSON_HEADERS, body: JSON.stringify(body) },
        cfg.timeoutMs,
      );
      if (!response.ok) {
        const text = await readErrorBody(response);
        throw new Error(`Ollama API error: ${response.status} ${text}`);
      }
      const json: unknown = await response.json();
      return { message: { role: 'assistant', content: pickGenerateText(json) } };
    },

    async ping() {
      try {
        const response = await withTimeout(fetch(`${cfg.host}/api/tags`, { headers: JSON_HEADERS }), 1500);
        return response.ok;
      } catch { return false; }
    },
  };
}
