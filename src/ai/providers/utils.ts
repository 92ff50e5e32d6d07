// src/ai/providers/utils.ts
export function withTimeout<T>(promise: Promise<T>, ms: number, label = 'timeout'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error(label)), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function abortableFetch(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  return fetch(url, { ...init, signal: controller.signal }).finally(() => clearTimeout(timeout));
}

/** Read an error body for diagnostics without letting a second failure mask the first. */
export async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch {
    return '';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** choices[0].message.content of an OpenAI-style completion, or '' */
export function pickCompletionText(json: unknown): string {
  if (!isRecord(json) || !Array.isArray(json.choices)) return '';
  const first: unknown = json.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return '';
  const content = first.message.content;
  return typeof content === 'string' ? content : '';
}

/** `response` of an Ollama /api/generate body, or '' */
export function pickGenerateText(json: unknown): string {
  if (!isRecord(json)) return '';
  return typeof json.response === 'string' ? json.response : '';
}
