// src/ai/types.ts
export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  max_tokens?: number;
}

export interface ChatResponse {
  message: {
    role: 'assistant';
    content: string;
  };
}

export interface ChatRequest {
  model?: string;
  messages: ChatMessage[];
  options?: ChatOptions;
}

export type ProviderName = 'openai' | 'ollama';

export interface LLMClient {
  readonly provider: ProviderName;
  chat(args: ChatRequest): Promise<ChatResponse>;
  ping?(): Promise<boolean>;
}
