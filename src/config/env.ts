// src/config/env.ts
import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

/** bool parser: accepts true/false and common string variants */
const bool = z
  .union([z.boolean(), z.string()])
  .transform(v => (typeof v === 'string' ? ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase()) : v));

/** URL validator that only allows http/https */
const Url = z
  .string()
  .refine((s) => {
    try {
      const u = new URL(s);
      return ['http:', 'https:'].includes(u.protocol);
    } catch {
      return false;
    }
  }, { message: 'Invalid URL' });

/** trims optional quotes around values copied from dashboards */
function cleanQuoted(s?: string) {
  if (!s) return s;
  return s.trim().replace(/^['"]|['"]$/g, '');
}

/** empty strings in .env mean "unset" */
const optionalString = z
  .string()
  .optional()
  .transform(v => cleanQuoted(v) || undefined);

const schema = z.object({
  // ── Runtime basics ──────────────────────────────────────────────────────────
  NODE_ENV: z.enum(['production', 'staging', 'development', 'test']).default('development'),
  // read directly by src/logger.ts, validated here
  LOG_LEVEL: optionalString.pipe(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()),
  LOG_TO_FILE: optionalString,
  PORT: z.coerce.number().int().positive().max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  ALLOWED_ORIGINS: optionalString,
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),

  // ── LLM provider ────────────────────────────────────────────────────────────
  LLM_PROVIDER: z.string().default('openai'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o'),
  OPENAI_BASE: z.string().transform(v => cleanQuoted(v) ?? v).pipe(Url).default('https://api.openai.com'),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  OLLAMA_HOST: z.string().transform(v => cleanQuoted(v) ?? v).pipe(Url).default('http://127.0.0.1:11434'),
  OLLAMA_MODEL: z.string().default('llama3.1'),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),

  // ── Pipeline stages ─────────────────────────────────────────────────────────
  TAG_MODEL: optionalString,
  REPLY_MODEL: optionalString,
  REBUTTAL_MODEL: optionalString,
  EVALUATION_MODEL: optionalString,
  REPLY_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  REPLY_MAX_TOKENS: z.coerce.number().int().positive().default(400),
  ENABLE_REBUTTAL: bool.default(true),
  ENABLE_EVALUATION: bool.default(true),
  PROMPTS_DIR: z.string().default('prompts'),
  STRATEGIES_PATH: z.string().default('data/strategies.json'),

  // ── Records ─────────────────────────────────────────────────────────────────
  RECORDS_DB_PATH: z.string().default('data/records.sqlite'),
  CSV_MIRROR_PATH: optionalString,
  REMOTE_STORE_URL: optionalString,
  REMOTE_STORE_TOKEN: optionalString,
  REMOTE_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // ── Sessions ────────────────────────────────────────────────────────────────
  SESSION_TTL_MS: z.coerce.number().int().positive().default(2 * 60 * 60 * 1000),
})
.transform((v) => {
  // ── CORS set (defaults + additional from env)
  const cors = new Set<string>([
    'http://localhost:3000', 'http://127.0.0.1:3000',
    'http://localhost:5173', 'http://127.0.0.1:5173',
  ]);
  if (v.ALLOWED_ORIGINS) {
    v.ALLOWED_ORIGINS.split(',')
      .map(s => s.trim())
      .filter(Boolean)
      .forEach(s => cors.add(s));
  }

  const raw = v.LLM_PROVIDER.trim().toLowerCase();
  const provider: 'openai' | 'ollama' = raw === '0' || raw === 'ollama' ? 'ollama' : 'openai';
  const defaultModel = provider === 'openai' ? v.OPENAI_MODEL : v.OLLAMA_MODEL;
  const trim = (s: string) => s.replace(/\/+$/, '');

  return {
    nodeEnv: v.NODE_ENV,
    port: v.PORT,
    host: v.HOST,
    cors: Array.from(cors),
    rateLimitMax: v.RATE_LIMIT_MAX,
    ai: {
      provider,
      openai: {
        apiKey: v.OPENAI_API_KEY,
        model: v.OPENAI_MODEL,
        baseUrl: trim(v.OPENAI_BASE),
        timeoutMs: v.OPENAI_TIMEOUT_MS,
      },
      ollama: {
        host: trim(v.OLLAMA_HOST),
        model: v.OLLAMA_MODEL,
        timeoutMs: v.OLLAMA_TIMEOUT_MS,
      },
    },
    pipeline: {
      models: {
        tags: v.TAG_MODEL ?? defaultModel,
        reply: v.REPLY_MODEL ?? defaultModel,
        rebuttal: v.REBUTTAL_MODEL ?? defaultModel,
        evaluation: v.EVALUATION_MODEL ?? defaultModel,
      },
      replyTemperature: v.REPLY_TEMPERATURE,
      replyMaxTokens: v.REPLY_MAX_TOKENS,
      enableRebuttal: v.ENABLE_REBUTTAL,
      enableEvaluation: v.ENABLE_EVALUATION,
      promptsDir: path.resolve(v.PROMPTS_DIR),
      strategiesPath: path.resolve(v.STRATEGIES_PATH),
    },
    records: {
      dbPath: v.RECORDS_DB_PATH === ':memory:' ? v.RECORDS_DB_PATH : path.resolve(v.RECORDS_DB_PATH),
      csvMirrorPath: v.CSV_MIRROR_PATH ? path.resolve(v.CSV_MIRROR_PATH) : undefined,
      remote: {
        url: v.REMOTE_STORE_URL ? trim(v.REMOTE_STORE_URL) : undefined,
        token: v.REMOTE_STORE_TOKEN,
        timeoutMs: v.REMOTE_STORE_TIMEOUT_MS,
      },
    },
    sessions: {
      ttlMs: v.SESSION_TTL_MS,
    },
  } as const;
});

export type AppConfig = z.output<typeof schema>;

/** Parse an env-like record. Throws a ZodError on invalid values. */
export function parseEnv(source: Record<string, string | undefined>): AppConfig {
  return schema.parse(source);
}

/** Boot helper: validate process.env or exit with the flattened field errors. */
export function loadEnv(): AppConfig {
  const parsed = schema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid env:', parsed.error.flatten().fieldErrors);
    process.exit(1);
  }
  return parsed.data;
}
