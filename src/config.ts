import { z } from 'zod';

const DEFAULT_LLM_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_LLM_MODEL = 'mistralai/mistral-small-3.2-24b-instruct:free';
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(3000),
  DATA_DIR: z.string().min(1).default('.data'),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default(DEFAULT_LLM_BASE_URL),
  LLM_MODEL: z.string().min(1).default(DEFAULT_LLM_MODEL),
  LLM_TIMEOUT_MS: positiveInt(60_000),
  LLM_MAX_TOKENS: positiveInt(4000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  FETCH_TIMEOUT_MS: positiveInt(15_000),
  FETCH_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  PROMPT_MAX_JOB_CHARS: positiveInt(6000),
  PROMPT_MAX_RESUME_CHARS: positiveInt(6000),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  UPLOAD_MAX_BYTES: positiveInt(5 * 1024 * 1024),
});

export type AppConfig = {
  port: number;
  dataDir: string;
  llm: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
    maxTokens: number;
    temperature: number;
  };
  fetch: {
    timeoutMs: number;
    userAgent: string;
  };
  prompt: {
    maxJobChars: number;
    maxResumeChars: number;
  };
  retry: {
    backoffMs: number;
  };
  upload: {
    maxBytes: number;
  };
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  // Empty strings in .env mean "unset".
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(defined);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;

  return {
    port: parsed.PORT,
    dataDir: parsed.DATA_DIR,
    llm: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.LLM_BASE_URL,
      model: parsed.LLM_MODEL,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
      maxTokens: parsed.LLM_MAX_TOKENS,
      temperature: parsed.LLM_TEMPERATURE,
    },
    fetch: {
      timeoutMs: parsed.FETCH_TIMEOUT_MS,
      userAgent: parsed.FETCH_USER_AGENT,
    },
    prompt: {
      maxJobChars: parsed.PROMPT_MAX_JOB_CHARS,
      maxResumeChars: parsed.PROMPT_MAX_RESUME_CHARS,
    },
    retry: {
      backoffMs: parsed.RETRY_BACKOFF_MS,
    },
    upload: {
      maxBytes: parsed.UPLOAD_MAX_BYTES,
    },
  };
};
