import { z } from 'zod';

// ─── Defaults ────────────────────────────────────────────────────────

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MODEL = 'openai/gpt-4o';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5-20250929';

// ─── Shape ───────────────────────────────────────────────────────────

export type ProviderName = 'openai-compatible' | 'anthropic';

/** Which model each stage of the interview talks to. */
export interface StageModels {
  classifier: string;
  hallucination: string;
  grader: string;
  interviewer: string;
  report: string;
}

export interface LLMSettings {
  provider: ProviderName;
  api_key: string;
  base_url: string;
  max_tokens: number;
  timeout_ms: number;
  max_attempts: number;
}

export interface AppConfig {
  llm: LLMSettings;
  models: StageModels;
  session: {
    default_difficulty: number;
    transcripts_dir: string;
    /** How long a finished session stays reachable over HTTP */
    finished_retention_ms: number;
  };
  server: {
    port: number;
    allowed_origins: string[];
    max_create_body_bytes: number;
    max_message_body_bytes: number;
  };
}

// ─── Parsing ─────────────────────────────────────────────────────────

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(['openai-compatible', 'anthropic']).optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  MODEL_DEFAULT: z.string().min(1).optional(),
  MODEL_CLASSIFIER: z.string().min(1).optional(),
  MODEL_HALLUCINATION: z.string().min(1).optional(),
  MODEL_GRADER: z.string().min(1).optional(),
  MODEL_INTERVIEWER: z.string().min(1).optional(),
  MODEL_REPORT: z.string().min(1).optional(),
  LLM_MAX_TOKENS: z.string().optional(),
  LLM_TIMEOUT_MS: z.string().optional(),
  LLM_MAX_ATTEMPTS: z.string().optional(),
  DEFAULT_DIFFICULTY: z.coerce.number().int().min(1).max(5).optional(),
  TRANSCRIPTS_DIR: z.string().min(1).optional(),
  PORT: z.string().optional(),
  ALLOWED_ORIGINS: z.string().optional(),
  SESSION_RETENTION_MS: z.string().optional(),
  MAX_CREATE_SESSION_BODY_BYTES: z.string().optional(),
  MAX_MESSAGE_BODY_BYTES: z.string().optional(),
});

/**
 * Build the application configuration from environment variables.
 *
 * Throws when a value is present but invalid (an unknown provider, a
 * difficulty outside 1-5). Numeric tuning knobs that do not parse fall back
 * to their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const vars = result.data;

  const provider: ProviderName = vars.LLM_PROVIDER
    ?? (vars.ANTHROPIC_API_KEY && !vars.LLM_API_KEY ? 'anthropic' : 'openai-compatible');

  const fallbackModel = vars.MODEL_DEFAULT
    ?? (provider === 'anthropic' ? DEFAULT_ANTHROPIC_MODEL : DEFAULT_MODEL);

  const config: AppConfig = {
    llm: {
      provider,
      api_key: (provider === 'anthropic' ? vars.ANTHROPIC_API_KEY : vars.LLM_API_KEY) ?? '',
      base_url: (vars.LLM_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/$/, ''),
      max_tokens: parsePositiveInt(vars.LLM_MAX_TOKENS, 2048),
      timeout_ms: parsePositiveInt(vars.LLM_TIMEOUT_MS, 60_000),
      max_attempts: parsePositiveInt(vars.LLM_MAX_ATTEMPTS, 2),
    },
    models: {
      classifier: vars.MODEL_CLASSIFIER ?? fallbackModel,
      hallucination: vars.MODEL_HALLUCINATION ?? fallbackModel,
      grader: vars.MODEL_GRADER ?? fallbackModel,
      interviewer: vars.MODEL_INTERVIEWER ?? fallbackModel,
      report: vars.MODEL_REPORT ?? fallbackModel,
    },
    session: {
      default_difficulty: vars.DEFAULT_DIFFICULTY ?? 2,
      transcripts_dir: vars.TRANSCRIPTS_DIR ?? 'logs',
      finished_retention_ms: parsePositiveInt(vars.SESSION_RETENTION_MS, 30 * 60_000),
    },
    server: {
      port: parsePositiveInt(vars.PORT, 3001),
      allowed_origins: vars.ALLOWED_ORIGINS
        ? vars.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
        : ['http://localhost:5173'],
      max_create_body_bytes: parsePositiveInt(vars.MAX_CREATE_SESSION_BODY_BYTES, 20_000),
      max_message_body_bytes: parsePositiveInt(vars.MAX_MESSAGE_BODY_BYTES, 60_000),
    },
  };

  return Object.freeze(config);
}
