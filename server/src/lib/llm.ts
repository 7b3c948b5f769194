import { AnthropicProvider, OpenAICompatibleProvider, createCombinedAbortSignal } from './llm-provider.js';
import type { LLMProvider } from './llm-provider.js';
import type { LLMSettings } from './config.js';
import { withRetry } from './retry.js';
import logger from './logger.js';

// ─── Provider factory ────────────────────────────────────────────────

export function createProvider(settings: LLMSettings): LLMProvider {
  if (settings.provider === 'anthropic') {
    return new AnthropicProvider(settings.api_key);
  }
  return new OpenAICompatibleProvider({ apiKey: settings.api_key, baseUrl: settings.base_url });
}

// ─── Invocation ──────────────────────────────────────────────────────

export interface InvokeParams {
  system: string;
  user: string;
  model: string;
  /** Request structured (JSON object) output */
  json?: boolean;
  max_tokens?: number;
  signal?: AbortSignal;
}

export interface InvokeOptions {
  max_tokens: number;
  timeout_ms: number;
  max_attempts: number;
  /** Base delay for retry backoff; tests shrink it */
  retry_base_delay_ms?: number;
}

/**
 * Stateless gateway every stage talks through: one system prompt, one user
 * turn, text back. Applies a per-attempt timeout and retries transient
 * failures; anything else propagates to the calling stage, which owns the
 * fallback.
 */
export class LanguageModel {
  constructor(
    readonly provider: LLMProvider,
    private readonly options: InvokeOptions,
  ) {}

  static fromSettings(settings: LLMSettings): LanguageModel {
    return new LanguageModel(createProvider(settings), {
      max_tokens: settings.max_tokens,
      timeout_ms: settings.timeout_ms,
      max_attempts: settings.max_attempts,
    });
  }

  async invoke(params: InvokeParams): Promise<string> {
    return withRetry(
      async () => {
        const { signal, cleanup } = createCombinedAbortSignal(params.signal, this.options.timeout_ms);
        try {
          const response = await this.provider.chat({
            model: params.model,
            system: params.system,
            messages: [{ role: 'user', content: params.user }],
            max_tokens: params.max_tokens ?? this.options.max_tokens,
            json: params.json,
            signal,
          });
          return response.text.trim();
        } finally {
          cleanup();
        }
      },
      {
        maxAttempts: this.options.max_attempts,
        baseDelay: this.options.retry_base_delay_ms,
        onRetry: (attempt, error) => {
          logger.warn({ attempt, model: params.model, error: error.message }, 'Retrying LLM call');
        },
      },
    );
  }
}
