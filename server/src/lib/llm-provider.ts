import Anthropic from '@anthropic-ai/sdk';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  /** Ask the provider for a JSON object response where it supports it */
  json?: boolean;
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

/**
 * Combine the caller's signal with a timeout. The returned cleanup must run
 * once the request settles so the timer does not keep the process alive.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    combinedController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!combinedController.signal.aborted) {
      combinedController.abort(callerSignal?.reason);
    }
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly apiKey: string) {}

  /**
   * Lazily create the SDK client so sessions can be constructed in test/dev
   * environments even when credentials are not configured.
   */
  private getClient(): Anthropic {
    if (!this.apiKey) {
      throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = this.getClient();
    // No native JSON mode: the instruction rides along with the system prompt.
    const system = params.json
      ? `${params.system}\n\nRespond with a single JSON object and nothing else.`
      : params.system;

    const response = await anthropic.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        system,
        messages: params.messages,
      },
      { signal: params.signal },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider (OpenRouter and friends) ─────────────

interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai-compatible';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    if (!this.apiKey) {
      throw new Error('LLM_API_KEY environment variable is required when LLM_PROVIDER=openai-compatible');
    }

    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [
        { role: 'system', content: params.system },
        ...params.messages,
      ],
    };
    if (params.json) {
      body.response_format = { type: 'json_object' };
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: params.signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      const err = new Error(`LLM API error ${response.status}: ${errText.slice(0, 500)}`);
      throw Object.assign(err, { status: response.status, headers: response.headers });
    }

    const data = await response.json() as OpenAIChatResponse;
    return {
      text: data.choices?.[0]?.message?.content ?? '',
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible type definitions (internal) ───────────────────

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}
