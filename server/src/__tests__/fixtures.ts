import { vi } from 'vitest';
import { LanguageModel } from '../lib/llm.js';
import type { ChatParams, ChatResponse, LLMProvider } from '../lib/llm-provider.js';
import type { AppConfig, StageModels } from '../lib/config.js';
import {
  CLASSIFIER_SYSTEM_PROMPT,
  GRADER_SYSTEM_PROMPT,
  HALLUCINATION_SYSTEM_PROMPT,
  INTERVIEWER_SYSTEM_PROMPT,
  REPORT_SYSTEM_PROMPT,
} from '../agents/prompts.js';
import type {
  CandidateProfile,
  ClassificationResult,
  Directive,
  HallucinationResult,
  SessionSnapshot,
} from '../agents/types.js';

// ─── Fixture Factories ────────────────────────────────────────────────────────

export const TEST_MODELS: StageModels = {
  classifier: 'mock-classifier',
  hallucination: 'mock-hallucination',
  grader: 'mock-grader',
  interviewer: 'mock-interviewer',
  report: 'mock-report',
};

export function makeConfig(transcriptsDir = 'logs'): AppConfig {
  return {
    llm: {
      provider: 'openai-compatible',
      api_key: 'test-secret',
      base_url: 'http://llm.test/v1',
      max_tokens: 100,
      timeout_ms: 1000,
      max_attempts: 1,
    },
    models: TEST_MODELS,
    session: { default_difficulty: 2, transcripts_dir: transcriptsDir, finished_retention_ms: 60_000 },
    server: {
      port: 3001,
      allowed_origins: ['http://localhost:5173'],
      max_create_body_bytes: 20_000,
      max_message_body_bytes: 60_000,
    },
  };
}

export function makeProfile(overrides: Partial<CandidateProfile> = {}): CandidateProfile {
  return {
    name: 'Alex',
    role: 'Backend Developer',
    grade_target: 'Junior',
    experience: 'Two years of Django and PostgreSQL',
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    profile: makeProfile(),
    turns: [],
    topics: {},
    difficulty: 2,
    current_topic: null,
    last_questions: [],
    known_facts: [],
    flags: { off_topic_count: 0, hallucination_count: 0, questions_asked_count: 0 },
    soft_scores: [],
    is_finished: false,
    final_report: null,
    ...overrides,
  };
}

export function makeClassification(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return { category: 'ANSWER', entities: [], confidence: 0.9, rationale: 'answers the question', ...overrides };
}

export function makeHallucination(overrides: Partial<HallucinationResult> = {}): HallucinationResult {
  return {
    is_hallucination: false,
    claim: null,
    correction: null,
    confidence: 0.9,
    rationale: 'nothing false stated',
    ...overrides,
  };
}

export function makeDirective(overrides: Partial<Directive> = {}): Directive {
  return {
    input_category: 'ANSWER',
    detected_issue: null,
    is_hallucination: false,
    hallucination_correction: null,
    candidate_question: null,
    next_action: 'ASK',
    next_topic: 'python_basics',
    difficulty_delta: 0,
    question_blueprint: 'Topic: python_basics; Question: What is a tuple?',
    do_not_ask: [],
    answer_score: 0.6,
    gaps_found: [],
    correct_answer: null,
    soft_signals: { clarity: 0.5, honesty: 0.5, engagement: 0.5 },
    facts_learned: [],
    reasoning: { entries: [] },
    ...overrides,
  };
}

// ─── Language model stand-ins ─────────────────────────────────────────────────

export function makeLLMResponse(data: unknown): ChatResponse {
  return {
    text: typeof data === 'string' ? data : JSON.stringify(data),
    usage: { input_tokens: 0, output_tokens: 0 },
  };
}

export function makeLLM(chat: LLMProvider['chat']): LanguageModel {
  return new LanguageModel({ name: 'mock', chat }, { max_tokens: 100, timeout_ms: 1000, max_attempts: 1 });
}

export type StageName = 'classifier' | 'hallucination' | 'grader' | 'interviewer' | 'report';

/** A queued reply: model text, a JSON value, or an error to throw. */
export type ScriptedReply = string | Record<string, unknown> | Error;

const STAGE_BY_PROMPT = new Map<string, StageName>([
  [CLASSIFIER_SYSTEM_PROMPT, 'classifier'],
  [HALLUCINATION_SYSTEM_PROMPT, 'hallucination'],
  [GRADER_SYSTEM_PROMPT, 'grader'],
  [INTERVIEWER_SYSTEM_PROMPT, 'interviewer'],
  [REPORT_SYSTEM_PROMPT, 'report'],
]);

/**
 * Provider that answers each stage from its own queue, told apart by the
 * system prompt. An exhausted queue throws.
 */
export function scriptedProvider(script: Partial<Record<StageName, ScriptedReply[]>>) {
  const queues = new Map<StageName, ScriptedReply[]>();
  for (const stage of STAGE_BY_PROMPT.values()) {
    const replies = script[stage];
    if (replies) queues.set(stage, [...replies]);
  }

  const calls: Array<{ stage: StageName; params: ChatParams }> = [];
  const chat = vi.fn(async (params: ChatParams): Promise<ChatResponse> => {
    const stage = STAGE_BY_PROMPT.get(params.system);
    if (!stage) throw new Error('unexpected system prompt');
    calls.push({ stage, params });
    const reply = queues.get(stage)?.shift();
    if (reply === undefined) throw new Error(`no scripted reply left for ${stage}`);
    if (reply instanceof Error) throw reply;
    return makeLLMResponse(reply);
  });

  return { provider: { name: 'scripted', chat } satisfies LLMProvider, chat, calls };
}

export function scriptedLLM(script: Partial<Record<StageName, ScriptedReply[]>>) {
  const scripted = scriptedProvider(script);
  return { llm: makeLLM(scripted.chat), ...scripted };
}
