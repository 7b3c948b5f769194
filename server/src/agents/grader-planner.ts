/**
 * Stage B: Grader/Planner
 *
 * Starts only once both Stage A results exist. Scores answers, rates soft
 * signals and proposes the next action and question blueprint. The model's
 * proposal is then run through a fixed priority table, so a STOP always
 * wraps up and a flagged hallucination always gets corrected regardless of
 * what the model suggested.
 *
 * Difficulty is not decided here: the directive leaves with delta 0 and
 * the Difficulty Adapter owns the change.
 */

import type { LanguageModel } from '../lib/llm.js';
import { GRADER_SYSTEM_PROMPT } from './prompts.js';
import { GraderOutputSchema } from './schemas/analysis-schemas.js';
import type { GraderOutput } from './schemas/analysis-schemas.js';
import { answerScores, contextSummary, conversationHistory, requestJson } from './stage.js';
import { getTopicsForRole, normalizeBlueprint, suggestBlueprint } from './knowledge/question-bank.js';
import { GOOD_SCORE_THRESHOLD, LAST_QUESTIONS_WINDOW, NEXT_ACTIONS } from './types.js';
import type {
  ClassificationResult,
  Directive,
  HallucinationResult,
  InputCategory,
  NextAction,
  SessionSnapshot,
  SoftSignals,
  StageOutcome,
  TraceEntry,
} from './types.js';

export const NEUTRAL_SOFT_SIGNALS: SoftSignals = Object.freeze({ clarity: 0.5, honesty: 0.5, engagement: 0.5 });

/** Score given to an answer when the grader could not produce one */
export const NEUTRAL_SCORE = 0.5;

const ACTION_ALIASES: Record<string, NextAction> = {
  REDIRECT_TO_INTERVIEW: 'REDIRECT',
  HINT: 'GIVE_HINT',
  FOLLOWUP: 'FOLLOW_UP',
  ASK_QUESTION: 'ASK',
  ANSWER_QUESTION: 'ANSWER_CANDIDATE',
  CORRECT: 'CORRECT_HALLUCINATION',
  END: 'WRAP_UP',
  STOP: 'WRAP_UP',
};

export function normalizeAction(raw: string | null): NextAction | null {
  if (!raw) return null;
  const key = raw.trim().toUpperCase().replace(/[\s-]+/g, '_');
  return NEXT_ACTIONS.find((a) => a === key) ?? ACTION_ALIASES[key] ?? null;
}

/**
 * Priority table, first match wins. Only ASK, FOLLOW_UP and GIVE_HINT are
 * taken from the proposal; anything else falls back to ASK.
 */
export function decideAction(
  category: InputCategory,
  isHallucination: boolean,
  proposed: NextAction | null,
): NextAction {
  if (category === 'STOP') return 'WRAP_UP';
  if (isHallucination) return 'CORRECT_HALLUCINATION';
  if (category === 'CANDIDATE_QUESTION') return 'ANSWER_CANDIDATE';
  if (category === 'OFF_TOPIC') return 'REDIRECT';
  if (category === 'GREETING') return 'ASK';
  if (proposed === 'ASK' || proposed === 'FOLLOW_UP' || proposed === 'GIVE_HINT') return proposed;
  return 'ASK';
}

const BLUEPRINT_KEY_ORDER = ['topic', 'focus', 'question', 'example'] as const;

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function stringifyValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Flatten a structured blueprint into one string:
 * "Topic: ...; Focus: ...; Question: ...; Example: ...; other: ...".
 */
export function flattenBlueprint(raw: string | Record<string, unknown> | null): string | null {
  if (raw === null) return null;
  if (typeof raw === 'string') return raw.trim() || null;

  const parts: string[] = [];
  for (const key of BLUEPRINT_KEY_ORDER) {
    if (raw[key] != null) parts.push(`${capitalize(key)}: ${stringifyValue(raw[key])}`);
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!BLUEPRINT_KEY_ORDER.some((k) => k === key) && value != null) {
      parts.push(`${key}: ${stringifyValue(value)}`);
    }
  }
  return parts.length > 0 ? parts.join('; ') : null;
}

function dedupe(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = normalizeBlueprint(item);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

function recentBlueprints(snapshot: SessionSnapshot): string[] {
  return snapshot.last_questions.slice(-LAST_QUESTIONS_WINDOW);
}

function defaultTopic(snapshot: SessionSnapshot): string | null {
  return snapshot.current_topic ?? getTopicsForRole(snapshot.profile.role, snapshot.profile.grade_target)[0] ?? null;
}

function bankBlueprint(snapshot: SessionSnapshot) {
  return suggestBlueprint({
    role: snapshot.profile.role,
    grade: snapshot.profile.grade_target,
    difficulty: snapshot.difficulty,
    covered_topics: Object.keys(snapshot.topics),
    avoid: recentBlueprints(snapshot),
  });
}

/**
 * Deterministic directive built only from the Stage A results, used when
 * the grader is unreachable or its output is unusable.
 */
export function fallbackDirective(
  snapshot: SessionSnapshot,
  message: string,
  classification: ClassificationResult,
  hallucination: HallucinationResult,
  reason: string,
): Directive {
  const category = classification.category;
  const next_action = decideAction(category, hallucination.is_hallucination, null);
  const suggestion = next_action === 'ASK' ? bankBlueprint(snapshot) : null;

  const directive: Directive = {
    input_category: category,
    detected_issue: hallucination.is_hallucination ? hallucination.claim : null,
    is_hallucination: hallucination.is_hallucination,
    hallucination_correction: hallucination.correction,
    candidate_question: category === 'CANDIDATE_QUESTION' ? message.trim() || null : null,
    next_action,
    next_topic: suggestion?.topic ?? defaultTopic(snapshot),
    difficulty_delta: 0,
    question_blueprint: suggestion?.blueprint ?? null,
    do_not_ask: recentBlueprints(snapshot),
    answer_score: category === 'ANSWER' ? NEUTRAL_SCORE : null,
    gaps_found: [],
    correct_answer: null,
    soft_signals: NEUTRAL_SOFT_SIGNALS,
    facts_learned: [],
    reasoning: {
      entries: [{
        source: 'grader_planner',
        message: `[Fallback] ${reason}; action ${next_action} derived from classification`,
        fallback: true,
      }],
    },
  };
  return Object.freeze(directive);
}

export class GraderPlanner {
  constructor(
    private readonly llm: LanguageModel,
    private readonly model: string,
  ) {}

  async plan(
    snapshot: SessionSnapshot,
    message: string,
    classification: ClassificationResult,
    hallucination: HallucinationResult,
    signal?: AbortSignal,
  ): Promise<StageOutcome<Directive>> {
    const user = this.buildContext(snapshot, message, classification, hallucination);
    const result = await requestJson(
      this.llm,
      { model: this.model, system: GRADER_SYSTEM_PROMPT, user, signal },
      GraderOutputSchema,
    );
    if (!result.ok) {
      return {
        kind: 'fallback',
        value: fallbackDirective(snapshot, message, classification, hallucination, result.reason),
        reason: result.reason,
      };
    }
    return { kind: 'parsed', value: this.toDirective(snapshot, message, classification, hallucination, result.data) };
  }

  private buildContext(
    snapshot: SessionSnapshot,
    message: string,
    classification: ClassificationResult,
    hallucination: HallucinationResult,
  ): string {
    const lines = [
      '## Classification',
      `- Type: ${classification.category}`,
      `- Entities: ${classification.entities.join(', ') || 'none'}`,
      `- Reasoning: ${classification.rationale}`,
      '',
      '## Hallucination check',
      `- Is hallucination: ${hallucination.is_hallucination}`,
    ];
    if (hallucination.is_hallucination) {
      lines.push(`- Claim: ${hallucination.claim ?? 'unspecified'}`, `- Correction: ${hallucination.correction ?? ''}`);
    }
    lines.push(
      `- Reasoning: ${hallucination.rationale}`,
      '',
      '## Interview context',
      contextSummary(snapshot),
      '',
      '## Recent conversation',
      conversationHistory(snapshot, 5),
      '',
      '## Current message',
      `"${message}"`,
      '',
      '## Recent answer scores',
      JSON.stringify(answerScores(snapshot).slice(-3)),
      '',
      `do_not_ask: ${JSON.stringify(recentBlueprints(snapshot))}`,
    );
    return lines.join('\n');
  }

  private toDirective(
    snapshot: SessionSnapshot,
    message: string,
    classification: ClassificationResult,
    hallucination: HallucinationResult,
    data: GraderOutput,
  ): Directive {
    const category = classification.category;
    const notes: TraceEntry[] = [];
    const note = (text: string, extra?: Record<string, unknown>) => {
      notes.push({ source: 'grader_planner', message: text, ...(extra ? { data: extra } : {}) });
    };

    const proposed = normalizeAction(data.next_action);
    const next_action = decideAction(category, hallucination.is_hallucination, proposed);
    if (proposed !== null && proposed !== next_action) {
      note(`proposed ${proposed} overridden by priority table: ${next_action}`, { proposed, action: next_action });
    }

    let answer_score: number | null = null;
    let gaps_found = [...data.gaps_found];
    let correct_answer = data.correct_answer_for_gaps;
    if (category === 'ANSWER') {
      if (data.answer_score === null) {
        answer_score = NEUTRAL_SCORE;
        note(`answer score missing, using ${NEUTRAL_SCORE}`);
      } else {
        answer_score = data.answer_score;
      }
      if (answer_score < GOOD_SCORE_THRESHOLD) {
        if (gaps_found.length === 0) {
          gaps_found = [data.detected_issue ?? 'Answer below the expected level; gaps not itemized'];
          note('gaps missing for a weak answer, placeholder recorded');
        }
        if (!correct_answer) {
          correct_answer = data.detected_issue
            ? `Revisit: ${data.detected_issue}`
            : 'Review the expected answer for this question';
          note('correct answer missing for a weak answer, placeholder recorded');
        }
      }
    } else {
      gaps_found = [];
      correct_answer = null;
    }

    let next_topic = data.next_topic ?? defaultTopic(snapshot);
    let question_blueprint = flattenBlueprint(data.question_blueprint);
    const recent = recentBlueprints(snapshot);
    const recentKeys = new Set(recent.map(normalizeBlueprint));

    if (question_blueprint && recentKeys.has(normalizeBlueprint(question_blueprint))) {
      const suggestion = bankBlueprint(snapshot);
      note('repeated blueprint replaced', { repeated: question_blueprint, replacement: suggestion?.blueprint ?? null });
      question_blueprint = suggestion?.blueprint ?? null;
      if (suggestion) next_topic = suggestion.topic;
    } else if (!question_blueprint && next_action === 'ASK') {
      const suggestion = bankBlueprint(snapshot);
      if (suggestion) {
        question_blueprint = suggestion.blueprint;
        next_topic = data.next_topic ?? suggestion.topic;
        note('blueprint missing, taken from the question bank', { blueprint: suggestion.blueprint });
      }
    }

    const known = new Set(snapshot.known_facts.map(normalizeBlueprint));
    const facts_learned = dedupe(data.facts_learned).filter((f) => !known.has(normalizeBlueprint(f)));

    const detected_issue = data.detected_issue
      ?? (hallucination.is_hallucination && hallucination.claim ? `False claim: ${hallucination.claim}` : null);

    const candidate_question = category === 'CANDIDATE_QUESTION'
      ? data.candidate_question ?? (message.trim() || null)
      : data.candidate_question;

    const main: TraceEntry = {
      source: 'grader_planner',
      message: data.internal_thoughts || 'no reasoning given',
      data: {
        action: next_action,
        topic: next_topic,
        score: answer_score,
        ...(data.difficulty_delta !== undefined ? { proposed_difficulty_delta: data.difficulty_delta } : {}),
      },
    };

    const directive: Directive = {
      input_category: category,
      detected_issue,
      is_hallucination: hallucination.is_hallucination,
      hallucination_correction: hallucination.correction,
      candidate_question,
      next_action,
      next_topic,
      difficulty_delta: 0,
      question_blueprint,
      do_not_ask: dedupe([...recent, ...data.do_not_ask]),
      answer_score,
      gaps_found,
      correct_answer,
      soft_signals: {
        clarity: data.soft_signals.clarity,
        honesty: data.soft_signals.honesty,
        engagement: data.soft_signals.engagement,
      },
      facts_learned,
      reasoning: { entries: [main, ...notes] },
    };
    return Object.freeze(directive);
  }
}
