/**
 * Shared type definitions for the interview pipeline.
 *
 * Stage A (classifier, hallucination guard) and Stage B (grader/planner)
 * are functions over a read-only session snapshot; nothing here is shared
 * mutable state. Field names are snake_case because the same shapes cross
 * the model boundary and land in the persisted transcript.
 */

// ─── Closed sets ─────────────────────────────────────────────────────

export const INPUT_CATEGORIES = ['GREETING', 'ANSWER', 'CANDIDATE_QUESTION', 'OFF_TOPIC', 'STOP'] as const;
export type InputCategory = typeof INPUT_CATEGORIES[number];

export const NEXT_ACTIONS = [
  'ASK',
  'FOLLOW_UP',
  'GIVE_HINT',
  'ANSWER_CANDIDATE',
  'CORRECT_HALLUCINATION',
  'REDIRECT',
  'WRAP_UP',
] as const;
export type NextAction = typeof NEXT_ACTIONS[number];

export type DifficultyDelta = -1 | 0 | 1;

export const GRADES = ['Junior', 'Middle', 'Senior'] as const;
export type Grade = typeof GRADES[number];

/** Answers at or above this score count as "good" and need no gap write-up */
export const GOOD_SCORE_THRESHOLD = 0.7;

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 5;

/** How many recent question blueprints must not be repeated */
export const LAST_QUESTIONS_WINDOW = 5;

// ─── Participant ─────────────────────────────────────────────────────

export interface CandidateProfile {
  readonly name: string;
  /** Position, e.g. 'Backend Developer' */
  readonly role: string;
  readonly grade_target: Grade;
  /** Free-form background */
  readonly experience: string;
}

// ─── Aggregates ──────────────────────────────────────────────────────

export interface TopicScore {
  asked_count: number;
  total_score: number;
  last_score: number;
  gaps: string[];
  correct_answers: string[];
}

/** Frozen view of a TopicScore, as stages see it */
export interface TopicScoreView {
  readonly asked_count: number;
  readonly total_score: number;
  readonly last_score: number;
  readonly gaps: readonly string[];
  readonly correct_answers: readonly string[];
}

export interface SoftSignals {
  readonly clarity: number;
  readonly honesty: number;
  readonly engagement: number;
}

export interface InterviewFlags {
  off_topic_count: number;
  hallucination_count: number;
  questions_asked_count: number;
}

// ─── Stage A ─────────────────────────────────────────────────────────

export interface ClassificationResult {
  category: InputCategory;
  entities: string[];
  confidence: number;
  rationale: string;
}

export interface HallucinationResult {
  is_hallucination: boolean;
  claim: string | null;
  correction: string | null;
  confidence: number;
  rationale: string;
}

/**
 * What a stage hands back: either the model's parsed answer or the
 * deterministic fallback together with the reason it was needed.
 */
export type StageOutcome<T> =
  | { kind: 'parsed'; value: T }
  | { kind: 'fallback'; value: T; reason: string };

// ─── Reasoning trace ─────────────────────────────────────────────────

export type TraceSource = 'classifier' | 'hallucination_guard' | 'grader_planner' | 'difficulty_adapter';

export interface TraceEntry {
  readonly source: TraceSource;
  readonly message: string;
  readonly fallback?: boolean;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface ReasoningTrace {
  readonly entries: readonly TraceEntry[];
}

// ─── Directive ───────────────────────────────────────────────────────

export interface Directive {
  readonly input_category: InputCategory;
  readonly detected_issue: string | null;
  readonly is_hallucination: boolean;
  readonly hallucination_correction: string | null;
  /** The participant's own question, when they asked one */
  readonly candidate_question: string | null;
  readonly next_action: NextAction;
  readonly next_topic: string | null;
  readonly difficulty_delta: DifficultyDelta;
  /** Free text: topic, focus and example phrasing. Never structured. */
  readonly question_blueprint: string | null;
  readonly do_not_ask: readonly string[];
  /** Null unless the message was an answer */
  readonly answer_score: number | null;
  readonly gaps_found: readonly string[];
  readonly correct_answer: string | null;
  readonly soft_signals: SoftSignals;
  /** New facts the participant volunteered about themselves */
  readonly facts_learned: readonly string[];
  readonly reasoning: ReasoningTrace;
}

// ─── Session ─────────────────────────────────────────────────────────

export interface Turn {
  readonly turn_id: number;
  readonly agent_visible_message: string;
  readonly user_message: string;
  readonly internal_thoughts: string;
  readonly topic: string | null;
  readonly score: number | null;
}

export type SessionPhase =
  | 'AWAITING_INPUT'
  | 'ANALYZING'
  | 'RESPONDING'
  | 'LOGGED'
  | 'TERMINATED'
  | 'REPORTING'
  | 'DONE';

/** Read-only view of session state handed to every stage. */
export interface SessionSnapshot {
  readonly profile: CandidateProfile;
  readonly turns: readonly Turn[];
  readonly topics: Readonly<Record<string, TopicScoreView>>;
  readonly difficulty: number;
  readonly current_topic: string | null;
  readonly last_questions: readonly string[];
  readonly known_facts: readonly string[];
  readonly flags: Readonly<InterviewFlags>;
  readonly soft_scores: readonly SoftSignals[];
  readonly is_finished: boolean;
  readonly final_report: string | null;
}

// ─── Persisted transcript ────────────────────────────────────────────

export interface TranscriptTurn {
  turn_id: number;
  agent_visible_message: string;
  user_message: string;
  internal_thoughts: string;
}

export interface Transcript {
  participant_name: string;
  turns: TranscriptTurn[];
  final_feedback: string | null;
}
