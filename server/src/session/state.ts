/**
 * Mutable session state, owned by a single InterviewSession.
 *
 * Every other component sees a deep-frozen SessionSnapshot. Values are
 * clamped where they are written: difficulty to [1, 5], scores and soft
 * signals to [0, 1].
 */

import { LAST_QUESTIONS_WINDOW, MAX_DIFFICULTY, MIN_DIFFICULTY } from '../agents/types.js';
import type {
  CandidateProfile,
  InterviewFlags,
  SessionSnapshot,
  SoftSignals,
  TopicScore,
  TopicScoreView,
  Turn,
} from '../agents/types.js';

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function clampDifficulty(value: number): number {
  if (!Number.isFinite(value)) return MIN_DIFFICULTY;
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, Math.round(value)));
}

function normalizeFact(fact: string): string {
  return fact.trim().toLowerCase().replace(/\s+/g, ' ');
}

export class InterviewState {
  readonly profile: CandidateProfile;
  private readonly turns: Turn[] = [];
  private readonly topics = new Map<string, TopicScore>();
  private difficulty: number;
  private currentTopic: string | null = null;
  private lastQuestions: string[] = [];
  private readonly knownFacts = new Map<string, string>();
  private readonly flags: InterviewFlags = { off_topic_count: 0, hallucination_count: 0, questions_asked_count: 0 };
  private readonly softScores: SoftSignals[] = [];
  private finished = false;
  private finalReport: string | null = null;

  constructor(profile: CandidateProfile, difficulty: number) {
    this.profile = Object.freeze({ ...profile });
    this.difficulty = clampDifficulty(difficulty);
  }

  get turnCount(): number {
    return this.turns.length;
  }

  get currentDifficulty(): number {
    return this.difficulty;
  }

  get topic(): string | null {
    return this.currentTopic;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get report(): string | null {
    return this.finalReport;
  }

  get transcriptTurns(): readonly Turn[] {
    return this.turns;
  }

  /** Lazily creates the topic entry; never replaces it. */
  recordTopicScore(topic: string, score: number, gaps: readonly string[], correctAnswer: string | null): void {
    let entry = this.topics.get(topic);
    if (!entry) {
      entry = { asked_count: 0, total_score: 0, last_score: 0, gaps: [], correct_answers: [] };
      this.topics.set(topic, entry);
    }
    const clamped = clampUnit(score);
    entry.asked_count += 1;
    entry.total_score += clamped;
    entry.last_score = clamped;
    entry.gaps.push(...gaps);
    if (correctAnswer) entry.correct_answers.push(correctAnswer);
  }

  adjustDifficulty(delta: number): number {
    const step = delta > 0 ? 1 : delta < 0 ? -1 : 0;
    this.difficulty = clampDifficulty(this.difficulty + step);
    return this.difficulty;
  }

  setCurrentTopic(topic: string): void {
    this.currentTopic = topic;
  }

  /** Keeps only the most recent blueprints, oldest first. */
  recordQuestion(blueprint: string | null): void {
    this.flags.questions_asked_count += 1;
    if (!blueprint) return;
    this.lastQuestions = [...this.lastQuestions, blueprint].slice(-LAST_QUESTIONS_WINDOW);
  }

  addFacts(facts: readonly string[]): void {
    for (const fact of facts) {
      const key = normalizeFact(fact);
      if (key && !this.knownFacts.has(key)) this.knownFacts.set(key, fact.trim());
    }
  }

  countOffTopic(): void {
    this.flags.off_topic_count += 1;
  }

  countHallucination(): void {
    this.flags.hallucination_count += 1;
  }

  addSoftSignals(signals: SoftSignals): void {
    this.softScores.push(Object.freeze({
      clarity: clampUnit(signals.clarity),
      honesty: clampUnit(signals.honesty),
      engagement: clampUnit(signals.engagement),
    }));
  }

  appendTurn(turn: Omit<Turn, 'turn_id'>): Turn {
    const logged: Turn = Object.freeze({ ...turn, turn_id: this.turns.length + 1 });
    this.turns.push(logged);
    return logged;
  }

  markFinished(): void {
    this.finished = true;
  }

  setFinalReport(report: string): void {
    this.finalReport = report;
  }

  snapshot(): SessionSnapshot {
    const topics: Record<string, TopicScoreView> = {};
    for (const [name, score] of this.topics) {
      topics[name] = Object.freeze({
        ...score,
        gaps: Object.freeze([...score.gaps]),
        correct_answers: Object.freeze([...score.correct_answers]),
      });
    }

    return Object.freeze({
      profile: this.profile,
      turns: Object.freeze([...this.turns]),
      topics: Object.freeze(topics),
      difficulty: this.difficulty,
      current_topic: this.currentTopic,
      last_questions: Object.freeze([...this.lastQuestions]),
      known_facts: Object.freeze([...this.knownFacts.values()]),
      flags: Object.freeze({ ...this.flags }),
      soft_scores: Object.freeze([...this.softScores]),
      is_finished: this.finished,
      final_report: this.finalReport,
    });
  }
}
