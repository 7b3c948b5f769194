/**
 * InterviewSession: the per-session turn orchestrator.
 *
 *   AWAITING_INPUT -> ANALYZING -> RESPONDING -> LOGGED -> AWAITING_INPUT
 *                              \-> TERMINATED -> REPORTING -> DONE
 *
 * Side effects are ordered: state is mutated only after the visible
 * response exists, and the turn is logged only after the mutation. A
 * failed response leaves the session exactly as it was; a stop request
 * closes with a fixed message instead, so it always ends the session.
 */

import { randomUUID } from 'node:crypto';
import type { AppConfig } from '../lib/config.js';
import { LanguageModel } from '../lib/llm.js';
import { createSessionLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { Observer } from '../agents/observer.js';
import { Interviewer, fallbackClosing } from '../agents/interviewer.js';
import { HiringManager } from '../agents/hiring-manager.js';
import { errorMessage } from '../agents/stage.js';
import type { CandidateProfile, Directive, SessionPhase, SessionSnapshot, Transcript, Turn } from '../agents/types.js';
import { InterviewState } from './state.js';
import { buildMetadata, buildTranscript, formatInternalThoughts, saveTranscript } from './transcript.js';
import type { TranscriptWithMetadata } from './transcript.js';

export type SessionErrorCode = 'SESSION_CLOSED' | 'SESSION_BUSY' | 'RESPONSE_FAILED';

export class SessionError extends Error {
  constructor(
    readonly code: SessionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SessionError';
  }
}

export interface SessionAgents {
  observer: Observer;
  interviewer: Interviewer;
  hiringManager: HiringManager;
}

export interface SessionOptions {
  id?: string;
  /** Starting difficulty, clamped to 1-5 */
  difficulty: number;
  transcriptsDir: string;
  logger?: Logger;
}

export interface TurnResult {
  response: string;
  turn_id: number;
  finished: boolean;
  phase: SessionPhase;
}

export function createAgents(llm: LanguageModel, config: AppConfig): SessionAgents {
  return {
    observer: new Observer(llm, config.models),
    interviewer: new Interviewer(llm, config.models.interviewer),
    hiringManager: new HiringManager(llm, config.models.report),
  };
}

export class InterviewSession {
  readonly id: string;
  private readonly state: InterviewState;
  private readonly log: Logger;
  private readonly transcriptsDir: string;
  private readonly startedAt = new Date();
  private finishedAt: Date | null = null;
  private currentPhase: SessionPhase = 'AWAITING_INPUT';
  private inFlight = false;

  constructor(
    profile: CandidateProfile,
    private readonly agents: SessionAgents,
    options: SessionOptions,
  ) {
    this.id = options.id ?? randomUUID();
    this.state = new InterviewState(profile, options.difficulty);
    this.transcriptsDir = options.transcriptsDir;
    this.log = options.logger ?? createSessionLogger(this.id, { participant: profile.name });
  }

  static fromConfig(profile: CandidateProfile, config: AppConfig, llm?: LanguageModel): InterviewSession {
    const model = llm ?? LanguageModel.fromSettings(config.llm);
    return new InterviewSession(profile, createAgents(model, config), {
      difficulty: config.session.default_difficulty,
      transcriptsDir: config.session.transcripts_dir,
    });
  }

  phase(): SessionPhase {
    return this.currentPhase;
  }

  isFinished(): boolean {
    return this.state.isFinished;
  }

  /** When the final report was written; null while the interview runs. */
  endedAt(): Date | null {
    return this.finishedAt;
  }

  finalReport(): string | null {
    return this.state.report;
  }

  snapshot(): SessionSnapshot {
    return this.state.snapshot();
  }

  /** Session API: the visible response to one participant message. */
  async process(message: string): Promise<string> {
    const result = await this.processTurn(message);
    return result.response;
  }

  async processTurn(message: string): Promise<TurnResult> {
    if (this.currentPhase === 'DONE' || this.state.isFinished) {
      throw new SessionError('SESSION_CLOSED', 'The interview has ended; no further messages are accepted');
    }
    if (this.inFlight) {
      throw new SessionError('SESSION_BUSY', 'A message is already being processed for this session');
    }

    this.inFlight = true;
    try {
      return await this.runTurn(message);
    } catch (error) {
      if (this.phase() !== 'DONE') this.transition('AWAITING_INPUT');
      throw error;
    } finally {
      this.inFlight = false;
    }
  }

  private async runTurn(message: string): Promise<TurnResult> {
    const snapshot = this.state.snapshot();

    this.transition('ANALYZING');
    const directive = await this.agents.observer.analyze(snapshot, message, this.log);
    const terminating = directive.input_category === 'STOP';

    this.transition(terminating ? 'TERMINATED' : 'RESPONDING');
    let response: string;
    try {
      response = await this.agents.interviewer.respond(snapshot, directive, message);
    } catch (error) {
      if (!terminating) {
        this.log.error({ error: errorMessage(error), action: directive.next_action }, 'Response generation failed');
        throw new SessionError('RESPONSE_FAILED', `Could not generate a response: ${errorMessage(error)}`, { cause: error });
      }
      this.log.warn({ error: errorMessage(error) }, 'Closing message failed, using the fixed closing');
      response = fallbackClosing(snapshot.profile);
    }

    const scoredTopic = this.applyDirective(directive);
    const turn = this.logTurn(message, response, directive, scoredTopic, terminating);

    if (!terminating) {
      this.transition('LOGGED');
      this.transition('AWAITING_INPUT');
      return { response, turn_id: turn.turn_id, finished: false, phase: this.currentPhase };
    }

    this.state.markFinished();
    this.log.info({ turnId: turn.turn_id }, 'Session terminated');

    this.transition('REPORTING');
    const report = await this.agents.hiringManager.generateReport(this.state.snapshot(), this.log);
    this.state.setFinalReport(report);
    this.finishedAt = new Date();
    this.transition('DONE');
    this.log.info({ length: report.length }, 'Final report generated');

    return { response, turn_id: turn.turn_id, finished: true, phase: this.currentPhase };
  }

  private transition(next: SessionPhase): void {
    this.log.debug({ from: this.currentPhase, to: next }, 'Phase transition');
    this.currentPhase = next;
  }

  /** Returns the topic the answer was scored under, if any. */
  private applyDirective(directive: Directive): string | null {
    const { state } = this;
    let scoredTopic: string | null = null;

    if (directive.input_category === 'OFF_TOPIC') state.countOffTopic();
    if (directive.is_hallucination) state.countHallucination();

    if (directive.input_category === 'ANSWER' && directive.answer_score !== null) {
      scoredTopic = state.topic ?? directive.next_topic;
      if (scoredTopic) {
        state.recordTopicScore(scoredTopic, directive.answer_score, directive.gaps_found, directive.correct_answer);
      }
    }

    const before = state.currentDifficulty;
    const after = state.adjustDifficulty(directive.difficulty_delta);
    if (after !== before) {
      this.log.info({ from: before, to: after }, 'Difficulty adjusted');
    }

    if (directive.next_topic) state.setCurrentTopic(directive.next_topic);
    if (directive.next_action === 'ASK' || directive.next_action === 'FOLLOW_UP') {
      state.recordQuestion(directive.question_blueprint);
    }
    state.addFacts(directive.facts_learned);
    state.addSoftSignals(directive.soft_signals);
    return scoredTopic;
  }

  private logTurn(
    message: string,
    response: string,
    directive: Directive,
    scoredTopic: string | null,
    isFinal: boolean,
  ): Turn {
    const isAnswer = directive.input_category === 'ANSWER';
    const turn = this.state.appendTurn({
      agent_visible_message: response,
      user_message: message,
      internal_thoughts: formatInternalThoughts(directive, this.state.currentDifficulty, isFinal),
      topic: isAnswer ? scoredTopic : directive.next_topic,
      score: isAnswer ? directive.answer_score : null,
    });
    this.log.info({ turnId: turn.turn_id, action: directive.next_action, score: turn.score }, 'Turn logged');
    return turn;
  }

  // ─── Transcript ────────────────────────────────────────────────────

  transcript(options: { includeMetadata?: boolean } = {}): Transcript | TranscriptWithMetadata {
    const base = buildTranscript(this.state.profile.name, this.state.transcriptTurns, this.state.report);
    if (!options.includeMetadata) return base;
    return { ...base, metadata: buildMetadata(this.state.profile, this.startedAt, this.finishedAt) };
  }

  /** Session API: writes the transcript and returns its absolute path. */
  async persist(path?: string, options: { includeMetadata?: boolean } = {}): Promise<string> {
    const written = await saveTranscript(this.transcript(options), { path, dir: this.transcriptsDir });
    this.log.info({ path: written }, 'Transcript persisted');
    return written;
  }
}
