/**
 * Observer: the hidden analysis pipeline.
 *
 *   Classifier ─┐
 *               ├─ join ─> Grader/Planner ─> Difficulty Adapter ─> Directive
 *   Guard ──────┘
 *
 * Stage A tasks share nothing but a frozen snapshot and never reject, so the
 * join cannot hang on a failed task. analyze() never throws.
 */

import type { LanguageModel } from '../lib/llm.js';
import type { StageModels } from '../lib/config.js';
import defaultLogger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { Classifier, fallbackClassification } from './classifier.js';
import { HallucinationGuard, fallbackHallucination } from './hallucination-guard.js';
import { GraderPlanner, fallbackDirective } from './grader-planner.js';
import { adaptDifficulty } from './difficulty-adapter.js';
import { answerScores, errorMessage } from './stage.js';
import type {
  ClassificationResult,
  Directive,
  HallucinationResult,
  SessionSnapshot,
  StageOutcome,
  TraceEntry,
} from './types.js';

/** Last two answer scores, counting the current message when it is an answer. */
export function recentScoresFor(snapshot: SessionSnapshot, directive: Directive): number[] {
  const scores = answerScores(snapshot);
  if (directive.input_category === 'ANSWER' && directive.answer_score !== null) {
    scores.push(directive.answer_score);
  }
  return scores.slice(-2);
}

function classifierEntry(outcome: StageOutcome<ClassificationResult>): TraceEntry {
  const { value } = outcome;
  return {
    source: 'classifier',
    message: `type=${value.category}, entities=[${value.entities.join(', ')}], confidence=${value.confidence}: ${value.rationale}`,
    ...(outcome.kind === 'fallback' ? { fallback: true } : {}),
    data: { category: value.category, entities: [...value.entities], confidence: value.confidence },
  };
}

function hallucinationEntry(outcome: StageOutcome<HallucinationResult>): TraceEntry {
  const { value } = outcome;
  return {
    source: 'hallucination_guard',
    message: value.is_hallucination
      ? `hallucination: "${value.claim ?? ''}" -> ${value.correction ?? ''}`
      : `no hallucination: ${value.rationale}`,
    ...(outcome.kind === 'fallback' ? { fallback: true } : {}),
    data: { is_hallucination: value.is_hallucination, confidence: value.confidence },
  };
}

export class Observer {
  private readonly classifier: Classifier;
  private readonly guard: HallucinationGuard;
  private readonly grader: GraderPlanner;

  constructor(llm: LanguageModel, models: StageModels) {
    this.classifier = new Classifier(llm, models.classifier);
    this.guard = new HallucinationGuard(llm, models.hallucination);
    this.grader = new GraderPlanner(llm, models.grader);
  }

  async analyze(
    snapshot: SessionSnapshot,
    message: string,
    log: Logger = defaultLogger,
    signal?: AbortSignal,
  ): Promise<Directive> {
    // Stage A. Each task settles to a value; a throw past a stage boundary
    // still lands on that stage's fallback.
    const [classification, hallucination] = await Promise.all([
      this.classifier.classify(snapshot, message, signal).catch(
        (error: unknown): StageOutcome<ClassificationResult> => {
          const reason = `classifier crashed: ${errorMessage(error)}`;
          return { kind: 'fallback', value: fallbackClassification(message, reason), reason };
        },
      ),
      this.guard.check(snapshot, message, signal).catch(
        (error: unknown): StageOutcome<HallucinationResult> => {
          const reason = `hallucination guard crashed: ${errorMessage(error)}`;
          return { kind: 'fallback', value: fallbackHallucination(reason), reason };
        },
      ),
    ]);

    if (classification.kind === 'fallback') {
      log.warn({ stage: 'classifier', reason: classification.reason }, 'Stage fell back');
    }
    if (hallucination.kind === 'fallback') {
      log.warn({ stage: 'hallucination_guard', reason: hallucination.reason }, 'Stage fell back');
    }

    // Stage B
    const planned = await this.grader
      .plan(snapshot, message, classification.value, hallucination.value, signal)
      .catch((error: unknown): StageOutcome<Directive> => {
        const reason = `grader crashed: ${errorMessage(error)}`;
        return {
          kind: 'fallback',
          value: fallbackDirective(snapshot, message, classification.value, hallucination.value, reason),
          reason,
        };
      });
    if (planned.kind === 'fallback') {
      log.warn({ stage: 'grader_planner', reason: planned.reason }, 'Stage fell back');
    }

    const joined: Directive = {
      ...planned.value,
      reasoning: {
        entries: [classifierEntry(classification), hallucinationEntry(hallucination), ...planned.value.reasoning.entries],
      },
    };

    const directive = adaptDifficulty({
      difficulty: snapshot.difficulty,
      recent_scores: recentScoresFor(snapshot, joined),
      directive: joined,
    });

    log.debug({
      category: directive.input_category,
      action: directive.next_action,
      score: directive.answer_score,
      delta: directive.difficulty_delta,
    }, 'Directive finalized');

    return Object.isFrozen(directive) ? directive : Object.freeze(directive);
  }
}
