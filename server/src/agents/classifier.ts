/**
 * Stage A: Classifier
 *
 * Maps a participant message to one closed category and extracts the
 * technical entities it mentions. A greeting only counts as GREETING on the
 * first message; later it is OFF_TOPIC. When the model is unreachable or
 * its output is unusable, a termination keyword scan decides between STOP
 * and ANSWER.
 */

import type { LanguageModel } from '../lib/llm.js';
import { CLASSIFIER_SYSTEM_PROMPT } from './prompts.js';
import { ClassifierOutputSchema } from './schemas/analysis-schemas.js';
import { requestJson } from './stage.js';
import { findTerminationKeyword } from './termination.js';
import { INPUT_CATEGORIES } from './types.js';
import type { ClassificationResult, InputCategory, SessionSnapshot, StageOutcome } from './types.js';

const CATEGORY_ALIASES: Record<string, InputCategory> = {
  TERMINATION: 'STOP',
  TERMINATE: 'STOP',
  END: 'STOP',
  END_INTERVIEW: 'STOP',
  FINISH: 'STOP',
  QUESTION: 'CANDIDATE_QUESTION',
  CANDIDATE_QUESTIONS: 'CANDIDATE_QUESTION',
  OFFTOPIC: 'OFF_TOPIC',
  IRRELEVANT: 'OFF_TOPIC',
  GREETINGS: 'GREETING',
  HELLO: 'GREETING',
  INTRODUCTION: 'GREETING',
  TECHNICAL_ANSWER: 'ANSWER',
};

/**
 * Normalize a category string from model output.
 * Accepts "off topic", "Off-Topic", "termination" and similar; null when
 * nothing matches.
 */
export function normalizeCategory(raw: string): InputCategory | null {
  const key = raw.trim().toUpperCase().replace(/[\s-]+/g, '_');
  const direct = INPUT_CATEGORIES.find((c) => c === key);
  return direct ?? CATEGORY_ALIASES[key] ?? null;
}

export function fallbackClassification(message: string, reason: string): ClassificationResult {
  const keyword = findTerminationKeyword(message);
  return {
    category: keyword ? 'STOP' : 'ANSWER',
    entities: [],
    confidence: 0.5,
    rationale: keyword
      ? `[Fallback] ${reason}; termination keyword "${keyword}" found`
      : `[Fallback] ${reason}; treated as an answer`,
  };
}

export class Classifier {
  constructor(
    private readonly llm: LanguageModel,
    private readonly model: string,
  ) {}

  async classify(
    snapshot: SessionSnapshot,
    message: string,
    signal?: AbortSignal,
  ): Promise<StageOutcome<ClassificationResult>> {
    const isFirstMessage = snapshot.turns.length === 0;
    const user = [
      '## Interview context',
      `Candidate: ${snapshot.profile.name}`,
      `Position: ${snapshot.profile.role} (${snapshot.profile.grade_target})`,
      `Questions asked so far: ${snapshot.flags.questions_asked_count}`,
      `Turns so far: ${snapshot.turns.length}${isFirstMessage ? ' (this is the first message)' : ''}`,
      '',
      '## Message',
      `"${message}"`,
    ].join('\n');

    const result = await requestJson(
      this.llm,
      { model: this.model, system: CLASSIFIER_SYSTEM_PROMPT, user, signal },
      ClassifierOutputSchema,
    );
    if (!result.ok) {
      return { kind: 'fallback', value: fallbackClassification(message, result.reason), reason: result.reason };
    }

    const category = normalizeCategory(result.data.input_type);
    if (!category) {
      const reason = `unknown category "${result.data.input_type}"`;
      return { kind: 'fallback', value: fallbackClassification(message, reason), reason };
    }

    const value: ClassificationResult = {
      category,
      entities: result.data.detected_entities,
      confidence: result.data.confidence,
      rationale: result.data.reasoning,
    };

    if (category === 'GREETING' && !isFirstMessage) {
      value.category = 'OFF_TOPIC';
      value.rationale = `${value.rationale} (greeting after the first message treated as off-topic)`.trim();
    }

    return { kind: 'parsed', value };
  }
}
