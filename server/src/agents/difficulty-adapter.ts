/**
 * Difficulty Adapter
 *
 * Pure post-processing of a candidate directive. Difficulty only moves after
 * two consecutive extreme scores (hysteresis); a single very weak answer
 * turns a plain ASK into a hint instead. Rules apply only to ANSWER and
 * GREETING messages and are evaluated in order, first match wins.
 */

import { MAX_DIFFICULTY, MIN_DIFFICULTY } from './types.js';
import type { Directive, DifficultyDelta, TraceEntry } from './types.js';

export const RAISE_THRESHOLD = 0.8;
export const LOWER_THRESHOLD = 0.4;
export const HINT_THRESHOLD = 0.3;

export type AdapterRule = 'raise' | 'lower' | 'hint';

export interface AdaptInput {
  difficulty: number;
  /** Last two non-null answer scores, most recent last */
  recent_scores: readonly number[];
  directive: Directive;
}

export function clampDifficulty(value: number): number {
  if (!Number.isFinite(value)) return MIN_DIFFICULTY;
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, Math.round(value)));
}

export function clampDelta(value: number): DifficultyDelta {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

export function adaptDifficulty({ difficulty, recent_scores, directive }: AdaptInput): Directive {
  const category = directive.input_category;
  if (category !== 'ANSWER' && category !== 'GREETING') return directive;

  const scores = recent_scores.slice(-2);
  if (scores.length < 2) return directive;

  const [previous, latest] = scores;
  let rule: AdapterRule | null = null;
  let difficulty_delta: DifficultyDelta = 0;
  let next_action = directive.next_action;

  if (previous >= RAISE_THRESHOLD && latest >= RAISE_THRESHOLD && difficulty < MAX_DIFFICULTY) {
    rule = 'raise';
    difficulty_delta = 1;
  } else if (previous <= LOWER_THRESHOLD && latest <= LOWER_THRESHOLD && difficulty > MIN_DIFFICULTY) {
    rule = 'lower';
    difficulty_delta = -1;
  } else if (
    directive.answer_score !== null
    && directive.answer_score <= HINT_THRESHOLD
    && directive.next_action === 'ASK'
  ) {
    rule = 'hint';
    next_action = 'GIVE_HINT';
  }

  if (rule === null) return directive;

  const entry: TraceEntry = {
    source: 'difficulty_adapter',
    message: rule === 'hint'
      ? `score ${directive.answer_score} <= ${HINT_THRESHOLD}: ASK becomes GIVE_HINT`
      : `scores [${previous}, ${latest}]: difficulty ${difficulty} -> ${clampDifficulty(difficulty + difficulty_delta)}`,
    data: {
      rule,
      previous: difficulty,
      next: clampDifficulty(difficulty + difficulty_delta),
      scores: [previous, latest],
    },
  };

  const adapted: Directive = {
    ...directive,
    difficulty_delta,
    next_action,
    reasoning: { entries: [...directive.reasoning.entries, entry] },
  };
  return Object.freeze(adapted);
}
