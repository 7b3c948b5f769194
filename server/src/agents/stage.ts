/**
 * Plumbing shared by the Observer stages: one JSON-mode model call, JSON
 * repair, then a permissive schema. Anything that goes wrong comes back as
 * a reason string; the calling stage turns it into its own fallback.
 */

import type { z } from 'zod';
import type { LanguageModel } from '../lib/llm.js';
import { repairJSON } from '../lib/json-repair.js';
import type { SessionSnapshot, TopicScoreView } from './types.js';

export type JsonStageResult<T> =
  | { ok: true; data: T }
  | { ok: false; reason: string };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function requestJson<S extends z.ZodTypeAny>(
  llm: LanguageModel,
  params: { model: string; system: string; user: string; signal?: AbortSignal },
  schema: S,
): Promise<JsonStageResult<z.output<S>>> {
  let text: string;
  try {
    text = await llm.invoke({ ...params, json: true });
  } catch (error) {
    return { ok: false, reason: `service error: ${errorMessage(error)}` };
  }

  const parsed = repairJSON(text);
  if (parsed === null || typeof parsed !== 'object') {
    return { ok: false, reason: 'unparseable output' };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    return {
      ok: false,
      reason: `invalid output: ${first ? `${first.path.join('.') || '(root)'} ${first.message}` : 'schema mismatch'}`,
    };
  }
  return { ok: true, data: result.data };
}

// ─── Context rendering ───────────────────────────────────────────────

export function topicAverage(score: Pick<TopicScoreView, 'asked_count' | 'total_score'>): number {
  return score.asked_count > 0 ? score.total_score / score.asked_count : 0;
}

/** Non-null answer scores in turn order, most recent last. */
export function answerScores(snapshot: SessionSnapshot): number[] {
  return snapshot.turns.flatMap((t) => (t.score === null ? [] : [t.score]));
}

export function conversationHistory(snapshot: SessionSnapshot, lastN = 5): string {
  if (snapshot.turns.length === 0) return '(no conversation yet)';
  return snapshot.turns.slice(-lastN)
    .map((t) => `Candidate: ${t.user_message}\nInterviewer: ${t.agent_visible_message}`)
    .join('\n\n');
}

export function contextSummary(snapshot: SessionSnapshot): string {
  const { profile, flags } = snapshot;
  const topics = Object.entries(snapshot.topics)
    .map(([topic, score]) => `${topic}: avg ${topicAverage(score).toFixed(2)} over ${score.asked_count}`)
    .join('; ');
  return [
    `Candidate: ${profile.name}`,
    `Position: ${profile.role} (${profile.grade_target})`,
    `Experience: ${profile.experience || 'not stated'}`,
    `Difficulty: ${snapshot.difficulty}/5`,
    `Current topic: ${snapshot.current_topic ?? 'none'}`,
    `Questions asked: ${flags.questions_asked_count}`,
    `Topic scores: ${topics || 'none yet'}`,
    `Known facts: ${snapshot.known_facts.length > 0 ? snapshot.known_facts.join('; ') : 'none'}`,
    `Last questions (do not repeat): ${snapshot.last_questions.length > 0 ? snapshot.last_questions.join(' | ') : 'none'}`,
  ].join('\n');
}
