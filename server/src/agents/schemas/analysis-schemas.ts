/**
 * Zod schemas for the analysis stages' model output.
 *
 * All schemas are permissive: missing fields get defaults, nulls are
 * tolerated, and objects use .passthrough() so extra fields never fail a
 * parse. Closed-set values (category, action) stay plain strings here and
 * are normalized by the stage that owns them.
 */

import { z } from 'zod';

const unitScore = (fallback: number) =>
  z.preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().finite().catch(fallback),
  ).transform((n) => Math.min(1, Math.max(0, n)));

const nullableText = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? v.trim() : null),
  z.string().nullable(),
);

const stringList = z.preprocess(
  (v) => {
    if (v == null) return [];
    if (typeof v === 'string') return v.trim() ? [v.trim()] : [];
    return v;
  },
  z.array(z.unknown()).catch([]),
).transform((items) => items
  .map((item) => (typeof item === 'string' ? item.trim() : item == null ? '' : JSON.stringify(item)))
  .filter((item) => item.length > 0));

// ─── Classifier ──────────────────────────────────────────────────────
// { input_type, detected_entities, confidence, reasoning }

export const ClassifierOutputSchema = z.object({
  input_type: z.string(),
  detected_entities: stringList.optional().default([]),
  confidence: unitScore(0.9).optional().default(0.9),
  reasoning: z.string().nullish().transform((v) => v ?? ''),
}).passthrough();

export type ClassifierOutput = z.infer<typeof ClassifierOutputSchema>;

// ─── Hallucination guard ─────────────────────────────────────────────
// { is_hallucination, detected_claim, correction, confidence, reasoning }

export const HallucinationOutputSchema = z.object({
  is_hallucination: z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() === 'true' : v ?? false),
    z.boolean(),
  ),
  detected_claim: nullableText.optional().default(null),
  correction: nullableText.optional().default(null),
  confidence: unitScore(0.9).optional().default(0.9),
  reasoning: z.string().nullish().transform((v) => v ?? ''),
}).passthrough();

export type HallucinationOutput = z.infer<typeof HallucinationOutputSchema>;

// ─── Grader / planner ────────────────────────────────────────────────

export const SoftSignalsSchema = z.object({
  clarity: unitScore(0.5).optional().default(0.5),
  honesty: unitScore(0.5).optional().default(0.5),
  engagement: unitScore(0.5).optional().default(0.5),
}).passthrough();

export const GraderOutputSchema = z.object({
  next_action: z.string().nullish().transform((v) => v ?? null),
  next_topic: nullableText.optional().default(null),
  /** String or an object the stage flattens into a string */
  question_blueprint: z.union([z.string(), z.record(z.unknown())]).nullish().transform((v) => v ?? null),
  candidate_question: nullableText.optional().default(null),
  detected_issue: nullableText.optional().default(null),
  answer_score: unitScore(0).nullish().transform((v) => v ?? null),
  gaps_found: stringList.optional().default([]),
  correct_answer_for_gaps: nullableText.optional().default(null),
  do_not_ask: stringList.optional().default([]),
  facts_learned: stringList.optional().default([]),
  soft_signals: z.preprocess((v) => v ?? {}, SoftSignalsSchema.catch({
    clarity: 0.5,
    honesty: 0.5,
    engagement: 0.5,
  })),
  difficulty_delta: z.unknown().optional(),
  internal_thoughts: z.string().nullish().transform((v) => v ?? ''),
}).passthrough();

export type GraderOutput = z.infer<typeof GraderOutputSchema>;
