/**
 * Question bank: topics per role and grade, and question templates per
 * topic and difficulty level (1-5). The content lives in question-bank.json;
 * this module validates it once at load and answers lookups.
 */

import { z } from 'zod';
import rawBank from './question-bank.json' with { type: 'json' };
import { GRADES, MIN_DIFFICULTY, MAX_DIFFICULTY } from '../types.js';
import type { Grade } from '../types.js';

const QuestionBankSchema = z.object({
  roles: z.record(z.record(z.array(z.string()))),
  topics: z.record(z.object({
    description: z.string(),
    questions: z.record(z.array(z.string())),
  })),
});

type QuestionBank = z.infer<typeof QuestionBankSchema>;

const bank: QuestionBank = QuestionBankSchema.parse(rawBank);

export const DEFAULT_ROLE = 'Backend Developer';

export function listRoles(): string[] {
  return Object.keys(bank.roles);
}

export function isGrade(value: string): value is Grade {
  return GRADES.some((g) => g === value);
}

/** Unknown roles fall back to Backend Developer, unknown grades to Junior. */
export function getTopicsForRole(role: string, grade: string): string[] {
  const grades = bank.roles[role] ?? bank.roles[DEFAULT_ROLE] ?? {};
  return [...(grades[grade] ?? grades['Junior'] ?? [])];
}

export function getTopicDescription(topic: string): string {
  return bank.topics[topic]?.description ?? topic;
}

function clampLevel(difficulty: number): number {
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, Math.round(difficulty)));
}

/**
 * Questions for a topic at the given difficulty. A level without questions
 * borrows from the closest level that has some (ties go to the easier one).
 */
export function getQuestionsForTopic(topic: string, difficulty: number): string[] {
  const entry = bank.topics[topic];
  const generic = [`Tell me what you know about ${getTopicDescription(topic)}.`];
  if (!entry) return generic;

  const target = clampLevel(difficulty);
  const levels = Object.entries(entry.questions)
    .filter(([, questions]) => questions.length > 0)
    .map(([level, questions]) => ({ level: Number(level), questions }))
    .filter(({ level }) => Number.isFinite(level))
    .sort((a, b) => Math.abs(a.level - target) - Math.abs(b.level - target) || a.level - b.level);

  return levels.length > 0 ? [...levels[0].questions] : generic;
}

export function normalizeBlueprint(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function formatBlueprint(topic: string, question: string): string {
  return `Topic: ${topic}; Focus: ${getTopicDescription(topic)}; Question: ${question}`;
}

export interface BlueprintRequest {
  role: string;
  grade: string;
  difficulty: number;
  /** Topics already scored in this session */
  covered_topics: readonly string[];
  /** Blueprints (or question texts) that must not be proposed again */
  avoid: readonly string[];
}

export interface BlueprintSuggestion {
  topic: string;
  question: string;
  blueprint: string;
}

/**
 * First bank question that is not in `avoid`, trying uncovered topics
 * before covered ones. Null when every candidate is excluded.
 */
export function suggestBlueprint(request: BlueprintRequest): BlueprintSuggestion | null {
  const avoid = new Set(request.avoid.map(normalizeBlueprint));
  const covered = new Set(request.covered_topics);
  const topics = getTopicsForRole(request.role, request.grade);
  const ordered = [
    ...topics.filter((t) => !covered.has(t)),
    ...topics.filter((t) => covered.has(t)),
  ];

  for (const topic of ordered) {
    for (const question of getQuestionsForTopic(topic, request.difficulty)) {
      const blueprint = formatBlueprint(topic, question);
      if (avoid.has(normalizeBlueprint(blueprint)) || avoid.has(normalizeBlueprint(question))) continue;
      return { topic, question, blueprint };
    }
  }
  return null;
}
