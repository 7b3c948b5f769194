/**
 * Hiring Manager: writes the final report once the interview has ended.
 *
 * The model gets the aggregated session state (topic averages, gaps with
 * their correct answers, soft-signal averages, flags, recent exchanges).
 * When it fails or returns nothing, the same aggregates are rendered into
 * a plain markdown report, so the session always ends with one.
 */

import type { LanguageModel } from '../lib/llm.js';
import defaultLogger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { REPORT_SYSTEM_PROMPT } from './prompts.js';
import { answerScores, errorMessage, topicAverage } from './stage.js';
import { getTopicDescription } from './knowledge/question-bank.js';
import { GOOD_SCORE_THRESHOLD } from './types.js';
import type { SessionSnapshot, SoftSignals } from './types.js';

export type Recommendation = 'Strong Hire' | 'Hire' | 'No Hire';

export interface TopicSummary {
  topic: string;
  average: number;
  asked_count: number;
  confirmed: boolean;
  gaps: string[];
  correct_answers: string[];
}

export interface InterviewSummary {
  topics: TopicSummary[];
  soft: SoftSignals;
  overall: number;
  answers: number;
  recommendation: Recommendation;
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

export function recommend(overall: number, answers: number): Recommendation {
  if (answers === 0) return 'No Hire';
  if (overall >= 0.8) return 'Strong Hire';
  if (overall >= 0.6) return 'Hire';
  return 'No Hire';
}

export function summarizeInterview(snapshot: SessionSnapshot): InterviewSummary {
  const topics = Object.entries(snapshot.topics).map(([topic, score]): TopicSummary => {
    const average = topicAverage(score);
    return {
      topic,
      average,
      asked_count: score.asked_count,
      confirmed: average >= GOOD_SCORE_THRESHOLD,
      gaps: [...score.gaps],
      correct_answers: [...score.correct_answers],
    };
  });

  const soft = snapshot.soft_scores.length > 0
    ? {
        clarity: mean(snapshot.soft_scores.map((s) => s.clarity)),
        honesty: mean(snapshot.soft_scores.map((s) => s.honesty)),
        engagement: mean(snapshot.soft_scores.map((s) => s.engagement)),
      }
    : { clarity: 0.5, honesty: 0.5, engagement: 0.5 };

  const scores = answerScores(snapshot);
  const overall = mean(scores);
  return { topics, soft, overall, answers: scores.length, recommendation: recommend(overall, scores.length) };
}

/** Report rendered from the aggregates alone. */
export function buildFallbackReport(snapshot: SessionSnapshot): string {
  const { profile, flags } = snapshot;
  const summary = summarizeInterview(snapshot);
  const confirmed = summary.topics.filter((t) => t.confirmed);
  const weak = summary.topics.filter((t) => !t.confirmed || t.gaps.length > 0);
  const lines = [
    `# Interview report: ${profile.name}`,
    '',
    '## Verdict',
    `- Position: ${profile.role} (${profile.grade_target})`,
    `- Recommendation: ${summary.recommendation}`,
    `- Average answer score: ${summary.overall.toFixed(2)} over ${summary.answers} answers`,
    '',
    '## Hard skills',
    '### Confirmed',
    ...(confirmed.length > 0
      ? confirmed.map((t) => `- ${t.topic}: ${t.average.toFixed(2)} (${t.asked_count} questions)`)
      : ['- none']),
    '### Gaps',
  ];

  if (weak.length === 0) {
    lines.push('- none');
  } else {
    for (const t of weak) {
      lines.push(`- ${t.topic}: ${t.average.toFixed(2)} (${t.asked_count} questions)`);
      for (const gap of t.gaps) lines.push(`  - Gap: ${gap}`);
      for (const answer of t.correct_answers) lines.push(`  - Correct answer: ${answer}`);
    }
  }

  lines.push(
    '',
    '## Soft skills',
    `- Clarity: ${summary.soft.clarity.toFixed(2)}`,
    `- Honesty: ${summary.soft.honesty.toFixed(2)}`,
    `- Engagement: ${summary.soft.engagement.toFixed(2)}`,
    `- Off-topic messages: ${flags.off_topic_count}`,
    `- False claims: ${flags.hallucination_count}`,
    '',
    '## Roadmap',
  );
  const toStudy = summary.topics.filter((t) => !t.confirmed);
  if (toStudy.length > 0) {
    for (const t of toStudy) lines.push(`- Study ${getTopicDescription(t.topic)}`);
  } else {
    lines.push('- Keep deepening the covered topics at a higher difficulty');
  }
  return lines.join('\n');
}

function reportInput(snapshot: SessionSnapshot): string {
  const { profile, flags } = snapshot;
  const summary = summarizeInterview(snapshot);

  const topicLines = summary.topics.length > 0
    ? summary.topics.flatMap((t) => [
        `- ${t.topic}: ${t.confirmed ? 'confirmed' : 'not confirmed'} (avg ${t.average.toFixed(2)}, questions ${t.asked_count})`,
        ...(t.gaps.length > 0 ? [`  Gaps: ${t.gaps.slice(0, 3).join(', ')}`] : []),
      ])
    : ['No topics covered.'];

  const gapLines = summary.topics
    .filter((t) => !t.confirmed || t.gaps.length > 0)
    .flatMap((t) => [
      `### ${t.topic}`,
      ...t.gaps.map((g) => `- Gap: ${g}`),
      ...t.correct_answers.map((a) => `- Correct answer: ${a}`),
    ]);

  const exchanges = snapshot.turns.slice(-10).flatMap((turn) => [
    `Q: ${turn.agent_visible_message.slice(0, 150)}`,
    `A: ${turn.user_message.slice(0, 150)}`,
    ...(turn.score !== null ? [`Score: ${turn.score.toFixed(2)}`] : []),
    '',
  ]);

  return [
    '## Candidate',
    `Name: ${profile.name}`,
    `Position: ${profile.role} (${profile.grade_target})`,
    `Experience: ${profile.experience || 'not stated'}`,
    '',
    '## Statistics',
    `Questions asked: ${flags.questions_asked_count}`,
    `Topics covered: ${summary.topics.length}`,
    `False claims: ${flags.hallucination_count}`,
    `Off-topic messages: ${flags.off_topic_count}`,
    `Average answer score: ${summary.overall.toFixed(2)} over ${summary.answers} answers`,
    '',
    '## Topic scores',
    ...topicLines,
    '',
    '## Soft skills (averages)',
    `Clarity: ${summary.soft.clarity.toFixed(2)}`,
    `Honesty: ${summary.soft.honesty.toFixed(2)}`,
    `Engagement: ${summary.soft.engagement.toFixed(2)}`,
    '',
    '## Gaps and correct answers',
    ...(gapLines.length > 0 ? gapLines : ['No significant gaps identified.']),
    '',
    '## Recent exchanges',
    ...(exchanges.length > 0 ? exchanges : ['No conversation recorded.']),
  ].join('\n');
}

export class HiringManager {
  constructor(
    private readonly llm: LanguageModel,
    private readonly model: string,
  ) {}

  /** Never rejects and never returns an empty string. */
  async generateReport(snapshot: SessionSnapshot, log: Logger = defaultLogger, signal?: AbortSignal): Promise<string> {
    try {
      const text = await this.llm.invoke({
        model: this.model,
        system: REPORT_SYSTEM_PROMPT,
        user: reportInput(snapshot),
        signal,
      });
      if (text) return text;
      log.warn('Report generation returned no text, using the aggregate report');
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Report generation failed, using the aggregate report');
    }
    return buildFallbackReport(snapshot);
  }
}
