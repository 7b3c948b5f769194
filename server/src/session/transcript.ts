/**
 * Persisted transcript: participant name, turns and the final report as
 * pretty-printed UTF-8 JSON. Without an explicit path each session gets
 * interview_log_<N>.json, one past the highest N already on disk.
 */

import { mkdir, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CandidateProfile, Directive, Transcript, Turn } from '../agents/types.js';

export const TRANSCRIPT_PREFIX = 'interview_log';

export interface TranscriptMetadata {
  role: string;
  grade_target: string;
  experience: string;
  started_at: string;
  finished_at: string | null;
}

export type TranscriptWithMetadata = Transcript & { metadata: TranscriptMetadata };

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.map((v) => String(v)) : [];
}

/** One-line digest of the directive's reasoning trace. */
export function summarizeObserver(directive: Directive): string {
  const entries = directive.reasoning.entries;
  const classifier = entries.find((e) => e.source === 'classifier');
  const entities = stringList(classifier?.data?.entities);

  const facts = [
    `type=${directive.input_category}`,
    `entities=[${entities.join(', ')}]`,
    `hallucination=${directive.is_hallucination ? 'yes' : 'no'}`,
    `topic=${directive.next_topic ?? 'none'}`,
    `score=${directive.answer_score === null ? 'n/a' : directive.answer_score.toFixed(2)}`,
  ].join(', ');

  const thoughts = entries.find((e) => e.source === 'grader_planner' && !e.fallback)?.message;
  const notes = [
    ...entries.filter((e) => e.source === 'difficulty_adapter').map((e) => `adapter: ${e.message}`),
    ...entries.filter((e) => e.fallback).map((e) => `fallback ${e.source}: ${e.message}`),
  ];

  return [facts, thoughts, ...notes].filter(Boolean).join(' | ');
}

export function formatInternalThoughts(directive: Directive, difficulty: number, isFinal: boolean): string {
  let text = `[Observer]: ${summarizeObserver(directive)}\n`;
  text += `[Interviewer]: Action: ${directive.next_action}, Difficulty: ${difficulty}\n`;
  if (isFinal) text += '[HiringManager]: Generating final feedback report\n';
  return text;
}

export function buildTranscript(
  participantName: string,
  turns: readonly Turn[],
  finalFeedback: string | null,
): Transcript {
  return {
    participant_name: participantName,
    turns: turns.map((t) => ({
      turn_id: t.turn_id,
      agent_visible_message: t.agent_visible_message,
      user_message: t.user_message,
      internal_thoughts: t.internal_thoughts,
    })),
    final_feedback: finalFeedback,
  };
}

export function buildMetadata(profile: CandidateProfile, startedAt: Date, finishedAt: Date | null): TranscriptMetadata {
  return {
    role: profile.role,
    grade_target: profile.grade_target,
    experience: profile.experience,
    started_at: startedAt.toISOString(),
    finished_at: finishedAt ? finishedAt.toISOString() : null,
  };
}

async function highestTranscriptNumber(dir: string, prefix: string): Promise<number> {
  const escaped = prefix.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(`^${escaped}_(\\d+)\\.json$`);

  let max = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const match = pattern.exec(entry.name);
    if (match) max = Math.max(max, Number.parseInt(match[1], 10));
  }
  return max;
}

function transcriptFile(dir: string, prefix: string, n: number): string {
  return path.resolve(dir, `${prefix}_${n}.json`);
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/** Next free interview_log_<N>.json in `dir`; creates the directory. */
export async function nextTranscriptPath(dir: string, prefix = TRANSCRIPT_PREFIX): Promise<string> {
  await mkdir(dir, { recursive: true });
  return path.join(dir, `${prefix}_${(await highestTranscriptNumber(dir, prefix)) + 1}.json`);
}

/**
 * Writes the transcript and returns its absolute path. Numbered files are
 * created exclusively; a name taken by a concurrent save moves on to the
 * next number.
 */
export async function saveTranscript(
  transcript: Transcript | TranscriptWithMetadata,
  options: { path?: string; dir: string },
): Promise<string> {
  const data = `${JSON.stringify(transcript, null, 2)}\n`;

  if (options.path) {
    const target = path.resolve(options.path);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, data, 'utf8');
    return target;
  }

  await mkdir(options.dir, { recursive: true });
  let n = (await highestTranscriptNumber(options.dir, TRANSCRIPT_PREFIX)) + 1;
  for (;;) {
    const target = transcriptFile(options.dir, TRANSCRIPT_PREFIX, n);
    try {
      await writeFile(target, data, { encoding: 'utf8', flag: 'wx' });
      return target;
    } catch (error) {
      if (!isAlreadyExists(error)) throw error;
      n += 1;
    }
  }
}
