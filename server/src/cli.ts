#!/usr/bin/env node
/**
 * Console front-end.
 *
 *   interview-coach                      interactive interview
 *   interview-coach --script run.json    replay { profile, messages }
 *
 * Options: --output <file> to choose the transcript path, --metadata to
 * include profile and timing metadata in it.
 */

import { readFile } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import type { Interface } from 'node:readline/promises';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { InterviewScriptSchema } from './agents/schemas/session-schemas.js';
import { DEFAULT_ROLE, listRoles } from './agents/knowledge/question-bank.js';
import { GRADES } from './agents/types.js';
import type { CandidateProfile, Grade } from './agents/types.js';
import { loadConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { InterviewSession, SessionError } from './session/interview-session.js';
import { errorMessage } from './agents/stage.js';

const RULE = '='.repeat(60);

export interface ConsoleOutput {
  write(text: string): void;
}

export interface PersistOptions {
  output?: string;
  includeMetadata: boolean;
}

/** Picks by 1-based index or by name; anything else gets the default. */
export function pickOption<T extends string>(answer: string, options: readonly T[], fallback: T): T {
  const trimmed = answer.trim();
  if (!trimmed) return fallback;
  const index = Number.parseInt(trimmed, 10);
  if (String(index) === trimmed && index >= 1 && index <= options.length) return options[index - 1];
  return options.find((o) => o.toLowerCase() === trimmed.toLowerCase()) ?? fallback;
}

export function defaultGreeting(profile: CandidateProfile): string {
  return `Hello! My name is ${profile.name}.`;
}

function printReport(session: InterviewSession, out: ConsoleOutput): void {
  const report = session.finalReport();
  if (!report) return;
  out.write(`\n${RULE}\nFINAL REPORT\n${RULE}\n\n${report}\n`);
}

/**
 * Sends each message in order and stops once the session is done. Returns
 * the path the transcript was written to.
 */
export async function runScriptedInterview(
  session: InterviewSession,
  messages: readonly string[],
  out: ConsoleOutput,
  options: PersistOptions,
): Promise<string> {
  const { profile } = session.snapshot();
  out.write(`${RULE}\nScripted interview: ${profile.name}\nPosition: ${profile.role} (${profile.grade_target})\n${RULE}\n`);

  for (const [index, message] of messages.entries()) {
    if (session.isFinished()) break;
    out.write(`\n[${index + 1}] Candidate: ${message}\n`);
    const result = await session.processTurn(message);
    out.write(`\nInterviewer: ${result.response}\n`);
  }

  printReport(session, out);
  const written = await session.persist(options.output, { includeMetadata: options.includeMetadata });
  out.write(`\nTranscript saved to ${written}\n`);
  return written;
}

async function askProfile(rl: Interface, out: ConsoleOutput, signal: AbortSignal): Promise<CandidateProfile> {
  out.write('\nCandidate details\n\n');
  const name = (await rl.question('Name: ', { signal })).trim() || 'Candidate';

  const roles = listRoles();
  out.write(`\nPositions:\n${roles.map((r, i) => `  ${i + 1}. ${r}`).join('\n')}\n`);
  const role = pickOption(await rl.question(`Choose a position (1-${roles.length}) [1]: `, { signal }), roles, DEFAULT_ROLE);

  out.write(`\nGrades:\n${GRADES.map((g, i) => `  ${i + 1}. ${g}`).join('\n')}\n`);
  const grade: Grade = pickOption(await rl.question(`Choose a grade (1-${GRADES.length}) [1]: `, { signal }), GRADES, 'Junior');

  const experience = (await rl.question('\nDescribe your experience briefly (Enter to skip): ', { signal })).trim();
  return { name, role, grade_target: grade, experience };
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export async function runInteractiveInterview(options: PersistOptions): Promise<void> {
  const config = loadConfig();
  const out: ConsoleOutput = process.stdout;
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const controller = new AbortController();
  rl.on('SIGINT', () => controller.abort());

  let session: InterviewSession | null = null;
  try {
    const profile = await askProfile(rl, out, controller.signal);
    session = InterviewSession.fromConfig(profile, config);

    out.write(`\n${RULE}\nInterview started\nCandidate: ${profile.name}\nPosition: ${profile.role} (${profile.grade_target})\n${RULE}\n`);
    out.write('Answer the questions, ask your own, or type "stop" to finish.\n\n');

    let message = (await rl.question('You: ', { signal: controller.signal })).trim();
    if (!message) {
      message = defaultGreeting(profile);
      out.write(`  (using the default greeting: ${message})\n`);
    }

    while (!session.isFinished()) {
      try {
        out.write('\nThe interviewer is thinking...\n');
        const result = await session.processTurn(message);
        out.write(`\nInterviewer:\n${result.response}\n\n`);
        if (result.finished) break;
      } catch (error) {
        if (!(error instanceof SessionError)) throw error;
        out.write(`\nError: ${error.message}\nTry again, or type "stop" to finish.\n`);
      }

      message = '';
      while (!message) {
        message = (await rl.question('You: ', { signal: controller.signal })).trim();
        if (!message) out.write('  (empty input, type your answer)\n');
      }
    }

    printReport(session, out);
    const written = await session.persist(options.output, { includeMetadata: options.includeMetadata });
    out.write(`\nTranscript saved to ${written}\n`);
  } catch (error) {
    if (!isAbort(error)) throw error;
    out.write('\n\nInterview interrupted.\n');
    if (session) {
      const written = await session.persist(options.output, { includeMetadata: options.includeMetadata });
      out.write(`Partial transcript saved to ${written}\n`);
    }
  } finally {
    rl.close();
  }
}

export async function runScriptFile(file: string, options: PersistOptions): Promise<string> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    throw new Error(`Could not read script ${file}: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = InterviewScriptSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid script ${file}: ${details}`);
  }

  const session = InterviewSession.fromConfig(parsed.data.profile, loadConfig());
  return runScriptedInterview(session, parsed.data.messages, process.stdout, options);
}

const USAGE = `Usage: interview-coach [--script <file.json>] [--output <file>] [--metadata]\n`;

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      script: { type: 'string', short: 's' },
      output: { type: 'string', short: 'o' },
      metadata: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const options: PersistOptions = { output: values.output, includeMetadata: values.metadata ?? false };
  if (values.script) {
    await runScriptFile(values.script, options);
  } else {
    await runInteractiveInterview(options);
  }
  return 0;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  main().then(
    (code) => { process.exitCode = code; },
    (error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Interview failed');
      process.stderr.write(`${errorMessage(error)}\n${USAGE}`);
      process.exitCode = 1;
    },
  );
}
