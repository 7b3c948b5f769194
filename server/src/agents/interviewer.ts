/**
 * Interviewer: the visible side of the conversation.
 *
 * Turns a finalized directive into the message the participant sees.
 * Unlike the Observer stages there is no fallback here; a failed or empty
 * generation propagates and the session rejects the turn.
 */

import type { LanguageModel } from '../lib/llm.js';
import { INTERVIEWER_SYSTEM_PROMPT } from './prompts.js';
import { conversationHistory } from './stage.js';
import { getTopicDescription } from './knowledge/question-bank.js';
import type { CandidateProfile, Directive, SessionSnapshot } from './types.js';

export class EmptyResponseError extends Error {
  constructor(stage: string) {
    super(`${stage} returned an empty response`);
    this.name = 'EmptyResponseError';
  }
}

/** Closing line used when the model cannot write one; a stop request still ends the interview. */
export function fallbackClosing(profile: CandidateProfile): string {
  return `Thank you for your time, ${profile.name}. The interview is over, and detailed feedback follows.`;
}

function extraContext(directive: Directive): string[] {
  const parts: string[] = [];

  if (directive.is_hallucination) {
    parts.push(
      '## False claim to correct',
      `Correction: ${directive.hallucination_correction ?? ''}`,
      'Correct it politely, then continue with a simpler question on the same topic.',
    );
  }
  if (directive.next_action === 'ANSWER_CANDIDATE') {
    parts.push(
      "## The candidate's question",
      `"${directive.candidate_question ?? ''}"`,
      'Answer in two or three sentences, then return to the interview.',
    );
  }
  if (directive.next_action === 'GIVE_HINT') {
    parts.push('## Hint', `Gaps: ${directive.gaps_found.join('; ') || 'unspecified'}`);
    if (directive.correct_answer) {
      parts.push(`Hint direction (do not reveal it fully): ${directive.correct_answer.slice(0, 120)}`);
    }
  }
  if (directive.next_action === 'REDIRECT') {
    parts.push('## Off-topic', 'Acknowledge in one sentence and steer back to the interview.');
  }
  if (directive.detected_issue) {
    parts.push(`## Issue: ${directive.detected_issue}`);
  }
  return parts;
}

export class Interviewer {
  constructor(
    private readonly llm: LanguageModel,
    private readonly model: string,
  ) {}

  async respond(
    snapshot: SessionSnapshot,
    directive: Directive,
    message: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const user = directive.next_action === 'WRAP_UP'
      ? this.wrapUpPrompt(snapshot)
      : snapshot.turns.length === 0 && directive.input_category === 'GREETING'
        ? this.greetingPrompt(snapshot, directive, message)
        : this.actionPrompt(snapshot, directive, message);

    const text = await this.llm.invoke({ model: this.model, system: INTERVIEWER_SYSTEM_PROMPT, user, signal });
    if (!text) throw new EmptyResponseError('Interviewer');
    return text;
  }

  private greetingPrompt(snapshot: SessionSnapshot, directive: Directive, message: string): string {
    const { profile } = snapshot;
    return [
      '## Directive',
      `Action: ${directive.next_action}`,
      `Question blueprint: ${directive.question_blueprint ?? 'a basic question for the role'}`,
      `Difficulty: ${snapshot.difficulty}/5`,
      `Topic: ${directive.next_topic ? getTopicDescription(directive.next_topic) : 'general'}`,
      '',
      '## Candidate',
      `Name: ${profile.name}`,
      `Role: ${profile.role} (${profile.grade_target})`,
      '',
      '## What the candidate just said',
      `"${message}"`,
      '',
      '## Task',
      'The candidate introduced themselves. Greet them by name without introducing yourself,',
      'acknowledge what they mentioned without asking them to repeat it,',
      'then ask the first technical question from the blueprint. At most three sentences before the question.',
    ].join('\n');
  }

  private actionPrompt(snapshot: SessionSnapshot, directive: Directive, message: string): string {
    const topic = directive.next_topic ?? snapshot.current_topic;
    return [
      '## Directive',
      `Action: ${directive.next_action}`,
      `Topic: ${topic ? getTopicDescription(topic) : 'general'}`,
      `Question blueprint: ${directive.question_blueprint ?? 'continue the conversation naturally'}`,
      `Difficulty: ${snapshot.difficulty}/5`,
      ...extraContext(directive),
      '',
      '## Recent conversation',
      conversationHistory(snapshot, 3),
      '',
      "## Candidate's last message",
      `"${message}"`,
      '',
      `Do not ask: ${directive.do_not_ask.length > 0 ? directive.do_not_ask.join(' | ') : 'none'}`,
      'Reply in the language the candidate uses. Respond with the message only.',
    ].join('\n');
  }

  private wrapUpPrompt(snapshot: SessionSnapshot): string {
    return [
      '## Task',
      'Write a short closing message for the interview: thank the candidate and say detailed feedback follows.',
      '',
      '## Candidate',
      `Name: ${snapshot.profile.name}`,
      `Role: ${snapshot.profile.role}`,
      `Questions asked: ${snapshot.flags.questions_asked_count}`,
      '',
      'Two or three sentences. Respond with the message only.',
    ].join('\n');
  }
}
