import { describe, it, expect, vi } from 'vitest';
import {
  GraderPlanner,
  NEUTRAL_SOFT_SIGNALS,
  decideAction,
  fallbackDirective,
  flattenBlueprint,
  normalizeAction,
} from '../agents/grader-planner.js';
import type { ChatParams } from '../lib/llm-provider.js';
import {
  makeClassification,
  makeHallucination,
  makeLLM,
  makeLLMResponse,
  makeSnapshot,
} from './fixtures.js';
import type { ClassificationResult, HallucinationResult, SessionSnapshot } from '../agents/types.js';

const LIST_TUPLE = 'Topic: python_basics; Focus: Python fundamentals; Question: How does a list differ from a tuple?';
const DICT = 'Topic: python_basics; Focus: Python fundamentals; Question: What is a dict and when would you reach for one?';
const SET_LIST = 'Topic: python_data_structures; Focus: Python data structures; Question: How does a set differ from a list?';

function graderWith(reply: Record<string, unknown> | Error) {
  const chat = vi.fn(async (_params: ChatParams) => {
    if (reply instanceof Error) throw reply;
    return makeLLMResponse(reply);
  });
  return { grader: new GraderPlanner(makeLLM(chat), 'mock-grader'), chat };
}

async function plan(
  reply: Record<string, unknown> | Error,
  options: {
    snapshot?: SessionSnapshot;
    message?: string;
    classification?: ClassificationResult;
    hallucination?: HallucinationResult;
  } = {},
) {
  const { grader } = graderWith(reply);
  return grader.plan(
    options.snapshot ?? makeSnapshot(),
    options.message ?? 'A tuple is immutable, a list is not.',
    options.classification ?? makeClassification(),
    options.hallucination ?? makeHallucination(),
  );
}

describe('decideAction', () => {
  it('applies the priority table in order', () => {
    expect(decideAction('STOP', true, 'ASK')).toBe('WRAP_UP');
    expect(decideAction('ANSWER', true, 'FOLLOW_UP')).toBe('CORRECT_HALLUCINATION');
    expect(decideAction('CANDIDATE_QUESTION', false, 'ASK')).toBe('ANSWER_CANDIDATE');
    expect(decideAction('OFF_TOPIC', false, 'FOLLOW_UP')).toBe('REDIRECT');
    expect(decideAction('GREETING', false, 'GIVE_HINT')).toBe('ASK');
  });

  it('keeps an ASK, FOLLOW_UP or GIVE_HINT proposal for answers', () => {
    expect(decideAction('ANSWER', false, 'FOLLOW_UP')).toBe('FOLLOW_UP');
    expect(decideAction('ANSWER', false, 'GIVE_HINT')).toBe('GIVE_HINT');
  });

  it('falls back to ASK for other proposals', () => {
    expect(decideAction('ANSWER', false, 'WRAP_UP')).toBe('ASK');
    expect(decideAction('ANSWER', false, null)).toBe('ASK');
  });
});

describe('normalizeAction', () => {
  it('normalizes spelling and aliases', () => {
    expect(normalizeAction('follow-up')).toBe('FOLLOW_UP');
    expect(normalizeAction('hint')).toBe('GIVE_HINT');
    expect(normalizeAction('redirect to interview')).toBe('REDIRECT');
  });

  it('returns null for unknown or missing actions', () => {
    expect(normalizeAction('dance')).toBeNull();
    expect(normalizeAction(null)).toBeNull();
  });
});

describe('flattenBlueprint', () => {
  it('orders known keys first and appends the rest', () => {
    expect(flattenBlueprint({ question: 'What is a JOIN?', level: 3, topic: 'sql_basics' }))
      .toBe('Topic: sql_basics; Question: What is a JOIN?; level: 3');
  });

  it('trims strings and drops empty values', () => {
    expect(flattenBlueprint('  Ask about JOINs  ')).toBe('Ask about JOINs');
    expect(flattenBlueprint('   ')).toBeNull();
    expect(flattenBlueprint({})).toBeNull();
    expect(flattenBlueprint(null)).toBeNull();
  });
});

describe('GraderPlanner.plan', () => {
  it('turns a strong answer into a frozen directive with delta 0', async () => {
    const outcome = await plan({
      next_action: 'FOLLOW_UP',
      next_topic: 'python_basics',
      question_blueprint: 'Topic: python_basics; Question: When would you pick a tuple?',
      answer_score: 0.85,
      soft_signals: { clarity: 0.9, honesty: 0.8, engagement: 0.7 },
      internal_thoughts: 'Solid answer',
      difficulty_delta: 1,
    }, { snapshot: makeSnapshot({ current_topic: 'python_basics' }) });

    expect(outcome.kind).toBe('parsed');
    const directive = outcome.value;
    expect(Object.isFrozen(directive)).toBe(true);
    expect(directive).toMatchObject({
      input_category: 'ANSWER',
      next_action: 'FOLLOW_UP',
      next_topic: 'python_basics',
      difficulty_delta: 0,
      question_blueprint: 'Topic: python_basics; Question: When would you pick a tuple?',
      answer_score: 0.85,
      gaps_found: [],
      correct_answer: null,
      soft_signals: { clarity: 0.9, honesty: 0.8, engagement: 0.7 },
    });
    expect(directive.reasoning.entries).toEqual([{
      source: 'grader_planner',
      message: 'Solid answer',
      data: { action: 'FOLLOW_UP', topic: 'python_basics', score: 0.85, proposed_difficulty_delta: 1 },
    }]);
  });

  it('records placeholders when a weak answer comes without gaps', async () => {
    const outcome = await plan({
      next_action: 'ASK',
      question_blueprint: 'Topic: python_basics; Question: What is mutability?',
      answer_score: 0.4,
      detected_issue: 'Confused list and tuple mutability',
    });
    const directive = outcome.value;
    expect(directive.gaps_found).toEqual(['Confused list and tuple mutability']);
    expect(directive.correct_answer).toBe('Revisit: Confused list and tuple mutability');
    expect(directive.reasoning.entries.map((e) => e.message)).toEqual([
      'no reasoning given',
      'gaps missing for a weak answer, placeholder recorded',
      'correct answer missing for a weak answer, placeholder recorded',
    ]);
  });

  it('uses generic placeholders when no issue is named either', async () => {
    const outcome = await plan({ next_action: 'ASK', question_blueprint: 'Ask about sets', answer_score: 0.2 });
    expect(outcome.value.gaps_found).toEqual(['Answer below the expected level; gaps not itemized']);
    expect(outcome.value.correct_answer).toBe('Review the expected answer for this question');
  });

  it('keeps gaps the grader itemized', async () => {
    const outcome = await plan({
      question_blueprint: 'Ask about sets',
      answer_score: 0.5,
      gaps_found: ['Did not mention hashing'],
      correct_answer_for_gaps: 'Sets are backed by hash tables',
    });
    expect(outcome.value.gaps_found).toEqual(['Did not mention hashing']);
    expect(outcome.value.correct_answer).toBe('Sets are backed by hash tables');
    expect(outcome.value.reasoning.entries).toHaveLength(1);
  });

  it('scores an answer without a score as neutral', async () => {
    const outcome = await plan({ next_action: 'ASK', question_blueprint: 'Ask about sets' });
    expect(outcome.value.answer_score).toBe(0.5);
    expect(outcome.value.reasoning.entries[1]?.message).toBe('answer score missing, using 0.5');
  });

  it('clears scoring fields for a candidate question and overrides the proposal', async () => {
    const outcome = await plan({
      next_action: 'ASK',
      question_blueprint: 'Ask about sets',
      answer_score: 0.9,
      gaps_found: ['irrelevant'],
      correct_answer_for_gaps: 'irrelevant',
    }, {
      message: '  What stack does the team use? ',
      classification: makeClassification({ category: 'CANDIDATE_QUESTION' }),
    });
    const directive = outcome.value;
    expect(directive.next_action).toBe('ANSWER_CANDIDATE');
    expect(directive.candidate_question).toBe('What stack does the team use?');
    expect(directive.answer_score).toBeNull();
    expect(directive.gaps_found).toEqual([]);
    expect(directive.correct_answer).toBeNull();
    expect(directive.reasoning.entries[1]).toEqual({
      source: 'grader_planner',
      message: 'proposed ASK overridden by priority table: ANSWER_CANDIDATE',
      data: { proposed: 'ASK', action: 'ANSWER_CANDIDATE' },
    });
  });

  it('corrects a flagged hallucination and names the claim', async () => {
    const outcome = await plan({ next_action: 'FOLLOW_UP', answer_score: 0.1, question_blueprint: 'Ask about the GIL' }, {
      hallucination: makeHallucination({
        is_hallucination: true,
        claim: 'Python 4 removed the GIL',
        correction: 'Python 4 has not been released',
      }),
    });
    const directive = outcome.value;
    expect(directive.next_action).toBe('CORRECT_HALLUCINATION');
    expect(directive.is_hallucination).toBe(true);
    expect(directive.hallucination_correction).toBe('Python 4 has not been released');
    expect(directive.detected_issue).toBe('False claim: Python 4 removed the GIL');
  });

  it('replaces a repeated blueprint with an unasked bank question', async () => {
    const snapshot = makeSnapshot({
      current_topic: 'python_basics',
      last_questions: [LIST_TUPLE],
      topics: { python_basics: { asked_count: 1, total_score: 0.9, last_score: 0.9, gaps: [], correct_answers: [] } },
    });
    const repeated = 'topic: python_basics;  focus: python fundamentals; question: how does a list differ from a tuple?';
    const outcome = await plan({ next_action: 'ASK', next_topic: 'python_basics', question_blueprint: repeated, answer_score: 0.9 }, { snapshot });

    expect(outcome.value.question_blueprint).toBe(SET_LIST);
    expect(outcome.value.next_topic).toBe('python_data_structures');
    expect(outcome.value.reasoning.entries[1]).toEqual({
      source: 'grader_planner',
      message: 'repeated blueprint replaced',
      data: { repeated, replacement: SET_LIST },
    });
  });

  it('fills a missing blueprint for ASK from the bank', async () => {
    const outcome = await plan({ next_action: 'ASK', answer_score: 0.9 });
    expect(outcome.value.question_blueprint).toBe(LIST_TUPLE);
    expect(outcome.value.next_topic).toBe('python_basics');
    expect(outcome.value.reasoning.entries[1]).toEqual({
      source: 'grader_planner',
      message: 'blueprint missing, taken from the question bank',
      data: { blueprint: LIST_TUPLE },
    });
  });

  it('skips recently asked blueprints when filling from the bank', async () => {
    const outcome = await plan({ next_action: 'ASK', answer_score: 0.9 }, { snapshot: makeSnapshot({ last_questions: [LIST_TUPLE] }) });
    expect(outcome.value.question_blueprint).toBe(DICT);
  });

  it('merges the do-not-ask list with recent blueprints', async () => {
    const outcome = await plan(
      { next_action: 'FOLLOW_UP', question_blueprint: 'Ask about sets', answer_score: 0.9, do_not_ask: ['b', 'C'] },
      { snapshot: makeSnapshot({ last_questions: ['A', 'B'] }) },
    );
    expect(outcome.value.do_not_ask).toEqual(['A', 'B', 'C']);
  });

  it('keeps only facts that are new', async () => {
    const outcome = await plan(
      {
        next_action: 'FOLLOW_UP',
        question_blueprint: 'Ask about sets',
        answer_score: 0.9,
        facts_learned: ['works with Django', 'Uses PostgreSQL', 'uses postgresql'],
      },
      { snapshot: makeSnapshot({ known_facts: ['Works  with DJANGO'] }) },
    );
    expect(outcome.value.facts_learned).toEqual(['Uses PostgreSQL']);
  });

  it('falls back to a deterministic directive when the service fails', async () => {
    const outcome = await plan(new Error('boom'));
    expect(outcome.kind).toBe('fallback');
    expect(outcome).toMatchObject({ reason: 'service error: boom' });
    expect(outcome.value).toEqual({
      input_category: 'ANSWER',
      detected_issue: null,
      is_hallucination: false,
      hallucination_correction: null,
      candidate_question: null,
      next_action: 'ASK',
      next_topic: 'python_basics',
      difficulty_delta: 0,
      question_blueprint: LIST_TUPLE,
      do_not_ask: [],
      answer_score: 0.5,
      gaps_found: [],
      correct_answer: null,
      soft_signals: NEUTRAL_SOFT_SIGNALS,
      facts_learned: [],
      reasoning: {
        entries: [{
          source: 'grader_planner',
          message: '[Fallback] service error: boom; action ASK derived from classification',
          fallback: true,
        }],
      },
    });
  });
});

describe('fallbackDirective', () => {
  it('wraps up on STOP with no score and no blueprint', () => {
    const directive = fallbackDirective(
      makeSnapshot({ current_topic: 'sql_basics' }),
      'стоп',
      makeClassification({ category: 'STOP' }),
      makeHallucination(),
      'unparseable output',
    );
    expect(directive.next_action).toBe('WRAP_UP');
    expect(directive.answer_score).toBeNull();
    expect(directive.question_blueprint).toBeNull();
    expect(directive.next_topic).toBe('sql_basics');
  });

  it('corrects a flagged claim', () => {
    const directive = fallbackDirective(
      makeSnapshot(),
      'Python 4 removed the GIL',
      makeClassification(),
      makeHallucination({ is_hallucination: true, claim: 'Python 4 removed the GIL', correction: 'No Python 4 exists' }),
      'unparseable output',
    );
    expect(directive.next_action).toBe('CORRECT_HALLUCINATION');
    expect(directive.detected_issue).toBe('Python 4 removed the GIL');
    expect(directive.hallucination_correction).toBe('No Python 4 exists');
    expect(directive.question_blueprint).toBeNull();
  });

  it('keeps the candidate question text', () => {
    const directive = fallbackDirective(
      makeSnapshot(),
      ' Is the team remote? ',
      makeClassification({ category: 'CANDIDATE_QUESTION' }),
      makeHallucination(),
      'unparseable output',
    );
    expect(directive.next_action).toBe('ANSWER_CANDIDATE');
    expect(directive.candidate_question).toBe('Is the team remote?');
  });
});
