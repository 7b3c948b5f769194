import { describe, it, expect, vi } from 'vitest';
import { Classifier, fallbackClassification, normalizeCategory } from '../agents/classifier.js';
import type { ChatParams } from '../lib/llm-provider.js';
import { makeLLM, makeLLMResponse, makeSnapshot } from './fixtures.js';
import type { Turn } from '../agents/types.js';

const previousTurn: Turn = {
  turn_id: 1,
  agent_visible_message: 'Hi Alex! How does a list differ from a tuple?',
  user_message: 'Hello, I am Alex',
  internal_thoughts: '',
  topic: 'python_basics',
  score: null,
};

function classifierWith(reply: string | Record<string, unknown> | Error) {
  const chat = vi.fn(async (_params: ChatParams) => {
    if (reply instanceof Error) throw reply;
    return makeLLMResponse(reply);
  });
  return { classifier: new Classifier(makeLLM(chat), 'mock-classifier'), chat };
}

describe('normalizeCategory', () => {
  it('accepts the closed set in any case', () => {
    expect(normalizeCategory('answer')).toBe('ANSWER');
    expect(normalizeCategory(' Candidate question ')).toBe('CANDIDATE_QUESTION');
  });

  it('maps common aliases', () => {
    expect(normalizeCategory('Off-Topic')).toBe('OFF_TOPIC');
    expect(normalizeCategory('termination')).toBe('STOP');
    expect(normalizeCategory('hello')).toBe('GREETING');
  });

  it('returns null for anything else', () => {
    expect(normalizeCategory('banana')).toBeNull();
  });
});

describe('fallbackClassification', () => {
  it('classifies a termination keyword as STOP', () => {
    expect(fallbackClassification('ok, стоп', 'unparseable output')).toEqual({
      category: 'STOP',
      entities: [],
      confidence: 0.5,
      rationale: '[Fallback] unparseable output; termination keyword "стоп" found',
    });
  });

  it('treats everything else as an answer', () => {
    expect(fallbackClassification('A tuple is immutable', 'unparseable output')).toEqual({
      category: 'ANSWER',
      entities: [],
      confidence: 0.5,
      rationale: '[Fallback] unparseable output; treated as an answer',
    });
  });
});

describe('Classifier.classify', () => {
  it('returns the parsed classification', async () => {
    const { classifier } = classifierWith({
      input_type: 'answer',
      detected_entities: ['tuple'],
      confidence: 0.8,
      reasoning: 'explains immutability',
    });
    const outcome = await classifier.classify(makeSnapshot({ turns: [previousTurn] }), 'A tuple is immutable');
    expect(outcome).toEqual({
      kind: 'parsed',
      value: { category: 'ANSWER', entities: ['tuple'], confidence: 0.8, rationale: 'explains immutability' },
    });
  });

  it('asks for JSON from the configured model and marks the first message', async () => {
    const { classifier, chat } = classifierWith({ input_type: 'GREETING' });
    await classifier.classify(makeSnapshot(), 'Hello, I am Alex');
    expect(chat).toHaveBeenCalledTimes(1);
    const params = chat.mock.calls[0][0];
    expect(params).toMatchObject({ model: 'mock-classifier', json: true });
    expect(params.messages[0].content).toContain('Turns so far: 0 (this is the first message)');
  });

  it('keeps GREETING on the first message', async () => {
    const { classifier } = classifierWith({ input_type: 'GREETING', reasoning: 'introduces themselves' });
    const outcome = await classifier.classify(makeSnapshot(), 'Hello, I am Alex');
    expect(outcome.value.category).toBe('GREETING');
  });

  it('turns a later greeting into OFF_TOPIC', async () => {
    const { classifier } = classifierWith({ input_type: 'GREETING', reasoning: 'says hello' });
    const outcome = await classifier.classify(makeSnapshot({ turns: [previousTurn] }), 'Hello again!');
    expect(outcome.kind).toBe('parsed');
    expect(outcome.value.category).toBe('OFF_TOPIC');
    expect(outcome.value.rationale).toBe('says hello (greeting after the first message treated as off-topic)');
  });

  it('falls back on a service error and still honors a stop request', async () => {
    const { classifier } = classifierWith(new Error('connection refused'));
    const outcome = await classifier.classify(makeSnapshot(), 'стоп');
    expect(outcome).toEqual({
      kind: 'fallback',
      reason: 'service error: connection refused',
      value: {
        category: 'STOP',
        entities: [],
        confidence: 0.5,
        rationale: '[Fallback] service error: connection refused; termination keyword "стоп" found',
      },
    });
  });

  it('falls back on unparseable output', async () => {
    const { classifier } = classifierWith('I think this is an answer');
    const outcome = await classifier.classify(makeSnapshot(), 'A tuple is immutable');
    expect(outcome.kind).toBe('fallback');
    expect(outcome.value.category).toBe('ANSWER');
    expect(outcome.value.rationale).toBe('[Fallback] unparseable output; treated as an answer');
  });

  it('falls back on output that fails the schema', async () => {
    const { classifier } = classifierWith({ detected_entities: [] });
    const outcome = await classifier.classify(makeSnapshot(), 'A tuple is immutable');
    expect(outcome).toMatchObject({ kind: 'fallback', reason: 'invalid output: input_type Required' });
  });

  it('falls back on a JSON array', async () => {
    const { classifier } = classifierWith('[1, 2]');
    const outcome = await classifier.classify(makeSnapshot(), 'A tuple is immutable');
    expect(outcome).toMatchObject({ kind: 'fallback', reason: 'invalid output: (root) Expected object, received array' });
  });

  it('falls back on an unknown category', async () => {
    const { classifier } = classifierWith({ input_type: 'BANANA' });
    const outcome = await classifier.classify(makeSnapshot(), 'finish');
    expect(outcome).toMatchObject({ kind: 'fallback', reason: 'unknown category "BANANA"' });
    expect(outcome.value.category).toBe('STOP');
  });
});
