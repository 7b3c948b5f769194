/**
 * Keyword scan that honors a termination request when the classifier
 * cannot be reached. Matching is case-insensitive on whole words; `\b`
 * only knows ASCII word characters, so the boundaries are Unicode-aware
 * lookarounds instead.
 */

export const TERMINATION_KEYWORDS = [
  'стоп',
  'stop',
  'хватит',
  'завершить',
  'закончить',
  'стоп игра',
  'стоп интервью',
  'давай фидбэк',
  'давай feedback',
  'end interview',
  'finish',
] as const;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const patterns = TERMINATION_KEYWORDS.map((keyword) => ({
  keyword,
  pattern: new RegExp(
    `(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword).replace(/ /g, '\\s+')}(?![\\p{L}\\p{N}_])`,
    'iu',
  ),
}));

/** The first termination keyword found in the message, or null. */
export function findTerminationKeyword(message: string): string | null {
  return patterns.find(({ pattern }) => pattern.test(message))?.keyword ?? null;
}

export function isTerminationRequest(message: string): boolean {
  return findTerminationKeyword(message) !== null;
}
