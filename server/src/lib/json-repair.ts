import logger from './logger.js';

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Append the closers a truncated response never got to. */
function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  const unterminated = inString ? '"' : '';
  return s.replace(/,\s*$/, '') + unterminated + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for model output that may include markdown fences,
 * surrounding prose, trailing commas, unquoted keys or a truncated tail.
 * Returns null when nothing parses.
 */
export function repairJSON(text: string): unknown {
  if (!text || typeof text !== 'string') return null;

  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  const direct = tryParse(cleaned);
  if (direct.ok) return direct.value;

  // Cut the object out of surrounding prose
  const start = cleaned.indexOf('{');
  if (start >= 0) {
    const end = cleaned.lastIndexOf('}');
    cleaned = end > start ? cleaned.slice(start, end + 1) : cleaned.slice(start);
    const sliced = tryParse(cleaned);
    if (sliced.ok) return sliced.value;
  }

  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const trailingFixed = tryParse(noTrailing);
  if (trailingFixed.ok) return trailingFixed.value;

  if (noTrailing.length > 50_000) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return null;
  }

  const quotedKeys = noTrailing
    .replace(/(?<=[\[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"')
    .replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const keysFixed = tryParse(quotedKeys);
  if (keysFixed.ok) return keysFixed.value;

  const closed = closePartial(quotedKeys);
  if (closed !== quotedKeys) {
    const closedParsed = tryParse(closed);
    if (closedParsed.ok) return closedParsed.value;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
