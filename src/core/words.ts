import type { WordToken } from '../types/tokens.js';

function isNewlineChar(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

// ASCII whitespace only; a no-break space stays inside its word
function isSeparator(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\f' || ch === '\v';
}

/**
 * Splits a text span into words and newline tokens, e.g. "foo bar\n" yields
 * "foo", "bar" and a newline. "\r\n", "\r" and "\n" each count as one newline;
 * consecutive newlines are not merged, since a newline following another one is
 * how paragraph breaks are detected.
 */
export function* iterateWords(text: string): Generator<WordToken, void, undefined> {
  const end = text.length;
  let curr = 0;

  while (curr < end) {
    const ch = text[curr] ?? '';

    if (isSeparator(ch)) {
      curr++;
      continue;
    }

    if (isNewlineChar(ch)) {
      const offset = curr;
      if (ch === '\r') curr++;
      if (curr < end && text[curr] === '\n') curr++;
      yield { type: 'newline', offset };
      continue;
    }

    const start = curr;
    while (curr < end) {
      const c = text[curr] ?? ' ';
      if (isSeparator(c) || isNewlineChar(c)) break;
      curr++;
    }
    yield { type: 'word', text: text.slice(start, curr), offset: start };
  }
}
