import type { ErrorToken, MarkupToken, TagAttribute, TagToken, TextToken, TokenSource } from '../types/tokens.js';

// Builders for token streams assembled in code, e.g. by an adapter over a
// tokenizer or in tests. Nothing here parses markup.

function toAttributes(attributes: Record<string, string> | TagAttribute[] = {}): TagAttribute[] {
  if (Array.isArray(attributes)) return attributes.map((a) => ({ ...a }));
  return Object.entries(attributes).map(([name, value]) => ({ name, value }));
}

export function text(value: string): TextToken {
  return { type: 'text', text: value };
}

export function startTag(name: string, attributes?: Record<string, string> | TagAttribute[]): TagToken {
  return { type: 'tag', name, kind: 'start', attributes: toAttributes(attributes) };
}

export function endTag(name: string): TagToken {
  return { type: 'tag', name, kind: 'end', attributes: [] };
}

export function emptyTag(name: string, attributes?: Record<string, string> | TagAttribute[]): TagToken {
  return { type: 'tag', name, kind: 'empty', attributes: toAttributes(attributes) };
}

export function parseError(message: string): ErrorToken {
  return { type: 'error', message };
}

/**
 * Wraps tokens in a generator so they can be pulled only once, the same way a
 * streaming tokenizer behaves.
 */
export function tokensFrom(tokens: Iterable<MarkupToken>): TokenSource {
  function* pull(): Generator<MarkupToken, void, undefined> {
    yield* tokens;
  }
  return pull();
}
