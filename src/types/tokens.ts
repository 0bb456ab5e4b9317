export interface TagAttribute {
  name: string;
  value: string;
}

export type TagKind = 'start' | 'end' | 'empty';

export type TagToken = {
  type: 'tag';
  name: string;
  kind: TagKind;
  attributes: TagAttribute[];
};

export type TextToken = {
  type: 'text';
  text: string;
};

/** Reported by the tokenizer for malformed input; ends the layout pass. */
export type ErrorToken = {
  type: 'error';
  message: string;
};

export type MarkupToken = TagToken | TextToken | ErrorToken;

/**
 * Pull-style producer of markup tokens. Consumed once, strictly in order; a
 * generator is the usual shape.
 */
export type TokenSource = Iterable<MarkupToken>;

export type WordToken =
  | { type: 'word'; text: string; offset: number }
  | { type: 'newline'; offset: number };
