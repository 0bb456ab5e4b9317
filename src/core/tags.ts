import { FontStyleFlags, type FontStyleFlag } from '../types/fonts.js';
import type { TagAttribute, TagToken } from '../types/tokens.js';

export type TagAction =
  | { type: 'paragraph' }
  | { type: 'lineBreak' }
  | { type: 'rule' }
  | { type: 'style'; flag: FontStyleFlag }
  | { type: 'pageBreak' }
  | { type: 'image' }
  | { type: 'none' };

const STYLE_TAGS: Record<string, FontStyleFlag> = {
  b: FontStyleFlags.Bold,
  strong: FontStyleFlags.Bold,
  i: FontStyleFlags.Italic,
  em: FontStyleFlags.Italic,
  u: FontStyleFlags.Underline,
  strike: FontStyleFlags.Strikeout,
  s: FontStyleFlags.Strikeout,
  del: FontStyleFlags.Strikeout
};

// Text inside these never reaches the page
const SUPPRESSING_TAGS = new Set(['style', 'script']);

// Never closed, so never pushed on the open-tag stack
const VOID_TAGS = new Set(['br', 'hr', 'img', 'meta', 'link', 'input', 'pagebreak', 'mbp:pagebreak']);

export function normalizeTagName(name: string): string {
  return name.trim().toLowerCase();
}

export function classifyTag(name: string): TagAction {
  const tag = normalizeTagName(name);
  switch (tag) {
    case 'p':
      return { type: 'paragraph' };
    case 'br':
      return { type: 'lineBreak' };
    case 'hr':
      return { type: 'rule' };
    case 'pagebreak':
    case 'mbp:pagebreak':
      return { type: 'pageBreak' };
    case 'img':
      return { type: 'image' };
  }

  const flag = Object.prototype.hasOwnProperty.call(STYLE_TAGS, tag) ? STYLE_TAGS[tag] : undefined;
  return flag !== undefined ? { type: 'style', flag } : { type: 'none' };
}

export function isSuppressingTag(name: string): boolean {
  return SUPPRESSING_TAGS.has(normalizeTagName(name));
}

export function isVoidTag(name: string): boolean {
  return VOID_TAGS.has(normalizeTagName(name));
}

export function getAttribute(tag: TagToken, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return tag.attributes.find((a) => a.name.toLowerCase() === wanted)?.value;
}

export function findAttributes(tag: TagToken, names: readonly string[]): TagAttribute[] {
  const wanted = names.map((n) => n.toLowerCase());
  return tag.attributes.filter((a) => wanted.includes(a.name.toLowerCase()));
}
