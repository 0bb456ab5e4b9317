import type { FontStyle } from '../types/fonts.js';
import { deriveFontStyleFromName } from './font-style.js';

export type NormalizedFontName = {
  raw: string;
  // Lowercased family key with style, weight and foundry suffixes removed
  family: string;
  styleHint: FontStyle;
};

const FOUNDRY_TOKENS = /\b(psmt|ps|mt|std|pro|otf|ttf)\b/g;
const STYLE_TOKENS =
  /\b(bold|black|heavy|semibold|demibold|medium|light|thin|italic|oblique|regular|roman|reg|bd|it|bi)\b/g;
const WIDTH_TOKENS = /\b(condensed|narrow|expanded)\b/g;

function collapseSpaces(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

// "ABCDEF+Helvetica" is how embedded subsets are named
function stripSubsetPrefix(raw: string): string {
  const m = raw.match(/^[A-Z]{6}\+(.*)$/);
  return m ? (m[1] ?? raw) : raw;
}

function splitWords(s: string): string {
  return s
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/([A-Za-z])(PSMT|MT|PS)\b/g, '$1 $2')
    .replace(/[_/,-]+/g, ' ');
}

export function normalizeFontName(rawName: string): NormalizedFontName {
  const raw = String(rawName ?? '');
  const cleaned = collapseSpaces(stripSubsetPrefix(raw));
  const words = splitWords(cleaned).toLowerCase();

  let family = collapseSpaces(words.replace(FOUNDRY_TOKENS, ''));
  const withoutStyle = collapseSpaces(family.replace(STYLE_TOKENS, '').replace(WIDTH_TOKENS, ''));
  // "Times Roman" must keep a family when everything after it is a style word
  if (withoutStyle) family = withoutStyle;

  return {
    raw,
    family,
    styleHint: deriveFontStyleFromName(words)
  };
}
