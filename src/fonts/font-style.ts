import { FontStyleFlags, type FontStyle, type FontStyleFlag } from '../types/fonts.js';

export type CssFontStyle = {
  fontWeight: number;
  fontStyle: 'normal' | 'italic';
  textDecoration: string;
};

const FLAG_NAMES: Array<[FontStyleFlag, string]> = [
  [FontStyleFlags.Bold, 'bold'],
  [FontStyleFlags.Italic, 'italic'],
  [FontStyleFlags.Underline, 'underline'],
  [FontStyleFlags.Strikeout, 'strikeout']
];

function hasToken(s: string, token: string): boolean {
  if (!s) return false;
  return s.includes(token);
}

function hasWord(s: string, word: string): boolean {
  if (!s) return false;
  return new RegExp(`(^|[^a-z0-9])${word}([^a-z0-9]|$)`, 'i').test(s);
}

export function hasStyle(style: FontStyle, flag: FontStyleFlag): boolean {
  return (style & flag) === flag;
}

export function describeFontStyle(style: FontStyle): string {
  const names = FLAG_NAMES.filter(([flag]) => hasStyle(style, flag)).map(([, name]) => name);
  return names.length > 0 ? names.join('+') : 'regular';
}

/**
 * Style hints carried in a face name, e.g. "Times-BoldItalic" or "Arial Bold".
 * Only weight and slant can be read from a name.
 */
export function deriveFontStyleFromName(name: string): FontStyle {
  const s = (name || '').toLowerCase();
  let style: FontStyle = FontStyleFlags.Regular;

  if (
    hasToken(s, 'bold') ||
    hasToken(s, 'black') ||
    hasToken(s, 'heavy') ||
    hasWord(s, 'bd') ||
    hasWord(s, 'bi')
  ) {
    style |= FontStyleFlags.Bold;
  }

  if (
    hasToken(s, 'italic') ||
    hasToken(s, 'oblique') ||
    hasWord(s, 'it') ||
    hasWord(s, 'ital') ||
    hasWord(s, 'bi')
  ) {
    style |= FontStyleFlags.Italic;
  }

  return style;
}

export function fontStyleToCss(style: FontStyle): CssFontStyle {
  const decorations: string[] = [];
  if (hasStyle(style, FontStyleFlags.Underline)) decorations.push('underline');
  if (hasStyle(style, FontStyleFlags.Strikeout)) decorations.push('line-through');

  return {
    fontWeight: hasStyle(style, FontStyleFlags.Bold) ? 700 : 400,
    fontStyle: hasStyle(style, FontStyleFlags.Italic) ? 'italic' : 'normal',
    textDecoration: decorations.length > 0 ? decorations.join(' ') : 'none'
  };
}
