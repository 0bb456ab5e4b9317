import type { Justification } from '../types/config.js';
import type { TextInstruction } from '../types/output.js';

export type LineGeometry = {
  pageWidth: number;
  spaceWidth: number;
  y: number;
};

/** Width of the words on a line plus one inter-word space between each pair. */
export function lineContentWidth(words: readonly TextInstruction[], spaceWidth: number): number {
  let dx = -spaceWidth;
  for (const w of words) {
    dx += w.bbox.width + spaceWidth;
  }
  return dx < 0 ? 0 : dx;
}

export function layoutLeftStartingAt(
  words: readonly TextInstruction[],
  offX: number,
  geometry: LineGeometry
): void {
  let x = offX;
  for (const w of words) {
    w.bbox.x = x;
    w.bbox.y = geometry.y;
    x += w.bbox.width + geometry.spaceWidth;
  }
}

/**
 * Spreads the leftover width evenly over the gaps so the first word touches the
 * left edge and the last one the right edge.
 */
export function justifyLineBoth(words: readonly TextInstruction[], geometry: LineGeometry): void {
  const margin = geometry.pageWidth - lineContentWidth(words, geometry.spaceWidth);
  layoutLeftStartingAt(words, 0, geometry);

  const count = words.length;
  const extraSpace = count > 1 ? margin / (count - 1) : margin;
  for (let n = 1; n < count; n++) {
    const w = words[n];
    if (w) w.bbox.x += n * extraSpace;
  }
}

export function justifyLine(
  words: readonly TextInstruction[],
  mode: Justification,
  geometry: LineGeometry
): void {
  if (words.length === 0) return;

  switch (mode) {
    case 'left':
      layoutLeftStartingAt(words, 0, geometry);
      break;
    case 'right':
      layoutLeftStartingAt(words, geometry.pageWidth - lineContentWidth(words, geometry.spaceWidth), geometry);
      break;
    case 'center':
      layoutLeftStartingAt(words, (geometry.pageWidth - lineContentWidth(words, geometry.spaceWidth)) / 2, geometry);
      break;
    case 'justify':
      justifyLineBoth(words, geometry);
      break;
  }
}

export function parseJustification(value: string): Justification | null {
  switch (value.trim().toLowerCase()) {
    case 'left':
      return 'left';
    case 'right':
      return 'right';
    case 'center':
    case 'centre':
      return 'center';
    case 'justify':
      return 'justify';
    default:
      return null;
  }
}
