import { FontStyleFlags, type FontStyle, type FontStyleFlag } from '../types/fonts.js';

const TRACKED_FLAGS: readonly FontStyleFlag[] = [
  FontStyleFlags.Bold,
  FontStyleFlags.Italic,
  FontStyleFlags.Underline,
  FontStyleFlags.Strikeout
];

/**
 * Open count per style flag, so `<b>a<b>b</b>c</b>` keeps "c" bold. A flag is
 * active while its count is above zero.
 */
export class StyleState {
  private counts: Map<FontStyleFlag, number> = new Map();

  push(flag: FontStyleFlag): FontStyle {
    this.counts.set(flag, (this.counts.get(flag) ?? 0) + 1);
    return this.current();
  }

  /** An unmatched close leaves the count at zero. */
  pop(flag: FontStyleFlag): FontStyle {
    const n = this.counts.get(flag) ?? 0;
    if (n > 0) this.counts.set(flag, n - 1);
    return this.current();
  }

  depth(flag: FontStyleFlag): number {
    return this.counts.get(flag) ?? 0;
  }

  current(): FontStyle {
    let style: FontStyle = FontStyleFlags.Regular;
    for (const flag of TRACKED_FLAGS) {
      if ((this.counts.get(flag) ?? 0) > 0) style |= flag;
    }
    return style;
  }
}
