import { FontResolutionError } from '../../src/core/errors.js';
import type { FontDescriptor, FontHandle, FontMeasurer, FontStyle, TextBounds } from '../../src/types/fonts.js';

export type FakeMeasurerOptions = {
  charWidth?: number;
  lineHeight?: number;
  // families that cannot be created at all
  missingFamilies?: string[];
  // styles that fail for every family
  failingStyles?: FontStyle[];
};

/**
 * Monospaced stand-in: every character is `charWidth` wide and every line
 * `lineHeight` tall, so positions in tests are whole numbers.
 */
export class FakeMeasurer implements FontMeasurer {
  readonly created: FontDescriptor[] = [];
  readonly released: FontHandle[] = [];
  private readonly charWidth: number;
  private readonly height: number;
  private readonly missingFamilies: Set<string>;
  private readonly failingStyles: Set<FontStyle>;
  private nextId = 1;

  constructor(options: FakeMeasurerOptions = {}) {
    this.charWidth = options.charWidth ?? 10;
    this.height = options.lineHeight ?? 20;
    this.missingFamilies = new Set(options.missingFamilies ?? []);
    this.failingStyles = new Set(options.failingStyles ?? []);
  }

  createFont(descriptor: FontDescriptor): FontHandle {
    if (this.missingFamilies.has(descriptor.name)) {
      throw new FontResolutionError(descriptor, 'missing family');
    }
    if (this.failingStyles.has(descriptor.style)) {
      throw new FontResolutionError(descriptor, 'missing style');
    }
    this.created.push({ ...descriptor });
    return { id: this.nextId++, descriptor: { ...descriptor } };
  }

  measureText(_font: FontHandle, text: string): TextBounds {
    return { width: text.length * this.charWidth, height: this.height };
  }

  lineHeight(): number {
    return this.height;
  }

  releaseFont(font: FontHandle): void {
    this.released.push(font);
  }
}
