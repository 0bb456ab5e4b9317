export const FontStyleFlags = {
  Regular: 0,
  Bold: 1,
  Italic: 2,
  Underline: 4,
  Strikeout: 8
} as const;

/** Bitmask of {@link FontStyleFlags}; any combination is valid. */
export type FontStyle = number;

export type FontStyleFlag = Exclude<(typeof FontStyleFlags)[keyof typeof FontStyleFlags], 0>;

export interface FontDescriptor {
  name: string;
  size: number;
  style: FontStyle;
}

/**
 * Opaque font handle. Measurers create them and keep whatever backing data they
 * need keyed by the handle itself.
 */
export interface FontHandle {
  readonly id: number;
  readonly descriptor: Readonly<FontDescriptor>;
}

export interface TextBounds {
  width: number;
  height: number;
}

export interface FontMeasurer {
  /** Throws `FontResolutionError` when the font cannot be constructed. */
  createFont(descriptor: FontDescriptor): FontHandle;
  measureText(font: FontHandle, text: string): TextBounds;
  lineHeight(font: FontHandle): number;
  releaseFont?(font: FontHandle): void;
}

export interface FontMetrics {
  ascent: number;
  descent: number;
  lineGap: number;
  averageWidth: number;
  unitsPerEm: number;
}

export interface FontMetricsRecord {
  id: string;
  family: string;
  aliases: string[];
  category: 'serif' | 'sans-serif' | 'monospace';
  metrics: FontMetrics;
  spaceWidth?: number;
  averageCharWidth?: number;
  charWidthOverrides?: Record<string, number>;
}

export interface FontFace {
  family: string;
  aliases?: string[];
  regular: string;
  bold?: string;
  italic?: string;
  boldItalic?: string;
}
