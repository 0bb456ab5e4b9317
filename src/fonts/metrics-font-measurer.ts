import { FontResolutionError } from '../core/errors.js';
import {
  FontStyleFlags,
  type FontDescriptor,
  type FontHandle,
  type FontMeasurer,
  type FontMetricsRecord,
  type TextBounds
} from '../types/fonts.js';
import { getBuiltInFontMetricsDb } from './font-metrics-db.js';
import { normalizeFontName } from './font-name-normalizer.js';
import { hasStyle } from './font-style.js';

type ResolvedFont = {
  record: FontMetricsRecord;
  size: number;
  widthScale: number;
};

// Proportional bold faces run roughly a tenth wider than their regular cut
const BOLD_WIDTH_FACTOR = 1.1;

/**
 * Measures text from tabulated font metrics instead of real font files. Good
 * enough to paginate with the standard PDF faces and fully deterministic.
 */
export class MetricsFontMeasurer implements FontMeasurer {
  private records: FontMetricsRecord[];
  private aliasIndex: Map<string, FontMetricsRecord> = new Map();
  private fonts: Map<FontHandle, ResolvedFont> = new Map();
  private nextId = 1;

  constructor(records: FontMetricsRecord[] = getBuiltInFontMetricsDb()) {
    this.records = records;
    this.rebuildIndex();
  }

  private rebuildIndex(): void {
    this.aliasIndex.clear();
    for (const r of this.records) {
      for (const name of [r.family, ...r.aliases]) {
        const key = normalizeFontName(name).family;
        if (key && !this.aliasIndex.has(key)) this.aliasIndex.set(key, r);
      }
    }
  }

  resolveRecord(name: string): FontMetricsRecord | null {
    const key = normalizeFontName(name).family;
    if (!key) return null;
    return this.aliasIndex.get(key) ?? null;
  }

  createFont(descriptor: FontDescriptor): FontHandle {
    if (!Number.isFinite(descriptor.size) || descriptor.size <= 0) {
      throw new FontResolutionError(descriptor, 'size must be a positive number');
    }

    const record = this.resolveRecord(descriptor.name);
    if (!record) {
      throw new FontResolutionError(descriptor, 'no metrics for this family');
    }

    const style = descriptor.style | normalizeFontName(descriptor.name).styleHint;
    const widthScale =
      record.category !== 'monospace' && hasStyle(style, FontStyleFlags.Bold) ? BOLD_WIDTH_FACTOR : 1;

    const handle: FontHandle = {
      id: this.nextId++,
      descriptor: { ...descriptor }
    };
    this.fonts.set(handle, { record, size: descriptor.size, widthScale });
    return handle;
  }

  measureText(font: FontHandle, text: string): TextBounds {
    const resolved = this.resolve(font);
    const { record, size, widthScale } = resolved;

    let units = 0;
    for (const ch of text) {
      units += this.estimateCharWidthUnits(ch, record);
    }

    return {
      width: (units / record.metrics.unitsPerEm) * size * widthScale,
      height: this.lineHeightOf(resolved)
    };
  }

  lineHeight(font: FontHandle): number {
    return this.lineHeightOf(this.resolve(font));
  }

  releaseFont(font: FontHandle): void {
    this.fonts.delete(font);
  }

  estimateCharWidthUnits(ch: string, record: FontMetricsRecord): number {
    const average = record.averageCharWidth ?? record.metrics.averageWidth;
    if (record.category === 'monospace') return average;

    const overrides = record.charWidthOverrides;
    if (overrides && Object.prototype.hasOwnProperty.call(overrides, ch)) {
      const v = overrides[ch];
      if (typeof v === 'number' && v > 0) return v;
    }

    if (ch === ' ') return record.spaceWidth ?? average;
    if (/[0-9]/.test(ch)) return average * 0.95;
    if (/[A-Z]/.test(ch)) return average * 1.05;
    if (/[,.;:!?]/.test(ch)) return average * 0.55;

    return average;
  }

  private lineHeightOf(font: ResolvedFont): number {
    const m = font.record.metrics;
    return ((m.ascent - m.descent + m.lineGap) / m.unitsPerEm) * font.size;
  }

  private resolve(font: FontHandle): ResolvedFont {
    const resolved = this.fonts.get(font);
    if (!resolved) {
      throw new Error(`Unknown or released font handle #${font.id}`);
    }
    return resolved;
  }
}
