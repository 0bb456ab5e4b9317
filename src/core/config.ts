import type { LayoutConfig, LayoutOptions, LayoutPresetName } from '../types/config.js';
import { LayoutConfigError } from './errors.js';

export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = {
  // fontSize / 2.5 reads closer to e-reader spacing than the font's own space glyph
  spaceWidthFactor: 0.4,
  fallbackFontName: 'Times New Roman',
  maxTagDepth: 256
};

// Convenience page geometries
export const LayoutPresets: Record<LayoutPresetName, LayoutConfig> = {
  /**
   * 6" e-ink reader at 100 dpi, body text in a serif face
   */
  ereader: {
    pageWidth: 520,
    pageHeight: 700,
    fontName: 'Times New Roman',
    fontSize: 16
  },

  /**
   * Trade paperback text block in points
   */
  paperback: {
    pageWidth: 306,
    pageHeight: 486,
    fontName: 'Times New Roman',
    fontSize: 11
  },

  phone: {
    pageWidth: 360,
    pageHeight: 640,
    fontName: 'Helvetica',
    fontSize: 15
  }
};

function isPositive(n: unknown): n is number {
  return typeof n === 'number' && Number.isFinite(n) && n > 0;
}

export function validateLayoutConfig(config: LayoutConfig): LayoutConfig {
  if (!isPositive(config.pageWidth)) {
    throw new LayoutConfigError(`pageWidth must be a positive number, got ${config.pageWidth}`);
  }
  if (!isPositive(config.pageHeight)) {
    throw new LayoutConfigError(`pageHeight must be a positive number, got ${config.pageHeight}`);
  }
  if (!isPositive(config.fontSize)) {
    throw new LayoutConfigError(`fontSize must be a positive number, got ${config.fontSize}`);
  }
  if (typeof config.fontName !== 'string' || config.fontName.trim() === '') {
    throw new LayoutConfigError('fontName must be a non-empty string');
  }
  return config;
}

export function resolveLayoutOptions(options: Partial<LayoutOptions> = {}): LayoutOptions {
  const resolved: LayoutOptions = { ...DEFAULT_LAYOUT_OPTIONS, ...options };

  if (!Number.isFinite(resolved.spaceWidthFactor) || resolved.spaceWidthFactor < 0) {
    throw new LayoutConfigError(`spaceWidthFactor must be zero or more, got ${resolved.spaceWidthFactor}`);
  }
  if (!Number.isInteger(resolved.maxTagDepth) || resolved.maxTagDepth < 1) {
    throw new LayoutConfigError(`maxTagDepth must be a positive integer, got ${resolved.maxTagDepth}`);
  }
  return resolved;
}

export function isPresetName(name: string): name is LayoutPresetName {
  return Object.prototype.hasOwnProperty.call(LayoutPresets, name);
}

export function applyPreset(name: string, overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  if (!isPresetName(name)) {
    throw new LayoutConfigError(
      `Unknown preset: ${name}. Available presets: ${Object.keys(LayoutPresets).join(', ')}`
    );
  }
  return validateLayoutConfig({ ...LayoutPresets[name], ...overrides });
}
