import type { FontCache } from '../fonts/font-cache.js';
import type { FontMeasurer } from './fonts.js';
import type { ImageProvider } from './images.js';
import type { Page } from '../core/page.js';

export interface LayoutConfig {
  pageWidth: number;
  pageHeight: number;
  fontName: string;
  fontSize: number;
}

export interface LayoutOptions {
  // Inter-word space as a fraction of the font size
  spaceWidthFactor: number;
  // Tried when the configured font (or a styled variant) cannot be created
  fallbackFontName: string;
  maxTagDepth: number;
  fontCache?: FontCache;
  signal?: AbortSignal;
}

export type Justification = 'left' | 'right' | 'center' | 'justify';

export type PageConsumer = (page: Page) => void;

export interface LayoutDependencies {
  measurer: FontMeasurer;
  images: ImageProvider | null;
  onPage: PageConsumer | null;
}

export interface LayoutSummary {
  pageCount: number;
  aborted: boolean;
  error?: string;
  fontCache: FontCache;
}

export type LayoutPresetName = 'ereader' | 'paperback' | 'phone';
