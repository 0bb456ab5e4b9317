import type {
  LayoutConfig,
  LayoutOptions,
  LayoutPresetName,
  LayoutSummary
} from './types/index.js';
import type { FontMeasurer } from './types/fonts.js';
import type { ImageProvider } from './types/images.js';
import type { HTMLRenderOptions } from './types/output.js';
import type { TokenSource } from './types/tokens.js';
import { applyPreset, validateLayoutConfig } from './core/config.js';
import { collectPages } from './core/layout-document.js';
import type { Page } from './core/page.js';
import { FontCache } from './fonts/font-cache.js';
import { MetricsFontMeasurer } from './fonts/metrics-font-measurer.js';
import { PageHTMLRenderer } from './html/html-generator.js';

export type PaginationResult = {
  pages: Page[];
  summary: LayoutSummary;
};

export type PaginatorOptions = {
  measurer?: FontMeasurer;
  images?: ImageProvider | null;
  layoutOptions?: Partial<LayoutOptions>;
  htmlOptions?: Partial<HTMLRenderOptions>;
};

/**
 * Convenience front end: keeps one font cache across documents so repeated
 * layouts with the same geometry reuse their font handles.
 */
export class Paginator {
  private config: LayoutConfig;
  private measurer: FontMeasurer;
  private images: ImageProvider | null;
  private layoutOptions: Partial<LayoutOptions>;
  private htmlOptions: Partial<HTMLRenderOptions>;
  private fontCache: FontCache;

  constructor(config: LayoutConfig | LayoutPresetName = 'ereader', options: PaginatorOptions = {}) {
    this.config = typeof config === 'string' ? applyPreset(config) : validateLayoutConfig({ ...config });
    this.measurer = options.measurer ?? new MetricsFontMeasurer();
    this.images = options.images ?? null;
    this.layoutOptions = options.layoutOptions ?? {};
    this.htmlOptions = options.htmlOptions ?? {};
    this.fontCache = this.layoutOptions.fontCache ?? new FontCache(this.measurer);
  }

  getConfig(): LayoutConfig {
    return { ...this.config };
  }

  // Chainable configuration methods
  setPageSize(pageWidth: number, pageHeight: number): this {
    this.config = validateLayoutConfig({ ...this.config, pageWidth, pageHeight });
    return this;
  }

  setFont(fontName: string, fontSize: number = this.config.fontSize): this {
    this.config = validateLayoutConfig({ ...this.config, fontName, fontSize });
    return this;
  }

  setImageProvider(images: ImageProvider | null): this {
    this.images = images;
    return this;
  }

  applyPreset(preset: LayoutPresetName): this {
    this.config = applyPreset(preset);
    return this;
  }

  paginate(tokens: TokenSource): PaginationResult {
    return collectPages(this.config, tokens, this.measurer, this.images, {
      ...this.layoutOptions,
      fontCache: this.fontCache
    });
  }

  toHTML(tokens: TokenSource): { html: string; summary: LayoutSummary } {
    const { pages, summary } = this.paginate(tokens);
    const renderer = new PageHTMLRenderer(this.htmlOptions);
    return { html: renderer.renderDocument(pages), summary };
  }

  /** Releases every font handle; pages produced earlier must not be rendered afterwards. */
  dispose(): void {
    this.fontCache.dispose();
  }
}

export * from './types/index.js';
export * from './core/index.js';
export { FontCache } from './fonts/font-cache.js';
export { MetricsFontMeasurer } from './fonts/metrics-font-measurer.js';
export { FontkitFontMeasurer } from './fonts/fontkit-font-measurer.js';
export { getBuiltInFontMetricsDb, parseFontMetricsRecord } from './fonts/font-metrics-db.js';
export { normalizeFontName } from './fonts/font-name-normalizer.js';
export { describeFontStyle, fontStyleToCss, deriveFontStyleFromName, hasStyle } from './fonts/font-style.js';
export { PageHTMLRenderer } from './html/html-generator.js';
export { CSSGenerator } from './html/css-generator.js';
export { MemoryImageProvider, FileImageProvider } from './utils/image-provider.js';
export { readImageInfo, detectImageFormat, toDataUrl } from './utils/image-info.js';
export { createDebugLogger, isDebugEnabled } from './utils/debug.js';
