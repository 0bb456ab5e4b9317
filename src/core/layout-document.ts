import type { LayoutConfig, LayoutOptions, LayoutSummary, PageConsumer } from '../types/config.js';
import type { FontMeasurer } from '../types/fonts.js';
import type { ImageProvider } from '../types/images.js';
import type { TokenSource } from '../types/tokens.js';
import { LayoutEngine } from './layout-engine.js';
import type { Page } from './page.js';

/**
 * Lays out one document. Pages reach `pageConsumer` in order as soon as they
 * are complete; without a consumer they are counted and dropped.
 *
 * Font handles referenced by the pages belong to `summary.fontCache`; dispose it
 * once the pages are no longer rendered.
 */
export function layoutDocument(
  config: LayoutConfig,
  tokenSource: TokenSource,
  fontMeasurer: FontMeasurer,
  imageProvider: ImageProvider | null,
  pageConsumer: PageConsumer | null,
  options: Partial<LayoutOptions> = {}
): LayoutSummary {
  const engine = new LayoutEngine(
    config,
    { measurer: fontMeasurer, images: imageProvider, onPage: pageConsumer },
    options
  );
  return engine.run(tokenSource);
}

export function collectPages(
  config: LayoutConfig,
  tokenSource: TokenSource,
  fontMeasurer: FontMeasurer,
  imageProvider: ImageProvider | null = null,
  options: Partial<LayoutOptions> = {}
): { pages: Page[]; summary: LayoutSummary } {
  const pages: Page[] = [];
  const summary = layoutDocument(config, tokenSource, fontMeasurer, imageProvider, (page) => pages.push(page), options);
  return { pages, summary };
}
