import { FontCache } from '../fonts/font-cache.js';
import { describeFontStyle } from '../fonts/font-style.js';
import type {
  Justification,
  LayoutConfig,
  LayoutDependencies,
  LayoutOptions,
  LayoutSummary,
  PageConsumer
} from '../types/config.js';
import { FontStyleFlags, type FontHandle, type FontMeasurer, type FontStyle, type FontStyleFlag } from '../types/fonts.js';
import type { ImageData, ImageProvider } from '../types/images.js';
import type { TagToken, TokenSource, WordToken } from '../types/tokens.js';
import { createDebugLogger } from '../utils/debug.js';
import { resolveLayoutOptions, validateLayoutConfig } from './config.js';
import { FontResolutionError, LayoutConfigError, LayoutError } from './errors.js';
import { justifyLine, parseJustification } from './justify.js';
import { Page } from './page.js';
import { StyleState } from './style-state.js';
import { TagNesting } from './tag-nesting.js';
import { classifyTag, findAttributes, getAttribute, isSuppressingTag } from './tags.js';
import { iterateWords } from './words.js';

type LayoutState = {
  // cursor within the current page
  x: number;
  y: number;
  styles: StyleState;
  style: FontStyle;
  font: FontHandle;
  justification: Justification;
  // consecutive newline tokens seen since the last word
  newLinesCount: number;
  page: Page;
  // index of the first instruction of the line being built
  lineStart: number;
  tagNesting: TagNesting;
  pagesEmitted: number;
};

const IMAGE_ID_ATTRIBUTES = ['src', 'recindex'] as const;

/**
 * Turns markup tokens into pages of positioned draw instructions in a single
 * pass: word wrapping, paragraph detection, justification, style changes and
 * pagination of text, rules and images.
 *
 * One instance is one layout session. The constructor resolves the base font
 * and opens the first page; `run` consumes the token source once and hands each
 * finished page to the consumer before starting the next one.
 */
export class LayoutEngine {
  private readonly config: LayoutConfig;
  private readonly options: LayoutOptions;
  private readonly measurer: FontMeasurer;
  private readonly images: ImageProvider | null;
  private readonly onPage: PageConsumer | null;
  private readonly fontCache: FontCache;
  private readonly lineSpacing: number;
  private readonly spaceWidth: number;
  private readonly state: LayoutState;
  // styles whose font failed to load, mapped to the substitute in use
  private substitutes: Map<FontStyle, FontHandle> = new Map();
  private started = false;
  private debug = createDebugLogger('[layout]');

  constructor(config: LayoutConfig, deps: LayoutDependencies, options: Partial<LayoutOptions> = {}) {
    this.config = validateLayoutConfig(config);
    this.options = resolveLayoutOptions(options);
    this.measurer = deps.measurer;
    this.images = deps.images;
    this.onPage = deps.onPage;

    const sharedCache = this.options.fontCache;
    if (sharedCache && !sharedCache.usesMeasurer(this.measurer)) {
      throw new LayoutConfigError('fontCache was created for a different FontMeasurer');
    }
    this.fontCache = sharedCache ?? new FontCache(this.measurer);

    const font = this.resolveFont(FontStyleFlags.Regular);
    const lineSpacing = this.measurer.lineHeight(font);
    if (!Number.isFinite(lineSpacing) || lineSpacing <= 0) {
      throw new LayoutError(`Font "${font.descriptor.name}" reports an unusable line height: ${lineSpacing}`);
    }
    this.lineSpacing = lineSpacing;
    this.spaceWidth = this.config.fontSize * this.options.spaceWidthFactor;

    const page = new Page(0, this.config.pageWidth, this.config.pageHeight);
    page.append({ kind: 'setFont', font });
    this.state = {
      x: 0,
      y: 0,
      styles: new StyleState(),
      style: FontStyleFlags.Regular,
      font,
      justification: 'justify',
      newLinesCount: 0,
      page,
      lineStart: page.count,
      tagNesting: new TagNesting(this.options.maxTagDepth),
      pagesEmitted: 0
    };
  }

  run(tokens: TokenSource): LayoutSummary {
    if (this.started) {
      throw new LayoutError('A LayoutEngine lays out a single document; create a new engine per session');
    }
    this.started = true;

    const signal = this.options.signal;
    let error: string | undefined;
    let aborted = false;

    for (const token of tokens) {
      if (signal?.aborted) {
        aborted = true;
        break;
      }
      if (token.type === 'error') {
        error = token.message;
        console.warn('Markup error, ending layout early:', token.message);
        break;
      }
      if (token.type === 'tag') {
        this.handleTag(token);
      } else {
        this.emitText(token.text);
      }
    }

    if (!aborted) {
      // force layout of the last line, then hand over the last page
      this.startNewLine(true);
      this.finishPage();
    }

    this.debug('done', { pages: this.state.pagesEmitted, aborted, error });
    return {
      pageCount: this.state.pagesEmitted,
      aborted,
      error,
      fontCache: this.fontCache
    };
  }

  private resolveFont(style: FontStyle): FontHandle {
    const { fontName, fontSize } = this.config;
    const known = this.substitutes.get(style);
    if (known) return known;

    try {
      return this.fontCache.getOrCreate(fontName, fontSize, style);
    } catch (error) {
      if (!(error instanceof FontResolutionError)) throw error;
      console.warn(`Font "${fontName}" (${describeFontStyle(style)}) unavailable, using a substitute:`, error.message);
      const substitute = this.pickSubstitute(style, error);
      this.substitutes.set(style, substitute);
      return substitute;
    }
  }

  private pickSubstitute(style: FontStyle, original: FontResolutionError): FontHandle {
    // a shared cache may hold handles from documents set at another size
    const first = this.fontCache.first(this.config.fontSize);
    if (first) return first;

    const { fallbackFontName } = this.options;
    const candidates: FontStyle[] = style === FontStyleFlags.Regular ? [style] : [style, FontStyleFlags.Regular];
    for (const candidate of candidates) {
      try {
        return this.fontCache.getOrCreate(fallbackFontName, this.config.fontSize, candidate);
      } catch (error) {
        if (!(error instanceof FontResolutionError)) throw error;
        this.debug('fallback font failed', fallbackFontName, describeFontStyle(candidate), error.message);
      }
    }

    throw new LayoutError(
      `No usable font: "${this.config.fontName}" and fallback "${fallbackFontName}" both failed`,
      { cause: original }
    );
  }

  private setCurrentFont(style: FontStyle): void {
    this.state.style = style;
    this.state.font = this.resolveFont(style);
  }

  private changeFont(flag: FontStyleFlag, addStyle: boolean): void {
    const s = this.state;
    const newStyle = addStyle ? s.styles.push(flag) : s.styles.pop(flag);
    if (newStyle === s.style) return;

    const previous = s.font;
    this.setCurrentFont(newStyle);
    if (s.font !== previous) {
      s.page.append({ kind: 'setFont', font: s.font });
    }
  }

  private isCurrentLineEmpty(): boolean {
    return !this.state.page.hasContent(this.state.lineStart);
  }

  private justifyCurrentLine(mode: Justification): void {
    const s = this.state;
    if (this.isCurrentLineEmpty()) return;

    justifyLine(s.page.textInstructions(s.lineStart), mode, {
      pageWidth: this.config.pageWidth,
      spaceWidth: this.spaceWidth,
      y: s.y
    });
    s.lineStart = s.page.count;
  }

  private startNewLine(isParagraphBreak: boolean): void {
    const s = this.state;
    // no empty lines at the top of a page
    if (s.y === 0 && this.isCurrentLineEmpty()) return;

    // the last line of a justified paragraph is not stretched
    if (isParagraphBreak && s.justification === 'justify') {
      this.justifyCurrentLine('left');
    } else {
      this.justifyCurrentLine(s.justification);
    }

    s.x = 0;
    s.y += this.lineSpacing;
    s.lineStart = s.page.count;
    if (s.y + this.lineSpacing > this.config.pageHeight) {
      this.startNewPage();
    }
  }

  private finishPage(): void {
    const s = this.state;
    const page = s.page;
    if (!page.hasContent()) {
      this.debug('discarding empty page', page.index);
      return;
    }

    s.pagesEmitted++;
    this.debug('page', page.index, { instructions: page.count });
    this.onPage?.(page);
  }

  private startNewPage(): void {
    this.finishPage();

    const s = this.state;
    s.page = new Page(s.pagesEmitted, this.config.pageWidth, this.config.pageHeight);
    s.x = 0;
    s.y = 0;
    s.newLinesCount = 0;
    // pages are self-contained, so the active font is carried over
    s.page.append({ kind: 'setFont', font: s.font });
    s.lineStart = s.page.count;
  }

  private addRule(): void {
    const s = this.state;
    this.startNewLine(true);
    s.x = 0;
    // only taken when a single line is taller than the page
    if (s.y + this.lineSpacing > this.config.pageHeight) {
      this.startNewPage();
    }

    s.page.append({
      kind: 'rule',
      bbox: { x: 0, y: s.y, width: this.config.pageWidth, height: this.lineSpacing }
    });
    this.startNewLine(true);
  }

  private addWord(word: WordToken): void {
    const s = this.state;
    if (word.type === 'newline') {
      // a single newline is soft; the second one in a row is a paragraph break
      s.newLinesCount++;
      if (s.newLinesCount === 2) {
        const needsTwo = s.x !== 0;
        this.startNewLine(true);
        if (needsTwo) this.startNewLine(true);
      }
      return;
    }
    s.newLinesCount = 0;

    const bounds = this.measurer.measureText(s.font, word.text);
    // a word wider than the page still starts its own line and overflows it
    if (!this.isCurrentLineEmpty() && s.x + bounds.width > this.config.pageWidth) {
      this.startNewLine(false);
    }

    s.page.append({
      kind: 'text',
      text: word.text,
      bbox: { x: s.x, y: s.y, width: bounds.width, height: bounds.height }
    });
    s.x += bounds.width + this.spaceWidth;
  }

  private addImage(image: ImageData): void {
    const { pageWidth, pageHeight } = this.config;
    const s = this.state;
    if (!(image.width > 0 && image.height > 0 && Number.isFinite(image.width) && Number.isFinite(image.height))) {
      this.debug('skipping image without dimensions', image.id);
      return;
    }

    // images sit centered on their own lines
    this.startNewLine(false);
    let width = image.width;
    let height = image.height;
    if (pageHeight - s.y < height / 2) {
      this.startNewPage();
    }
    if (width > pageWidth || height > pageHeight - s.y) {
      const factor = Math.min(pageWidth / width, (pageHeight - s.y) / height);
      width *= factor;
      height *= factor;
    }

    s.x = (pageWidth - width) / 2;
    s.page.append({ kind: 'image', image, bbox: { x: s.x, y: s.y, width, height } });
    s.y += height;
    this.startNewLine(false);
  }

  private addImageFromTag(tag: TagToken): void {
    if (!this.images) {
      this.debug('no image provider, skipping', tag.name);
      return;
    }
    for (const attr of findAttributes(tag, IMAGE_ID_ATTRIBUTES)) {
      const image = this.images.getImage(attr.value);
      if (image) {
        this.addImage(image);
        return;
      }
      this.debug('image not found', attr.name, attr.value);
    }
  }

  private handleTag(tag: TagToken): void {
    const s = this.state;
    if (tag.kind === 'start') s.tagNesting.recordStart(tag.name);
    else if (tag.kind === 'end') s.tagNesting.recordEnd(tag.name);

    const action = classifyTag(tag.name);
    switch (action.type) {
      case 'paragraph': {
        this.startNewLine(true);
        s.justification = 'justify';
        const align = tag.kind === 'start' ? getAttribute(tag, 'align') : undefined;
        if (align !== undefined) {
          s.justification = parseJustification(align) ?? 'justify';
        }
        break;
      }
      case 'lineBreak':
        if (tag.kind !== 'end') this.startNewLine(true);
        break;
      case 'rule':
        if (tag.kind !== 'end') this.addRule();
        break;
      case 'style':
        if (tag.kind !== 'empty') this.changeFont(action.flag, tag.kind === 'start');
        break;
      case 'pageBreak':
        if (tag.kind !== 'end') {
          this.justifyCurrentLine(s.justification);
          this.startNewPage();
        }
        break;
      case 'image':
        if (tag.kind !== 'end') this.addImageFromTag(tag);
        break;
      case 'none':
        break;
    }
  }

  private emitText(text: string): void {
    if (this.state.tagNesting.some(isSuppressingTag)) return;
    for (const word of iterateWords(text)) {
      this.addWord(word);
    }
  }
}
