import type { Page } from '../core/page.js';
import { fontStyleToCss } from '../fonts/font-style.js';
import type { FontHandle } from '../types/fonts.js';
import type { CSSOptions, HTMLRenderOptions, Rect } from '../types/output.js';
import { toDataUrl } from '../utils/image-info.js';
import { CSSGenerator } from './css-generator.js';

const DEFAULT_OPTIONS: HTMLRenderOptions = {
  format: 'html+inline-css',
  showBoundingBoxes: false,
  pageGap: 16
};

function px(n: number): string {
  return `${Number(n.toFixed(2))}px`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function quoteFontFamily(family: string): string {
  const raw = String(family || '').trim();
  if (!raw) return 'serif';
  const lower = raw.toLowerCase();
  if (lower === 'serif' || lower === 'sans-serif' || lower === 'monospace') return lower;
  if (/[\s,]/.test(raw)) return `'${raw.replace(/'/g, '')}'`;
  return raw;
}

/**
 * Renders laid-out pages as absolutely positioned HTML, one element per draw
 * instruction. The active font is tracked across `setFont` instructions.
 */
export class PageHTMLRenderer {
  private options: HTMLRenderOptions;
  private cssGenerator: CSSGenerator;

  constructor(options: Partial<HTMLRenderOptions> = {}, cssOptions: Partial<CSSOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.cssGenerator = new CSSGenerator(cssOptions);
  }

  generateCSS(): string {
    return this.cssGenerator.generate(this.options.pageGap);
  }

  renderDocument(pages: readonly Page[]): string {
    const parts: string[] = [];

    parts.push('<!DOCTYPE html>');
    parts.push('<html lang="en">');
    parts.push('<head>');
    parts.push('<meta charset="UTF-8">');
    parts.push(`<title>${escapeHtml(this.options.title ?? 'Document')}</title>`);
    if (this.options.format === 'html+inline-css') {
      parts.push(`<style>${this.generateCSS()}</style>`);
    }
    parts.push('</head>');
    parts.push('<body>');
    parts.push('<div class="pf-document">');

    for (const page of pages) {
      parts.push(this.renderPage(page));
    }

    parts.push('</div>');
    parts.push('</body>');
    parts.push('</html>');

    return parts.join('\n');
  }

  renderPage(page: Page): string {
    const parts: string[] = [];
    let font: FontHandle | null = null;

    parts.push(
      `<div class="pf-page" data-page="${page.index}" style="width: ${px(page.width)}; height: ${px(page.height)}">`
    );

    for (const instr of page) {
      switch (instr.kind) {
        case 'setFont':
          font = instr.font;
          break;
        case 'text':
          parts.push(this.renderText(instr.text, instr.bbox, font));
          break;
        case 'rule': {
          // a rule is a line through the vertical middle of its box
          const y = instr.bbox.y + instr.bbox.height / 2;
          parts.push(
            `<div class="${this.classes('pf-rule')}" style="left: ${px(instr.bbox.x)}; top: ${px(y)}; width: ${px(instr.bbox.width)}"></div>`
          );
          break;
        }
        case 'image': {
          const src = toDataUrl(instr.image.format, instr.image.bytes);
          parts.push(
            `<img class="${this.classes('pf-image')}" src="${src}" alt="${escapeHtml(instr.image.id)}" style="${this.boxStyle(instr.bbox)}">`
          );
          break;
        }
      }
    }

    parts.push('</div>');
    return parts.join('\n');
  }

  private renderText(text: string, bbox: Rect, font: FontHandle | null): string {
    const style: string[] = [`left: ${px(bbox.x)}`, `top: ${px(bbox.y)}`];

    if (font) {
      const { name, size, style: fontStyle } = font.descriptor;
      const css = fontStyleToCss(fontStyle);
      style.push(`font-family: ${quoteFontFamily(name)}`);
      style.push(`font-size: ${px(size)}`);
      if (css.fontWeight !== 400) style.push(`font-weight: ${css.fontWeight}`);
      if (css.fontStyle !== 'normal') style.push(`font-style: ${css.fontStyle}`);
      if (css.textDecoration !== 'none') style.push(`text-decoration: ${css.textDecoration}`);
    }

    return `<span class="${this.classes('pf-text')}" style="${style.join('; ')}">${escapeHtml(text)}</span>`;
  }

  private boxStyle(bbox: Rect): string {
    return `left: ${px(bbox.x)}; top: ${px(bbox.y)}; width: ${px(bbox.width)}; height: ${px(bbox.height)}`;
  }

  private classes(base: string): string {
    return this.options.showBoundingBoxes ? `${base} pf-bbox` : base;
  }
}
