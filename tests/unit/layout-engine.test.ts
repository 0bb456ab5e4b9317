import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { LayoutConfigError, LayoutError } from '../../src/core/errors.js';
import { layoutDocument } from '../../src/core/layout-document.js';
import { LayoutEngine } from '../../src/core/layout-engine.js';
import { emptyTag, endTag, parseError, startTag, text } from '../../src/core/token-source.js';
import { FontCache } from '../../src/fonts/font-cache.js';
import { FontStyleFlags } from '../../src/types/fonts.js';
import type { MarkupToken } from '../../src/types/tokens.js';
import { FakeMeasurer } from '../helpers/fake-measurer.js';
import { StubImageProvider, TEST_CONFIG, fakeImage, layout, words } from '../helpers/layout.js';

describe('LayoutEngine', () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  describe('text flow', () => {
    it('should place words left to right separated by the space width', () => {
      const { pages } = layout([text('foo bar')]);
      expect(words(pages[0])).toEqual([
        ['foo', 0, 0],
        ['bar', 34, 0]
      ]);
    });

    it('should treat a blank line as a paragraph break', () => {
      const { pages } = layout([text('foo bar\n\nbaz')]);
      expect(words(pages[0])).toEqual([
        ['foo', 0, 0],
        ['bar', 34, 0],
        ['baz', 0, 40]
      ]);
    });

    it('should ignore a single newline', () => {
      const { pages } = layout([text('ab\ncd')]);
      expect(words(pages[0])).toEqual([
        ['ab', 0, 0],
        ['cd', 24, 0]
      ]);
    });

    it('should not add breaks for newlines beyond the second', () => {
      const { pages } = layout([text('ab\n\n\ncd')]);
      expect(words(pages[0])).toEqual([
        ['ab', 0, 0],
        ['cd', 0, 40]
      ]);
    });

    it('should not start a page with blank lines', () => {
      const { pages } = layout([text('\n\nab')]);
      expect(words(pages[0])).toEqual([['ab', 0, 0]]);
    });

    it('should wrap and justify full lines to both edges', () => {
      const { pages } = layout([text('aaaa bbbb cccc')]);
      expect(words(pages[0])).toEqual([
        ['aaaa', 0, 0],
        ['bbbb', 60, 0],
        ['cccc', 0, 20]
      ]);
    });

    it('should let a word wider than the page overflow its own line', () => {
      const { pages } = layout([text('abcdefghijklmn x')]);
      const page = pages[0];
      expect(words(page)).toEqual([
        ['abcdefghijklmn', 0, 0],
        ['x', 0, 20]
      ]);
      expect(page?.textInstructions()[0]?.bbox.width).toBe(140);
    });

    it('should size word boxes from the measurer', () => {
      const { pages } = layout([text('abc')]);
      expect(pages[0]?.textInstructions()[0]?.bbox).toEqual({ x: 0, y: 0, width: 30, height: 20 });
    });

    it('should honour the space width factor', () => {
      const { pages } = layout([text('ab cd')], { layoutOptions: { spaceWidthFactor: 0 } });
      expect(words(pages[0])).toEqual([
        ['ab', 0, 0],
        ['cd', 20, 0]
      ]);
    });

    it('should break lines at br tags', () => {
      const { pages } = layout([text('ab'), emptyTag('br'), text('cd'), endTag('br'), text('ef')]);
      expect(words(pages[0])).toEqual([
        ['ab', 0, 0],
        ['cd', 0, 20],
        ['ef', 24, 20]
      ]);
    });
  });

  describe('paragraph alignment', () => {
    it('should center a paragraph with align="center"', () => {
      const { pages } = layout([startTag('p', { align: 'center' }), text('ab'), endTag('p'), text('cd')]);
      expect(words(pages[0])).toEqual([
        ['ab', 40, 0],
        ['cd', 0, 20]
      ]);
    });

    it('should right-align a paragraph', () => {
      const { pages } = layout([startTag('p', { align: 'RIGHT' }), text('ab cd'), endTag('p')]);
      expect(words(pages[0])).toEqual([
        ['ab', 56, 0],
        ['cd', 80, 0]
      ]);
    });

    it('should fall back to justified text for unknown alignments', () => {
      const { pages } = layout([startTag('p', { align: 'middle' }), text('aaaa bbbb cccc'), endTag('p')]);
      expect(words(pages[0])).toEqual([
        ['aaaa', 0, 0],
        ['bbbb', 60, 0],
        ['cccc', 0, 20]
      ]);
    });

    it('should reset alignment at the next paragraph', () => {
      const { pages } = layout([
        startTag('p', { align: 'right' }),
        text('ab'),
        startTag('p'),
        text('cd')
      ]);
      expect(words(pages[0])).toEqual([
        ['ab', 80, 0],
        ['cd', 0, 20]
      ]);
    });
  });

  describe('pagination', () => {
    const longWord = 'aaaaaaaaaa';

    it('should fit five lines on a page and carry the rest over', () => {
      const { pages, summary } = layout([text(Array(6).fill(longWord).join(' '))]);

      expect(summary.pageCount).toBe(2);
      expect(pages.map((p) => p.index)).toEqual([0, 1]);
      expect(words(pages[0]).map(([, , y]) => y)).toEqual([0, 20, 40, 60, 80]);
      expect(words(pages[1])).toEqual([[longWord, 0, 0]]);
    });

    it('should start every page with the active font', () => {
      const { pages } = layout([text(longWord), startTag('b'), text(Array(6).fill(longWord).join(' '))]);
      const [first, second] = pages;

      expect(first?.instructions[0]?.kind).toBe('setFont');
      const head = second?.instructions[0];
      expect(head?.kind === 'setFont' ? head.font.descriptor.style : -1).toBe(FontStyleFlags.Bold);
    });

    it('should start a new page at a page break', () => {
      const { pages } = layout([text('ab'), emptyTag('mbp:pagebreak'), text('cd')]);
      expect(pages).toHaveLength(2);
      expect(words(pages[0])).toEqual([['ab', 0, 0]]);
      expect(words(pages[1])).toEqual([['cd', 0, 0]]);
    });

    it('should not emit blank pages for repeated or leading page breaks', () => {
      const { pages, summary } = layout([
        emptyTag('pagebreak'),
        text('ab'),
        startTag('mbp:pagebreak'),
        emptyTag('mbp:pagebreak'),
        text('cd')
      ]);
      expect(summary.pageCount).toBe(2);
      expect(pages.map((p) => p.index)).toEqual([0, 1]);
    });

    it('should align the line before a page break with the active alignment', () => {
      const { pages } = layout([startTag('p', { align: 'center' }), text('ab'), emptyTag('pagebreak')]);
      expect(words(pages[0])).toEqual([['ab', 40, 0]]);
    });

    it('should produce no pages for an empty document', () => {
      const { pages, summary } = layout([]);
      expect(pages).toEqual([]);
      expect(summary).toMatchObject({ pageCount: 0, aborted: false });
      expect(summary.error).toBeUndefined();
    });

    it('should count pages without a consumer', () => {
      const tokens = [text('ab'), emptyTag('pagebreak'), text('cd')];
      const summary = layoutDocument(TEST_CONFIG, tokens, new FakeMeasurer(), null, null);
      expect(summary.pageCount).toBe(2);
    });
  });

  describe('rules', () => {
    it('should put a rule on its own line spanning the page', () => {
      const { pages } = layout([text('ab'), emptyTag('hr'), text('cd')]);
      const page = pages[0];

      const rules = page?.instructions.filter((i) => i.kind === 'rule') ?? [];
      expect(rules).toEqual([{ kind: 'rule', bbox: { x: 0, y: 20, width: 100, height: 20 } }]);
      expect(words(page)).toEqual([
        ['ab', 0, 0],
        ['cd', 0, 40]
      ]);
    });

    it('should give a rule its own page when a line is taller than the page', () => {
      const { pages } = layout([text('ab'), emptyTag('hr'), text('cd')], { config: { pageHeight: 10 } });

      expect(pages.map((p) => p.index)).toEqual([0, 1, 2]);
      expect(words(pages[0])).toEqual([['ab', 0, 0]]);
      expect(pages[1]?.instructions.map((i) => i.kind)).toEqual(['setFont', 'rule']);
      expect(pages[1]?.instructions[1]).toEqual({ kind: 'rule', bbox: { x: 0, y: 0, width: 100, height: 20 } });
      expect(words(pages[2])).toEqual([['cd', 0, 0]]);
    });

    it('should ignore closing hr tags', () => {
      const { pages } = layout([text('ab'), endTag('hr')]);
      expect(pages[0]?.instructions.some((i) => i.kind === 'rule')).toBe(false);
    });
  });

  describe('images', () => {
    it('should center an image between lines', () => {
      const images = new StubImageProvider([fakeImage('small', 40, 30)]);
      const { pages } = layout([text('ab'), emptyTag('img', { src: 'small' }), text('cd')], { images });
      const page = pages[0];

      const placed = page?.instructions.find((i) => i.kind === 'image');
      expect(placed?.bbox).toEqual({ x: 30, y: 20, width: 40, height: 30 });
      expect(words(page)).toEqual([
        ['ab', 0, 0],
        ['cd', 0, 70]
      ]);
    });

    it('should scale a wide image to the page width', () => {
      const images = new StubImageProvider([fakeImage('wide', 200, 50)]);
      const { pages, summary } = layout([emptyTag('img', { src: 'wide' })], { images });

      expect(summary.pageCount).toBe(1);
      expect(pages[0]?.instructions.find((i) => i.kind === 'image')?.bbox).toEqual({
        x: 0,
        y: 0,
        width: 100,
        height: 25
      });
    });

    it('should move a tall image to a fresh page and fit it', () => {
      const images = new StubImageProvider([fakeImage('tall', 50, 300)]);
      const { pages, summary } = layout([text('ab'), emptyTag('img', { src: 'tall' })], { images });

      expect(summary.pageCount).toBe(2);
      expect(words(pages[0])).toEqual([['ab', 0, 0]]);

      const bbox = pages[1]?.instructions.find((i) => i.kind === 'image')?.bbox;
      expect(bbox?.y).toBe(0);
      expect(bbox?.height).toBeCloseTo(100);
      expect(bbox?.width).toBeCloseTo(16.667, 3);
      expect(bbox?.x).toBeCloseTo(41.667, 3);
    });

    it('should try src and recindex in order until one resolves', () => {
      const images = new StubImageProvider([fakeImage('00002', 10, 10)]);
      const { pages } = layout(
        [
          emptyTag('img', [
            { name: 'src', value: 'missing.png' },
            { name: 'alt', value: 'ignored' },
            { name: 'recindex', value: '00002' }
          ])
        ],
        { images }
      );

      expect(images.requested).toEqual(['missing.png', '00002']);
      const placed = pages[0]?.instructions.find((i) => i.kind === 'image');
      expect(placed?.kind === 'image' ? placed.image.id : '').toBe('00002');
    });

    it('should skip images that are missing or have no size', () => {
      const images = new StubImageProvider([fakeImage('flat', 10, 0)]);
      const { pages, summary } = layout(
        [text('ab'), emptyTag('img', { src: 'flat' }), emptyTag('img', { src: 'gone' }), text('cd')],
        { images }
      );

      expect(summary.pageCount).toBe(1);
      expect(pages[0]?.instructions.some((i) => i.kind === 'image')).toBe(false);
      expect(words(pages[0])).toEqual([
        ['ab', 0, 0],
        ['cd', 24, 0]
      ]);
    });

    it('should skip images when no provider is given', () => {
      const { pages } = layout([text('ab'), emptyTag('img', { src: 'x' })]);
      expect(pages[0]?.instructions.map((i) => i.kind)).toEqual(['setFont', 'text']);
    });
  });

  describe('styles', () => {
    it('should switch fonts only when the effective style changes', () => {
      const { pages, measurer } = layout([
        text('a'),
        startTag('b'),
        text('b'),
        startTag('strong'),
        text('c'),
        endTag('strong'),
        text('d'),
        endTag('b'),
        text('e')
      ]);
      const instructions = pages[0]?.instructions ?? [];

      expect(instructions.map((i) => i.kind)).toEqual([
        'setFont',
        'text',
        'setFont',
        'text',
        'text',
        'text',
        'setFont',
        'text'
      ]);
      const styles = instructions.flatMap((i) => (i.kind === 'setFont' ? [i.font.descriptor.style] : []));
      expect(styles).toEqual([FontStyleFlags.Regular, FontStyleFlags.Bold, FontStyleFlags.Regular]);
      expect(measurer.created.map((d) => d.style)).toEqual([FontStyleFlags.Regular, FontStyleFlags.Bold]);
    });

    it('should combine nested styles', () => {
      const { pages } = layout([startTag('i'), startTag('u'), text('x')]);
      const fonts = pages[0]?.instructions.flatMap((i) => (i.kind === 'setFont' ? [i.font.descriptor.style] : []));
      expect(fonts).toEqual([
        FontStyleFlags.Regular,
        FontStyleFlags.Italic,
        FontStyleFlags.Italic | FontStyleFlags.Underline
      ]);
    });

    it('should ignore self-closing style tags', () => {
      const { pages } = layout([emptyTag('b'), text('x')]);
      expect(pages[0]?.instructions.map((i) => i.kind)).toEqual(['setFont', 'text']);
    });

    it('should drop text inside style and script elements', () => {
      const { pages } = layout([
        startTag('style'),
        text('p { color: red }'),
        endTag('style'),
        startTag('script'),
        startTag('span'),
        text('alert(1)'),
        endTag('script'),
        text('ok')
      ]);
      expect(words(pages[0])).toEqual([['ok', 0, 0]]);
    });

    it('should stop tracking tags past the maximum depth', () => {
      const { pages } = layout([startTag('div'), startTag('script'), text('x')], {
        layoutOptions: { maxTagDepth: 1 }
      });
      expect(words(pages[0])).toEqual([['x', 0, 0]]);
    });
  });

  describe('fonts', () => {
    it('should substitute the base font for a style that cannot be created', () => {
      const measurer = new FakeMeasurer({ failingStyles: [FontStyleFlags.Bold] });
      const { pages } = layout([text('a'), startTag('b'), text('b'), endTag('b'), startTag('b'), text('c')], {
        measurer
      });

      expect(pages[0]?.instructions.map((i) => i.kind)).toEqual(['setFont', 'text', 'text', 'text']);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should use the fallback family when the configured one is missing', () => {
      const measurer = new FakeMeasurer({ missingFamilies: ['Missing'] });
      const { pages } = layout([text('a')], { measurer, config: { fontName: 'Missing' } });

      const head = pages[0]?.instructions[0];
      expect(head?.kind === 'setFont' ? head.font.descriptor.name : '').toBe('Times New Roman');
    });

    it('should fail when neither the font nor the fallback can be created', () => {
      const measurer = new FakeMeasurer({ missingFamilies: ['Missing', 'Backup'] });
      expect(() =>
        layout([text('a')], {
          measurer,
          config: { fontName: 'Missing' },
          layoutOptions: { fallbackFontName: 'Backup' }
        })
      ).toThrow('No usable font: "Missing" and fallback "Backup" both failed');
    });

    it('should reuse handles from a shared cache across documents', () => {
      const measurer = new FakeMeasurer();
      const fontCache = new FontCache(measurer);

      const first = layout([text('a')], { measurer, layoutOptions: { fontCache } });
      layout([text('b')], { measurer, layoutOptions: { fontCache } });

      expect(first.summary.fontCache).toBe(fontCache);
      expect(measurer.created).toHaveLength(1);
    });

    it('should not substitute a shared handle of another size', () => {
      const measurer = new FakeMeasurer({ missingFamilies: ['Nope'] });
      const fontCache = new FontCache(measurer);
      layout([text('a')], { measurer, layoutOptions: { fontCache } });

      const { pages } = layout([text('ab cd')], {
        measurer,
        config: { fontName: 'Nope', fontSize: 20 },
        layoutOptions: { fontCache }
      });

      const head = pages[0]?.instructions[0];
      expect(head?.kind === 'setFont' ? head.font.descriptor : null).toEqual({
        name: 'Times New Roman',
        size: 20,
        style: FontStyleFlags.Regular
      });
      expect(words(pages[0])).toEqual([
        ['ab', 0, 0],
        ['cd', 28, 0]
      ]);
    });

    it('should refuse a shared cache built for another measurer', () => {
      const fontCache = new FontCache(new FakeMeasurer());
      expect(() => layout([text('a')], { layoutOptions: { fontCache } })).toThrow(LayoutConfigError);
    });
  });

  describe('session control', () => {
    it('should stop at a markup error and keep what was laid out', () => {
      const { pages, summary } = layout([text('ab'), parseError('unexpected end of tag'), text('cd')]);

      expect(summary).toMatchObject({ pageCount: 1, aborted: false, error: 'unexpected end of tag' });
      expect(words(pages[0])).toEqual([['ab', 0, 0]]);
      expect(warn).toHaveBeenCalledWith('Markup error, ending layout early:', 'unexpected end of tag');
    });

    it('should stop without flushing once the signal is aborted', () => {
      const controller = new AbortController();
      function* tokens(): Generator<MarkupToken> {
        yield text('ab');
        controller.abort();
        yield text('cd');
      }
      const onPage = vi.fn();
      const engine = new LayoutEngine(
        TEST_CONFIG,
        { measurer: new FakeMeasurer(), images: null, onPage },
        { signal: controller.signal }
      );

      const summary = engine.run(tokens());

      expect(summary).toMatchObject({ pageCount: 0, aborted: true });
      expect(onPage).not.toHaveBeenCalled();
    });

    it('should lay out only one document per engine', () => {
      const engine = new LayoutEngine(TEST_CONFIG, { measurer: new FakeMeasurer(), images: null, onPage: null });
      engine.run([]);
      expect(() => engine.run([])).toThrow(LayoutError);
    });

    it('should reject an invalid configuration up front', () => {
      expect(() => layout([], { config: { pageWidth: -1 } })).toThrow(LayoutConfigError);
    });
  });
});
