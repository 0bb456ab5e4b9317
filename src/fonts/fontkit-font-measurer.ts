import * as fontkit from 'fontkit';
import { FontResolutionError } from '../core/errors.js';
import {
  FontStyleFlags,
  type FontDescriptor,
  type FontFace,
  type FontHandle,
  type FontMeasurer,
  type TextBounds
} from '../types/fonts.js';
import { normalizeFontName } from './font-name-normalizer.js';
import { hasStyle } from './font-style.js';

type GlyphRunLike = {
  advanceWidth: number;
};

type FontLike = {
  unitsPerEm: number;
  ascent: number;
  descent: number;
  lineGap: number;
  layout: (text: string) => GlyphRunLike;
};

type LoadedFont = {
  face: FontLike;
  size: number;
};

function isFontLike(value: unknown): value is FontLike {
  return (
    typeof value === 'object' &&
    value !== null &&
    'layout' in value &&
    typeof value.layout === 'function' &&
    'unitsPerEm' in value &&
    typeof value.unitsPerEm === 'number' &&
    'ascent' in value &&
    typeof value.ascent === 'number' &&
    'descent' in value &&
    typeof value.descent === 'number' &&
    'lineGap' in value &&
    typeof value.lineGap === 'number'
  );
}

// .ttc/.otc files open as a collection; the first face stands for the file
function firstFace(opened: unknown): FontLike | null {
  if (isFontLike(opened)) return opened;
  if (typeof opened === 'object' && opened !== null && 'fonts' in opened && Array.isArray(opened.fonts)) {
    const face: unknown = opened.fonts[0];
    return isFontLike(face) ? face : null;
  }
  return null;
}

function pickFile(face: FontFace, style: number): string {
  const bold = hasStyle(style, FontStyleFlags.Bold);
  const italic = hasStyle(style, FontStyleFlags.Italic);
  if (bold && italic) return face.boldItalic ?? face.bold ?? face.italic ?? face.regular;
  if (bold) return face.bold ?? face.regular;
  if (italic) return face.italic ?? face.regular;
  return face.regular;
}

/**
 * Measures with real font files through fontkit. Faces are registered by family;
 * a style without its own file falls back to the regular file.
 */
export class FontkitFontMeasurer implements FontMeasurer {
  private faces: Map<string, FontFace> = new Map();
  private files: Map<string, FontLike> = new Map();
  private fonts: Map<FontHandle, LoadedFont> = new Map();
  private nextId = 1;

  constructor(faces: FontFace[]) {
    for (const face of faces) {
      this.registerFace(face);
    }
  }

  registerFace(face: FontFace): void {
    for (const name of [face.family, ...(face.aliases ?? [])]) {
      const key = normalizeFontName(name).family;
      if (key) this.faces.set(key, face);
    }
  }

  createFont(descriptor: FontDescriptor): FontHandle {
    if (!Number.isFinite(descriptor.size) || descriptor.size <= 0) {
      throw new FontResolutionError(descriptor, 'size must be a positive number');
    }

    const normalized = normalizeFontName(descriptor.name);
    const face = this.faces.get(normalized.family);
    if (!face) {
      throw new FontResolutionError(descriptor, 'no font file registered for this family');
    }

    const file = pickFile(face, descriptor.style | normalized.styleHint);
    const loaded = this.openFile(file, descriptor);

    const handle: FontHandle = { id: this.nextId++, descriptor: { ...descriptor } };
    this.fonts.set(handle, { face: loaded, size: descriptor.size });
    return handle;
  }

  measureText(font: FontHandle, text: string): TextBounds {
    const loaded = this.resolve(font);
    const run = loaded.face.layout(text);
    return {
      width: (run.advanceWidth / loaded.face.unitsPerEm) * loaded.size,
      height: this.lineHeightOf(loaded)
    };
  }

  lineHeight(font: FontHandle): number {
    return this.lineHeightOf(this.resolve(font));
  }

  releaseFont(font: FontHandle): void {
    this.fonts.delete(font);
  }

  private openFile(file: string, descriptor: FontDescriptor): FontLike {
    const cached = this.files.get(file);
    if (cached) return cached;

    let opened: unknown;
    try {
      opened = fontkit.openSync(file);
    } catch (error) {
      throw new FontResolutionError(descriptor, `cannot open ${file}`, { cause: error });
    }

    const face = firstFace(opened);
    if (!face) {
      throw new FontResolutionError(descriptor, `${file} does not contain a usable font`);
    }
    this.files.set(file, face);
    return face;
  }

  private lineHeightOf(font: LoadedFont): number {
    const f = font.face;
    const gap = Number.isFinite(f.lineGap) ? f.lineGap : 0;
    // fontkit reports descent as a negative number
    return ((f.ascent - f.descent + gap) / f.unitsPerEm) * font.size;
  }

  private resolve(font: FontHandle): LoadedFont {
    const loaded = this.fonts.get(font);
    if (!loaded) {
      throw new Error(`Unknown or released font handle #${font.id}`);
    }
    return loaded;
  }
}
