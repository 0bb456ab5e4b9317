import { readFileSync } from 'fs';
import { isAbsolute, relative, resolve } from 'path';
import type { ImageData, ImageProvider } from '../types/images.js';
import { readImageInfo } from './image-info.js';

function normalizeImageId(id: string): string {
  return id.trim().replace(/^\.\//, '');
}

function decode(id: string, bytes: Uint8Array): ImageData | null {
  const info = readImageInfo(bytes);
  if (!info) {
    console.warn(`Image "${id}" could not be decoded, skipping it`);
    return null;
  }
  return { id, bytes, ...info };
}

/**
 * Images held in memory, keyed by the value found in `src` or `recindex`.
 * Decoded dimensions are memoized per id.
 */
export class MemoryImageProvider implements ImageProvider {
  private sources: Map<string, Uint8Array> = new Map();
  private decoded: Map<string, ImageData | null> = new Map();

  constructor(images: Record<string, Uint8Array> | Map<string, Uint8Array> = {}) {
    const entries = images instanceof Map ? images.entries() : Object.entries(images);
    for (const [id, bytes] of entries) {
      this.add(id, bytes);
    }
  }

  add(id: string, bytes: Uint8Array): void {
    const key = normalizeImageId(id);
    this.sources.set(key, bytes);
    this.decoded.delete(key);
  }

  getImage(id: string): ImageData | null {
    const key = normalizeImageId(id);
    if (this.decoded.has(key)) return this.decoded.get(key) ?? null;

    const bytes = this.sources.get(key);
    const image = bytes ? decode(key, bytes) : null;
    this.decoded.set(key, image);
    return image;
  }
}

/** Resolves ids as paths below `baseDir`; anything outside it is not served. */
export class FileImageProvider implements ImageProvider {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  getImage(id: string): ImageData | null {
    const key = normalizeImageId(id);
    if (!key) return null;

    const path = resolve(this.baseDir, key);
    const rel = relative(this.baseDir, path);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      console.warn(`Image "${id}" points outside ${this.baseDir}, skipping it`);
      return null;
    }

    let bytes: Uint8Array;
    try {
      bytes = readFileSync(path);
    } catch (error) {
      console.warn(`Failed to read image "${id}":`, error);
      return null;
    }
    return decode(key, bytes);
  }
}
