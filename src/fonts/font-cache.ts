import type { FontHandle, FontMeasurer, FontStyle } from '../types/fonts.js';

type Entry = {
  name: string;
  size: number;
  style: FontStyle;
  font: FontHandle;
};

/**
 * Deduplicates font handles by (name, size, style) for one measurer and owns
 * every handle it creates. Documents use a handful of styles, so lookup is a
 * linear scan.
 *
 * A failed construction propagates the measurer's `FontResolutionError` and
 * leaves the cache unchanged; choosing a substitute is the caller's job.
 */
export class FontCache {
  private readonly measurer: FontMeasurer;
  private cache: Entry[] = [];
  private disposed = false;

  constructor(measurer: FontMeasurer) {
    this.measurer = measurer;
  }

  get size(): number {
    return this.cache.length;
  }

  getOrCreate(name: string, size: number, style: FontStyle): FontHandle {
    if (this.disposed) {
      throw new Error('FontCache has been disposed');
    }

    for (const e of this.cache) {
      if (e.name === name && e.size === size && e.style === style) return e.font;
    }

    const font = this.measurer.createFont({ name, size, style });
    this.cache.push({ name, size, style, font });
    return font;
  }

  /**
   * First handle ever created, the usual substitute when a style fails. With
   * `size`, only handles of that size qualify.
   */
  first(size?: number): FontHandle | null {
    const entry = size === undefined ? this.cache[0] : this.cache.find((e) => e.size === size);
    return entry?.font ?? null;
  }

  entries(): FontHandle[] {
    return this.cache.map((e) => e.font);
  }

  usesMeasurer(measurer: FontMeasurer): boolean {
    return this.measurer === measurer;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const entries = this.cache;
    this.cache = [];
    for (const e of entries) {
      this.measurer.releaseFont?.(e.font);
    }
  }
}
