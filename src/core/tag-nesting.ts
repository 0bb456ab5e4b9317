import { isVoidTag, normalizeTagName } from './tags.js';

/**
 * Best-effort record of the currently open tags. Markup in the wild is not
 * well formed, so an end tag closes everything opened after its match and an
 * end tag without a match is ignored.
 */
export class TagNesting {
  private stack: string[] = [];
  private readonly maxDepth: number;

  constructor(maxDepth: number) {
    this.maxDepth = maxDepth;
  }

  get depth(): number {
    return this.stack.length;
  }

  recordStart(name: string): void {
    if (isVoidTag(name) || this.stack.length >= this.maxDepth) return;
    this.stack.push(normalizeTagName(name));
  }

  recordEnd(name: string): boolean {
    const idx = this.stack.lastIndexOf(normalizeTagName(name));
    if (idx === -1) return false;
    this.stack.length = idx;
    return true;
  }

  isOpen(name: string): boolean {
    return this.stack.includes(normalizeTagName(name));
  }

  some(predicate: (name: string) => boolean): boolean {
    return this.stack.some(predicate);
  }

  open(): readonly string[] {
    return this.stack;
  }
}
