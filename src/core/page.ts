import type { DrawInstruction, TextInstruction } from '../types/output.js';

/**
 * Ordered draw instructions for one page. A page handed to a consumer starts
 * with a `setFont` for the font active when the page was opened, so it renders
 * without replaying earlier pages.
 */
export class Page implements Iterable<DrawInstruction> {
  readonly index: number;
  readonly width: number;
  readonly height: number;
  private drawInstructions: DrawInstruction[] = [];

  constructor(index: number, width: number, height: number) {
    this.index = index;
    this.width = width;
    this.height = height;
  }

  get count(): number {
    return this.drawInstructions.length;
  }

  get instructions(): readonly DrawInstruction[] {
    return this.drawInstructions;
  }

  append(instruction: DrawInstruction): void {
    this.drawInstructions.push(instruction);
  }

  /** True once anything other than a font change was added. */
  hasContent(from = 0): boolean {
    for (let i = from; i < this.drawInstructions.length; i++) {
      if (this.drawInstructions[i]?.kind !== 'setFont') return true;
    }
    return false;
  }

  textInstructions(from = 0): TextInstruction[] {
    const out: TextInstruction[] = [];
    for (let i = from; i < this.drawInstructions.length; i++) {
      const instr = this.drawInstructions[i];
      if (instr?.kind === 'text') out.push(instr);
    }
    return out;
  }

  [Symbol.iterator](): Iterator<DrawInstruction> {
    return this.drawInstructions[Symbol.iterator]();
  }
}
