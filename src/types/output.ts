import type { FontHandle } from './fonts.js';
import type { ImageData } from './images.js';

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type SetFontInstruction = {
  kind: 'setFont';
  font: FontHandle;
};

/** A run of non-whitespace characters; `bbox.x` is final only once its line is. */
export type TextInstruction = {
  kind: 'text';
  text: string;
  bbox: Rect;
};

/** Horizontal separator, drawn through the vertical middle of its box. */
export type RuleInstruction = {
  kind: 'rule';
  bbox: Rect;
};

export type ImageInstruction = {
  kind: 'image';
  image: ImageData;
  bbox: Rect;
};

export type DrawInstruction =
  | SetFontInstruction
  | TextInstruction
  | RuleInstruction
  | ImageInstruction;

export type DrawInstructionKind = DrawInstruction['kind'];

export interface HTMLRenderOptions {
  format: 'html' | 'html+inline-css';
  showBoundingBoxes: boolean;
  pageGap: number;
  title?: string;
}

export interface CSSOptions {
  includeReset: boolean;
  includePrint: boolean;
  customStyles?: string;
}
