import type { FontDescriptor } from '../types/fonts.js';

export class LayoutConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutConfigError';
  }
}

export class FontResolutionError extends Error {
  readonly descriptor: FontDescriptor;

  constructor(descriptor: FontDescriptor, reason: string, options?: { cause?: unknown }) {
    super(`Failed to create font "${descriptor.name}" ${descriptor.size}px (style ${descriptor.style}): ${reason}`, options);
    this.name = 'FontResolutionError';
    this.descriptor = { ...descriptor };
  }
}

export class LayoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LayoutError';
  }
}
