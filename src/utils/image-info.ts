import { PNG } from 'pngjs';
import type { ImageFormat, ImageInfo } from '../types/images.js';

export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  // JPEG: FF D8 FF
  if (bytes[0] === 0xFF && bytes[1] === 0xD8 && bytes[2] === 0xFF) {
    return 'jpeg';
  }

  // PNG: 89 50 4E 47
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4E && bytes[3] === 0x47) {
    return 'png';
  }

  // GIF: 47 49 46 38
  if (bytes[0] === 0x47 && bytes[1] === 0x49 && bytes[2] === 0x46 && bytes[3] === 0x38) {
    return 'gif';
  }

  return null;
}

function readPngSize(bytes: Uint8Array): { width: number; height: number } | null {
  try {
    const png = PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
    return { width: png.width, height: png.height };
  } catch (error) {
    console.debug('Failed to decode PNG image:', error);
    return null;
  }
}

function readGifSize(bytes: Uint8Array): { width: number; height: number } | null {
  if (bytes.length < 10) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return { width: view.getUint16(6, true), height: view.getUint16(8, true) };
}

// Start-of-frame markers carry the dimensions; C4, C8 and CC share the range but are not frames
function isStartOfFrame(marker: number): boolean {
  return marker >= 0xC0 && marker <= 0xCF && marker !== 0xC4 && marker !== 0xC8 && marker !== 0xCC;
}

function readJpegSize(bytes: Uint8Array): { width: number; height: number } | null {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let i = 2;

  while (i + 3 < bytes.length) {
    if (bytes[i] !== 0xFF) return null;
    const marker = bytes[i + 1] ?? 0;

    if (marker === 0xFF) {
      i++;
      continue;
    }
    // markers without a length field
    if (marker === 0x01 || (marker >= 0xD0 && marker <= 0xD9)) {
      i += 2;
      continue;
    }

    const length = view.getUint16(i + 2);
    if (isStartOfFrame(marker)) {
      if (i + 9 > bytes.length) return null;
      return { width: view.getUint16(i + 7), height: view.getUint16(i + 5) };
    }
    i += 2 + length;
  }

  return null;
}

/**
 * Pixel dimensions of an encoded image. Returns null for unknown formats and
 * bytes that do not decode.
 */
export function readImageInfo(bytes: Uint8Array): ImageInfo | null {
  const format = detectImageFormat(bytes);
  if (!format) return null;

  let size: { width: number; height: number } | null = null;
  switch (format) {
    case 'png':
      size = readPngSize(bytes);
      break;
    case 'gif':
      size = readGifSize(bytes);
      break;
    case 'jpeg':
      size = readJpegSize(bytes);
      break;
  }

  if (!size || size.width <= 0 || size.height <= 0) return null;
  return { format, ...size };
}

export function toDataUrl(format: ImageFormat, bytes: Uint8Array): string {
  const base64 = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
  return `data:image/${format};base64,${base64}`;
}
