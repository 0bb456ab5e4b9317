export type ImageFormat = 'png' | 'jpeg' | 'gif';

export interface ImageInfo {
  format: ImageFormat;
  width: number;
  height: number;
}

export interface ImageData extends ImageInfo {
  id: string;
  bytes: Uint8Array;
}

/**
 * Resolves an identifier taken from an image tag attribute. `null` means the
 * image is unavailable or undecodable, and the tag is skipped.
 */
export interface ImageProvider {
  getImage(id: string): ImageData | null;
}
