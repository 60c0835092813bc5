/**
 * Image probing for image slides.
 * Reads an image, checks that it decodes, and sizes it for placement.
 */

import { readFile } from 'fs/promises';
import sharp from 'sharp';
import type { ImageMimeType, SlideImage } from '@deckhand/shared';
import { ResourceNotFoundError } from '../errors.js';

/** Area an image may occupy below the slide title, in inches. */
export const IMAGE_BOX = { width: 8, height: 4.2 } as const;

/** Top-left corner of a placed image, in inches. */
export const IMAGE_OFFSET = { x: 1, y: 1.2 } as const;

const DEFAULT_DPI = 96;

const EMBEDDABLE: Record<string, ImageMimeType> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
};

/**
 * Scale (width, height) down to fit the image box, keeping the aspect ratio.
 * Images that already fit keep their natural size.
 */
export function fitToBox(width: number, height: number): { width: number; height: number } {
  const scale = Math.min(1, IMAGE_BOX.width / width, IMAGE_BOX.height / height);
  return {
    width: round(width * scale),
    height: round(height * scale),
  };
}

/**
 * Decode image bytes into a SlideImage. Formats a presentation cannot embed
 * directly (WebP, TIFF, AVIF, ...) are converted to PNG.
 * `label` names the image in errors.
 */
export async function imageFromBytes(input: Uint8Array, label: string): Promise<SlideImage> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(input).metadata();
  } catch (err) {
    throw new ResourceNotFoundError(label, 'is not a readable image', { cause: err });
  }

  const { width, height } = metadata;
  if (!width || !height) {
    throw new ResourceNotFoundError(label, 'has no dimensions');
  }

  const dpi = metadata.density && metadata.density > 0 ? metadata.density : DEFAULT_DPI;
  const size = fitToBox(width / dpi, height / dpi);

  const mimeType = metadata.format ? EMBEDDABLE[metadata.format] : undefined;
  if (mimeType) {
    return { data: Uint8Array.from(input), mimeType, ...size };
  }

  try {
    const png = await sharp(input).png().toBuffer();
    console.log(`[image] Converted ${metadata.format ?? 'unknown'} image "${label}" to PNG`);
    return { data: new Uint8Array(png), mimeType: 'image/png', ...size };
  } catch (err) {
    throw new ResourceNotFoundError(label, 'could not be converted', { cause: err });
  }
}

/**
 * Read and probe an image file. Missing, unreadable or undecodable files
 * raise ResourceNotFoundError naming `label`.
 */
export async function loadImage(imagePath: string, label = imagePath): Promise<SlideImage> {
  let bytes: Buffer;
  try {
    bytes = await readFile(imagePath);
  } catch (err) {
    throw new ResourceNotFoundError(label, 'not found', { cause: err });
  }
  return imageFromBytes(bytes, label);
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
